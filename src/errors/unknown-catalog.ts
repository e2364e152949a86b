import { HueplotError } from './base';

/**
 * Error thrown when a palette name refers to a catalog that is not registered.
 */
export class UnknownCatalogError extends HueplotError {
  readonly catalog: string;
  readonly available: string[];

  constructor(catalog: string, available: string[]) {
    const hint = available.length > 0
      ? `available catalogs are: ${available.map(c => `'${c}'`).join(', ')}`
      : 'no palette catalogs are registered';

    super('unknown palette catalog', hint);
    this.name = 'UnknownCatalogError';
    this.catalog = catalog;
    this.available = available;
  }

  protected override _getExpression(): string {
    return `catalog.lookup('${this.catalog}', ...)`;
  }

  protected override _getDetail(): string {
    return `unknown catalog '${this.catalog}'`;
  }
}
