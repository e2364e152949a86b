import { HueplotError } from './base';

/**
 * Error thrown when a catalog exists but holds no palette of the given name.
 */
export class UnknownPaletteError extends HueplotError {
  readonly catalog: string;
  readonly palette: string;

  constructor(catalog: string, palette: string) {
    super('unknown palette');
    this.name = 'UnknownPaletteError';
    this.catalog = catalog;
    this.palette = palette;
  }

  protected override _getExpression(): string {
    return `catalog.lookup('${this.catalog}', '${this.palette}')`;
  }

  protected override _getDetail(): string {
    return `unknown palette '${this.palette}' for catalog '${this.catalog}'`;
  }
}
