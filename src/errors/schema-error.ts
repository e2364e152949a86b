import { HueplotError } from './base';

/**
 * Error thrown when input data does not have the expected shape.
 */
export class SchemaError extends HueplotError {
  private _detail: string;

  constructor(detail: string, hint?: string) {
    super('schema error', hint);
    this.name = 'SchemaError';
    this._detail = detail;
  }

  protected override _getExpression(): string {
    return 'input data';
  }

  protected override _getDetail(): string {
    return this._detail;
  }
}
