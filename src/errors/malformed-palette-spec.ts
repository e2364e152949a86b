import { HueplotError } from './base';

/**
 * Error thrown when a palette name is not of the form `<catalog>::<palette>`.
 */
export class MalformedPaletteSpecError extends HueplotError {
  readonly spec: string;

  constructor(spec: string) {
    super('malformed palette name', "use the format '<catalog>::<palette>', e.g. 'brewer::Dark2'");
    this.name = 'MalformedPaletteSpecError';
    this.spec = spec;
  }

  protected override _getExpression(): string {
    return `colorScheme: '${this.spec}'`;
  }

  protected override _getDetail(): string {
    return `'${this.spec}' does not split into exactly two segments on '::'`;
  }
}
