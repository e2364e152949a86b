import { HueplotError } from './base';

/**
 * Error thrown when an explicit palette has too few colors to interpolate.
 */
export class InvalidPaletteSizeError extends HueplotError {
  readonly size: number;

  constructor(size: number) {
    super('invalid palette size', 'an explicit palette needs at least two colors');
    this.name = 'InvalidPaletteSizeError';
    this.size = size;
  }

  protected override _getExpression(): string {
    return 'colorScheme: [...]';
  }

  protected override _getDetail(): string {
    return `palette has ${this.size} color${this.size === 1 ? '' : 's'}, expected at least 2`;
  }
}
