/**
 * Error module - exports all hueplot error types.
 */

export type { ErrorLocation } from './base';
export { HueplotError, stackLocation } from './base';
export { ColumnNotFoundError } from './column-not-found';
export { InvalidOperationError } from './invalid-operation';
export { InvalidPaletteSizeError } from './invalid-palette-size';
export { MalformedPaletteSpecError } from './malformed-palette-spec';
export { ParseError } from './parse-error';
export { SchemaError } from './schema-error';
export { UnknownCatalogError } from './unknown-catalog';
export { UnknownPaletteError } from './unknown-palette';
