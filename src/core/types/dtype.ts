/**
 * DType kind identifiers.
 * These are the string literal types that identify each column type.
 */
export type DTypeKind = 'float64' | 'string' | 'bool' | 'category';
