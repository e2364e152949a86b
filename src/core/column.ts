import { Factor } from './factor';
import type { DTypeKind, StorageType } from './types';

/**
 * A column whose storage is fixed by its dtype.
 */
export interface TypedColumn<K extends DTypeKind> {
  readonly dtype: K;
  readonly values: StorageType<K>;
}

/**
 * Any column, discriminated on `dtype`.
 */
export type Column = { [K in DTypeKind]: TypedColumn<K> }[DTypeKind];

/** Scalar accepted when inferring a column from a plain array */
export type Scalar = number | string | boolean | null | undefined;

/**
 * Anything that can be turned into a column.
 * Plain arrays are inferred: all numbers become float64, all booleans bool,
 * anything else string.
 */
export type ColumnInput = Column | Factor | Float64Array | readonly Scalar[];

// Constructors
// ===============================================================

export function float64(values: ArrayLike<number> | readonly (number | null | undefined)[]): TypedColumn<'float64'> {
  const out = new Float64Array(values.length);
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    out[i] = typeof v === 'number' ? v : Number.NaN;
  }
  return { dtype: 'float64', values: out };
}

export function string(values: readonly (string | null | undefined)[]): TypedColumn<'string'> {
  return { dtype: 'string', values: values.map((v) => v ?? null) };
}

export function bool(values: readonly (boolean | null | undefined)[]): TypedColumn<'bool'> {
  return { dtype: 'bool', values: values.map((v) => v ?? null) };
}

export function category(
  values: Factor | readonly (string | null | undefined)[],
  levels?: readonly string[],
): TypedColumn<'category'> {
  return {
    dtype: 'category',
    values: values instanceof Factor ? values : Factor.from(values, levels),
  };
}

// Inference
// ===============================================================

function isColumn(input: ColumnInput): input is Column {
  return !(input instanceof Factor) && !(input instanceof Float64Array) && 'dtype' in input;
}

/**
 * Converts any supported input into a Column.
 */
export function toColumn(input: ColumnInput): Column {
  if (input instanceof Factor) return category(input);
  if (input instanceof Float64Array) return { dtype: 'float64', values: input };
  if (isColumn(input)) return input;
  return inferColumn(input);
}

/** @internal */
export function inferColumn(values: readonly Scalar[]): Column {
  let numbers = 0;
  let booleans = 0;
  let present = 0;

  for (const v of values) {
    if (v === null || v === undefined) continue;
    present++;
    if (typeof v === 'number') numbers++;
    else if (typeof v === 'boolean') booleans++;
  }

  if (present > 0 && numbers === present) {
    return float64(values.map((v) => (typeof v === 'number' ? v : null)));
  }
  if (present > 0 && booleans === present) {
    return bool(values.map((v) => (typeof v === 'boolean' ? v : null)));
  }
  return string(values.map((v) => (v === null || v === undefined ? null : String(v))));
}

// Access
// ===============================================================

export function columnLength(column: Column): number {
  return column.values.length;
}

/**
 * Element at `index` as display text, null when missing.
 */
export function valueText(column: Column, index: number): string | null {
  switch (column.dtype) {
    case 'float64': {
      const v = column.values[index];
      return v === undefined || Number.isNaN(v) ? null : String(v);
    }
    case 'category':
      return column.values.at(index);
    case 'string':
      return column.values[index] ?? null;
    case 'bool': {
      const v = column.values[index];
      return v === undefined || v === null ? null : String(v);
    }
  }
}

/**
 * All elements as display text.
 */
export function columnText(column: Column): (string | null)[] {
  if (column.dtype === 'category') return column.values.toArray();
  const out = new Array<string | null>(column.values.length);
  for (let i = 0; i < out.length; i++) {
    out[i] = valueText(column, i);
  }
  return out;
}
