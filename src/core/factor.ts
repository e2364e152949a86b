import { SchemaError } from '../errors';

/** Code used for a missing value */
export const MISSING_CODE = -1;

/**
 * Categorical vector: an ordered set of levels plus one integer code per
 * observation.
 *
 * @example
 * ```ts
 * const species = Factor.from(['setosa', 'virginica', 'setosa']);
 * species.levels; // ['setosa', 'virginica']
 * species.codes;  // Int32Array [0, 1, 0]
 * ```
 */
export class Factor implements Iterable<string | null> {
  readonly levels: readonly string[];
  readonly codes: Int32Array;

  private constructor(levels: readonly string[], codes: Int32Array) {
    this.levels = levels;
    this.codes = codes;
  }

  /**
   * Creates a factor from text values.
   *
   * Without `levels`, the distinct non-missing values become the levels in
   * UTF-16 code unit order, so `'B'` precedes `'a'` whatever the host locale.
   * Pass `levels` for a collation-aware or custom order. With `levels`, their
   * declared order is kept and values outside them become missing.
   */
  static from(
    values: readonly (string | null | undefined)[],
    levels?: readonly string[],
  ): Factor {
    const declared = levels ?? Factor._sortedLevels(values);

    const lookup = new Map<string, number>();
    for (let i = 0; i < declared.length; i++) {
      const level = declared[i]!;
      if (lookup.has(level)) {
        throw new SchemaError(
          `duplicate factor level '${level}'`,
          'factor levels must be unique',
        );
      }
      lookup.set(level, i);
    }

    const codes = new Int32Array(values.length);
    for (let i = 0; i < values.length; i++) {
      const v = values[i];
      codes[i] = v === null || v === undefined ? MISSING_CODE : (lookup.get(v) ?? MISSING_CODE);
    }

    return new Factor([...declared], codes);
  }

  /**
   * Creates a factor from precomputed codes.
   */
  static fromCodes(codes: ArrayLike<number>, levels: readonly string[]): Factor {
    const out = new Int32Array(codes.length);
    for (let i = 0; i < codes.length; i++) {
      const code = codes[i]!;
      if (code !== MISSING_CODE && (code < 0 || code >= levels.length || !Number.isInteger(code))) {
        throw new SchemaError(
          `factor code ${code} at position ${i} is outside 0..${levels.length - 1}`,
          `use ${MISSING_CODE} for missing values`,
        );
      }
      out[i] = code;
    }
    return new Factor([...levels], out);
  }

  private static _sortedLevels(values: readonly (string | null | undefined)[]): string[] {
    const seen = new Set<string>();
    for (const v of values) {
      if (v !== null && v !== undefined) seen.add(v);
    }
    return [...seen].sort();
  }

  get length(): number {
    return this.codes.length;
  }

  get nlevels(): number {
    return this.levels.length;
  }

  /** Level of the value at `index`, or null when missing. */
  at(index: number): string | null {
    const code = this.codes[index];
    if (code === undefined || code === MISSING_CODE) return null;
    return this.levels[code] ?? null;
  }

  toArray(): (string | null)[] {
    const out = new Array<string | null>(this.codes.length);
    for (let i = 0; i < this.codes.length; i++) {
      out[i] = this.at(i);
    }
    return out;
  }

  *[Symbol.iterator](): Iterator<string | null> {
    for (let i = 0; i < this.codes.length; i++) {
      yield this.at(i);
    }
  }
}
