import { ColumnNotFoundError, SchemaError } from '../../errors';
import { type Column, type ColumnInput, type Scalar, columnLength, toColumn } from '../column';
import { formatDataFrame } from './display';

/**
 * DataFrame - an ordered collection of named, equally long columns.
 *
 * Column order is significant: searches that look for a suitable column
 * take the last match, so a column appended later overrides earlier ones.
 *
 * @example
 * ```ts
 * const df = DataFrame.fromColumns({
 *   length: [5.1, 4.9, 6.3],
 *   species: Factor.from(['setosa', 'setosa', 'virginica']),
 * });
 * df.column('species').dtype; // 'category'
 * ```
 */
export class DataFrame {
  readonly shape: readonly [rows: number, cols: number];

  /** @internal */
  readonly _columns: ReadonlyMap<string, Column>;
  /** @internal */
  readonly _columnOrder: readonly string[];

  /**
   * Private constructor - use factory methods instead.
   */
  private constructor(columns: Map<string, Column>, columnOrder: string[], rowCount: number) {
    this._columns = columns;
    this._columnOrder = columnOrder;
    this.shape = [rowCount, columnOrder.length] as const;
  }

  // Factory Methods
  // ===============================================================

  /**
   * Creates a DataFrame from column data, inferring each column's dtype.
   */
  static fromColumns(data: Readonly<Record<string, ColumnInput>>): DataFrame {
    const columnOrder: string[] = [];
    const columns = new Map<string, Column>();
    let rowCount = 0;

    for (const [colName, input] of Object.entries(data)) {
      const column = toColumn(input);
      const length = columnLength(column);

      if (columnOrder.length === 0) {
        rowCount = length;
      } else if (length !== rowCount) {
        throw new SchemaError(
          `Column '${colName}' has ${length} rows, expected ${rowCount}`,
          'All columns must have the same length',
        );
      }

      columnOrder.push(colName);
      columns.set(colName, column);
    }

    return new DataFrame(columns, columnOrder, rowCount);
  }

  /**
   * Creates a DataFrame from row objects. Column order follows the keys of
   * the first row; keys missing from a row become missing values.
   */
  static fromRecords(rows: readonly Readonly<Record<string, Scalar>>[]): DataFrame {
    const first = rows[0];
    if (!first) return new DataFrame(new Map(), [], 0);

    const data: Record<string, Scalar[]> = {};
    for (const key of Object.keys(first)) {
      data[key] = rows.map((row) => row[key]);
    }
    return DataFrame.fromColumns(data);
  }

  // Accessors
  // ===============================================================

  get height(): number {
    return this.shape[0];
  }

  get width(): number {
    return this.shape[1];
  }

  get columnNames(): readonly string[] {
    return this._columnOrder;
  }

  has(name: string): boolean {
    return this._columns.has(name);
  }

  /**
   * Gets a column by name.
   * @throws ColumnNotFoundError when the column does not exist
   */
  column(name: string): Column {
    const column = this._columns.get(name);
    if (!column) {
      throw new ColumnNotFoundError(name, [...this._columnOrder]);
    }
    return column;
  }

  /**
   * Iterates `[name, column]` pairs in declared order.
   */
  *entries(): IterableIterator<[string, Column]> {
    for (const name of this._columnOrder) {
      const column = this._columns.get(name);
      if (column) yield [name, column];
    }
  }

  /**
   * Returns a new DataFrame with `name` set to `input`. A new name is
   * appended as the last column; an existing name keeps its position.
   */
  withColumn(name: string, input: ColumnInput): DataFrame {
    const column = toColumn(input);
    const length = columnLength(column);
    if (this.width > 0 && length !== this.height) {
      throw new SchemaError(
        `Column '${name}' has ${length} rows, expected ${this.height}`,
        'All columns must have the same length',
      );
    }

    const columns = new Map(this._columns);
    columns.set(name, column);
    const order = this._columns.has(name) ? [...this._columnOrder] : [...this._columnOrder, name];
    return new DataFrame(columns, order, length);
  }

  toString(): string {
    return formatDataFrame(this);
  }

  print(): void {
    console.log(this.toString());
  }
}
