import { type Column, columnLength, valueText } from '../column';

/**
 * Internal DataFrame context for display methods.
 * Provides access to DataFrame internals without circular imports.
 */
export interface DisplayContext {
  readonly shape: readonly [rows: number, cols: number];
  readonly _columns: ReadonlyMap<string, Column>;
  readonly _columnOrder: readonly string[];
}

const MAX_ROWS = 10;
const MAX_WIDTH = 24;

/**
 * Formats a value for display.
 */
function formatValue(value: string | null): string {
  return value === null ? 'null' : value;
}

/**
 * Formats a DataFrame as an ASCII table string.
 */
export function formatDataFrame(ctx: DisplayContext): string {
  const [rows, cols] = ctx.shape;
  if (cols === 0) return 'DataFrame (empty)';

  const shown = Math.min(rows, MAX_ROWS);
  const header: string[] = [];
  const dtypes: string[] = [];
  const body: string[][] = [];

  for (const name of ctx._columnOrder) {
    const column = ctx._columns.get(name);
    if (!column) continue;
    header.push(name);
    dtypes.push(column.dtype);
    const cells: string[] = [];
    for (let i = 0; i < Math.min(shown, columnLength(column)); i++) {
      cells.push(formatValue(valueText(column, i)));
    }
    body.push(cells);
  }

  const widths = header.map((name, j) => {
    let w = Math.max(name.length, dtypes[j]!.length);
    for (const cell of body[j]!) w = Math.max(w, cell.length);
    return Math.min(w, MAX_WIDTH);
  });

  const fit = (text: string, width: number): string =>
    text.length > width ? `${text.slice(0, width - 1)}…` : text.padStart(width, ' ');
  const line = (cells: string[]): string =>
    `│${cells.map((c, j) => ` ${fit(c, widths[j]!)} `).join('│')}│`;
  const rule = (left: string, mid: string, right: string): string =>
    `${left}${widths.map((w) => '─'.repeat(w + 2)).join(mid)}${right}`;

  const lines: string[] = [`shape: (${rows}, ${cols})`];
  lines.push(rule('┌', '┬', '┐'));
  lines.push(line(header));
  lines.push(line(dtypes));
  lines.push(rule('├', '┼', '┤'));
  for (let i = 0; i < shown; i++) {
    lines.push(line(body.map((cells) => cells[i] ?? '')));
  }
  lines.push(rule('└', '┴', '┘'));
  if (rows > shown) lines.push(`… ${rows - shown} more rows`);
  return lines.join('\n');
}
