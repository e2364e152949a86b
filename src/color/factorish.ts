import type { Column } from "../core/column.ts";

/**
 * Could a text column usefully be treated as categorical? It must have more
 * than one distinct value, but fewer distinct values than observations
 * (one value per observation looks like an identifier).
 */
export function isFactorish(column: Column): boolean {
	if (column.dtype !== "string") return false;

	const levels = new Set<string>();
	for (const v of column.values) {
		if (v !== null) levels.add(v);
	}
	return levels.size > 1 && levels.size < column.values.length;
}
