/* COLOR RESOLUTION
/*-----------------------------------------------------
/* Single entry point used by both renderers to decide
/* the color of every point.
/* ==================================================== */

import { type ColumnInput, toColumn } from "../core/column.ts";
import { DataFrame } from "../core/dataframe/index.ts";
import { SchemaError } from "../errors/index.ts";
import { resolvePalette } from "../palette/resolve.ts";
import { classifyColumn } from "./column.ts";
import { classifyTable } from "./table.ts";
import {
	type ClassifyOptions,
	type ColorResolution,
	type ColorVector,
	DEFAULT_COLOR_SCHEME,
} from "./types.ts";

export interface ResolveOptions extends ClassifyOptions {
	/** Number of points being colored */
	coordsLength: number;
	/** Data describing each point: a table, or a single column */
	x?: DataFrame | ColumnInput;
	/** Explicit colors, used without classification */
	colors?: ColorVector;
}

function checkLength(colors: ColorVector, expected: number, what: string): void {
	if (colors.length !== expected) {
		throw new SchemaError(
			`${what} has ${colors.length} entries but there are ${expected} points`,
		);
	}
}

/**
 * Decides the color of each point.
 *
 * Explicit `colors` win, then `x` (a table or a single column), and without
 * either every point gets its own color from the scheme. Only the last case
 * reports `grouped: false`.
 *
 * @example
 * ```ts
 * const { colors, labels } = resolveColors({
 *   coordsLength: 3,
 *   x: DataFrame.fromColumns({ group: category(["a", "b", "a"]) }),
 * });
 * // colors[0] === colors[2], labels.levels = ["a", "b"]
 * ```
 */
export function resolveColors(options: ResolveOptions): ColorResolution {
	const { coordsLength, x, colors } = options;

	if (colors) {
		checkLength(colors, coordsLength, "colors");
		return { colors, grouped: true };
	}

	if (x !== undefined) {
		if (x instanceof DataFrame) {
			const table = classifyTable(x, options);
			checkLength(table.colors, coordsLength, "x");
			return { ...table, grouped: true };
		}

		const column = toColumn(x);
		const resolved = classifyColumn(column, options);
		checkLength(resolved, coordsLength, "x");
		return column.dtype === "category"
			? { colors: resolved, labels: column.values, grouped: true }
			: { colors: resolved, grouped: true };
	}

	return {
		colors: resolvePalette(options.colorScheme ?? DEFAULT_COLOR_SCHEME, coordsLength, options),
		grouped: false,
	};
}
