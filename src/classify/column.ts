/* COLUMN CLASSIFIER
/*-----------------------------------------------------
/* Decide what a single vector means and color it accordingly.
/* ==================================================== */

import { isFactorish } from "../color/factorish.ts";
import { isColorColumn } from "../color/predicate.ts";
import { type ColumnInput, columnText, toColumn } from "../core/column.ts";
import { Factor } from "../core/factor.ts";
import { resolvePalette } from "../palette/resolve.ts";
import { factorToColors } from "./factor.ts";
import { numericToColors } from "./numeric.ts";
import { type ClassifyOptions, type ColorVector, DEFAULT_COLOR_SCHEME } from "./types.ts";

/**
 * Turns a vector into one color per element. The checks run in a fixed
 * order and the first match wins:
 *
 * - colors are returned unchanged
 * - numbers are binned into `numColors` colors (see `numericToColors`)
 * - factors, and text that looks like one, get a color per level
 * - anything else gets a color per element
 */
export function classifyColumn(input: ColumnInput, options: ClassifyOptions = {}): ColorVector {
	const column = toColumn(input);

	if (isColorColumn(column)) return columnText(column);
	if (column.dtype === "float64") return numericToColors(column.values, options);
	if (column.dtype === "category") return factorToColors(column.values, options);
	if (column.dtype === "string" && isFactorish(column)) {
		return factorToColors(Factor.from(column.values), options);
	}

	return resolvePalette(
		options.colorScheme ?? DEFAULT_COLOR_SCHEME,
		column.values.length,
		options,
	);
}
