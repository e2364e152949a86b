/* COLOR PREDICATES
/*-----------------------------------------------------
/* Decide whether values, or whole columns, already are colors.
/* ==================================================== */

import type { Column } from "../core/column.ts";
import { type ColorValue, parseColor } from "./parse.ts";

/**
 * True when the value can be used as a color. Numbers always qualify since
 * they address the system color table; parse failures are simply false.
 */
export function isColor(value: ColorValue): boolean {
	if (typeof value === "number") return true;
	return parseColor(value).ok;
}

/**
 * True when every element of a non-numeric column is a color.
 *
 * Numeric columns are excluded even though each number would parse as a
 * palette index, so plain measurements are never mistaken for colors.
 */
export function isColorColumn(column: Column): boolean {
	switch (column.dtype) {
		case "float64":
		case "bool":
			return false;
		case "string":
			return column.values.every((v) => isColor(v));
		case "category": {
			const levelIsColor = column.values.levels.map((level) => isColor(level));
			for (const code of column.values.codes) {
				if (code >= 0 && !levelIsColor[code]) return false;
			}
			return true;
		}
	}
}
