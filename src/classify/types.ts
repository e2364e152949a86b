/* CLASSIFICATION TYPES
/*-----------------------------------------------------
/* Shared option and result shapes for turning data into colors.
/* ==================================================== */

import type { Factor } from "../core/factor.ts";
import { rainbow } from "../color/generators.ts";
import type { ColorSchemeInput } from "../palette/scheme.ts";
import type { PaletteOptions } from "../palette/resolve.ts";

/** One color per observation; null is the absent color and is not drawn */
export type ColorVector = readonly (string | null)[];

/** Fixed `[low, high]` range for mapping numbers to colors */
export type Limits = readonly [low: number, high: number];

export interface ClassifyOptions extends PaletteOptions {
	colorScheme?: ColorSchemeInput;
	/** Number of colors numeric values are binned into */
	numColors?: number;
	/** Range numeric values map over; the data's own range by default */
	limits?: Limits;
	/** Only show the `top` highest numeric values */
	top?: number;
}

export interface TableColoring {
	colors: ColorVector;
	/** Category of each row, when the colors came from a categorical column */
	labels?: Factor;
	/** Name of the column the colors came from */
	source?: string;
}

export interface ColorResolution extends TableColoring {
	/** False when the colors carry no grouping worth a legend */
	grouped: boolean;
}

export const DEFAULT_NUM_COLORS = 15;
export const DEFAULT_COLOR_SCHEME: ColorSchemeInput = rainbow;
