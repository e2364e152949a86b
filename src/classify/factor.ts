import type { Factor } from "../core/factor.ts";
import { resolvePalette } from "../palette/resolve.ts";
import { type ClassifyOptions, type ColorVector, DEFAULT_COLOR_SCHEME } from "./types.ts";

/**
 * Gives each level of the factor its own color, in level order, and colors
 * each observation by its level. Missing values get the absent color.
 */
export function factorToColors(factor: Factor, options: ClassifyOptions = {}): ColorVector {
	const palette = resolvePalette(options.colorScheme ?? DEFAULT_COLOR_SCHEME, factor.nlevels, options);
	const colors = new Array<string | null>(factor.length);
	for (let i = 0; i < factor.length; i++) {
		const code = factor.codes[i]!;
		colors[i] = code < 0 ? null : (palette[code] ?? null);
	}
	return colors;
}
