/* PALETTE GENERATORS
/*-----------------------------------------------------
/* Functions of a count returning that many colors.
/* ==================================================== */

import { hsl } from "d3-color";
import { sampleInterpolator } from "./ramp.ts";

export type PaletteGenerator = (n: number) => readonly string[];

/**
 * Fully saturated hues evenly spaced around the color wheel, starting at red.
 */
export function rainbow(n: number): string[] {
	const out = new Array<string>(n);
	for (let i = 0; i < n; i++) {
		out[i] = hsl((360 * i) / n, 1, 0.5).formatHex();
	}
	return out;
}

/**
 * Wraps a continuous color function, e.g. `interpolateViridis`, as a
 * generator sampling it evenly from 0 to 1.
 */
export function fromInterpolator(interpolate: (t: number) => string): PaletteGenerator {
	return (n) => sampleInterpolator(interpolate, n);
}
