/* COLOR RAMPS
/*-----------------------------------------------------
/* Linear RGB interpolation through an ordered list of colors.
/* ==================================================== */

import { rgb } from "d3-color";
import { interpolateRgb, piecewise } from "d3-interpolate";
import { InvalidPaletteSizeError } from "../errors/index.ts";
import { toHex } from "./parse.ts";

/** Position of the i-th of n evenly spaced samples on [0, 1] */
function samplePosition(i: number, n: number): number {
	return n === 1 ? 0 : i / (n - 1);
}

/**
 * Samples `n` evenly spaced colors from a continuous color function.
 */
export function sampleInterpolator(interpolate: (t: number) => string, n: number): string[] {
	const out = new Array<string>(n);
	for (let i = 0; i < n; i++) {
		out[i] = rgb(interpolate(samplePosition(i, n))).formatHex();
	}
	return out;
}

/**
 * Produces `n` colors by blending continuously through `colors`, first and
 * last stops included. Output colors are `#rrggbb`.
 *
 * @throws ParseError when a stop is not a color
 */
export function colorRamp(colors: readonly string[], n: number): string[] {
	if (colors.length === 0) throw new InvalidPaletteSizeError(0);

	const stops = colors.map((c) => toHex(c));
	if (stops.length === 1) return new Array<string>(n).fill(stops[0] ?? "#000000");

	const mix: (t: number) => string = piecewise(interpolateRgb, stops);
	return sampleInterpolator(mix, n);
}
