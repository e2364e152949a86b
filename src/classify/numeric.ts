/* NUMERIC TO COLORS
/*-----------------------------------------------------
/* Linear binning of numbers into a fixed number of palette colors,
/* with optional top-K filtering.
/* ==================================================== */

import { InvalidOperationError } from "../errors/index.ts";
import { resolvePalette } from "../palette/resolve.ts";
import {
	type ClassifyOptions,
	type ColorVector,
	DEFAULT_COLOR_SCHEME,
	DEFAULT_NUM_COLORS,
	type Limits,
} from "./types.ts";

/**
 * Range of the non-NaN values, or undefined when there are none.
 */
function valueRange(values: ArrayLike<number>): Limits | undefined {
	let low = Number.POSITIVE_INFINITY;
	let high = Number.NEGATIVE_INFINITY;
	let seen = false;
	for (let i = 0; i < values.length; i++) {
		const v = values[i]!;
		if (!Number.isFinite(v)) continue;
		seen = true;
		if (v < low) low = v;
		if (v > high) high = v;
	}
	return seen ? [low, high] : undefined;
}

function checkLimits(limits: Limits): void {
	const [low, high] = limits;
	if (!Number.isFinite(low) || !Number.isFinite(high) || low > high) {
		throw new InvalidOperationError(
			"numericToColors",
			`got limits [${low}, ${high}]`,
			"limits must be finite with low <= high",
		);
	}
}

function checkCount(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 1) {
		throw new InvalidOperationError(
			"numericToColors",
			`got ${name} = ${value}`,
			`${name} must be a positive integer`,
		);
	}
}

/**
 * Index of the bin `value` falls in: `breaks[i] <= value < breaks[i + 1]`,
 * clamped so values outside the breaks land in the first or last bin.
 */
function binIndex(breaks: Float64Array, value: number): number {
	let lo = 0;
	let hi = breaks.length;
	// count of breaks <= value
	while (lo < hi) {
		const mid = (lo + hi) >>> 1;
		if (breaks[mid]! <= value) lo = mid + 1;
		else hi = mid;
	}
	const bins = breaks.length - 1;
	return Math.min(Math.max(lo - 1, 0), bins - 1);
}

/**
 * Value at 1-based rank `top` when sorted in decreasing order, ignoring NaN.
 */
function topThreshold(values: ArrayLike<number>, top: number): number | undefined {
	const sorted: number[] = [];
	for (let i = 0; i < values.length; i++) {
		const v = values[i]!;
		if (!Number.isNaN(v)) sorted.push(v);
	}
	sorted.sort((a, b) => b - a);
	return sorted[top - 1];
}

/**
 * Maps each number to one of `numColors` colors by splitting the range into
 * equal-width bins. NaN maps to the absent color. When the range is a single
 * value every number gets the middle color.
 *
 * With `top`, values strictly below the `top`-th largest become absent; ties
 * with it are kept, so more than `top` values may remain.
 *
 * @example
 * ```ts
 * numericToColors([0, 5, 10], { colorScheme: ["#000000", "#ffffff"], numColors: 2 });
 * // ["#000000", "#ffffff", "#ffffff"]
 * ```
 */
export function numericToColors(
	values: ArrayLike<number>,
	options: ClassifyOptions = {},
): ColorVector {
	const k = options.numColors ?? DEFAULT_NUM_COLORS;
	checkCount("numColors", k);
	if (options.limits) checkLimits(options.limits);
	if (options.top !== undefined) checkCount("top", options.top);

	const palette = resolvePalette(options.colorScheme ?? DEFAULT_COLOR_SCHEME, k, options);
	const colors = new Array<string | null>(values.length).fill(null);

	const range = options.limits ?? valueRange(values);
	if (!range) return colors;
	const [low, high] = range;

	if (low === high) {
		const middle = palette[Math.floor((k - 1) / 2)] ?? null;
		for (let i = 0; i < values.length; i++) {
			if (!Number.isNaN(values[i]!)) colors[i] = middle;
		}
	} else {
		const breaks = new Float64Array(k + 1);
		for (let i = 0; i < k; i++) {
			breaks[i] = low + (i * (high - low)) / k;
		}
		breaks[k] = high;

		for (let i = 0; i < values.length; i++) {
			const v = values[i]!;
			if (Number.isNaN(v)) continue;
			colors[i] = palette[binIndex(breaks, v)] ?? null;
		}
	}

	if (options.top !== undefined) {
		const threshold = topThreshold(values, options.top);
		if (threshold !== undefined) {
			for (let i = 0; i < values.length; i++) {
				if (values[i]! < threshold) colors[i] = null;
			}
		}
	}

	return colors;
}
