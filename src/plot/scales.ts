/* SCALES
/*-----------------------------------------------------
/* Pure functions for mapping data domains to pixel ranges.
/* ==================================================== */

export interface LinearScale {
	(value: number): number;
	domain: [number, number];
	range: [number, number];
}

export function linearScale(
	domain: [number, number],
	range: [number, number],
): LinearScale {
	const [d0, d1] = domain;
	const [r0, r1] = range;
	const span = d1 - d0;

	const scale = (value: number): number => {
		if (span === 0) return (r0 + r1) / 2;
		return r0 + ((value - d0) / span) * (r1 - r0);
	};

	return Object.assign(scale, { domain, range });
}

// Compute human-readable tick values for a numeric axis
export function computeNiceTicks(
	min: number,
	max: number,
	targetCount: number,
): number[] {
	if (min === max) return [min];

	const range = max - min;
	const roughStep = range / targetCount;

	// Snap to a "nice" step: 1, 2, 5 × 10^n
	const magnitude = 10 ** Math.floor(Math.log10(roughStep));
	const normalized = roughStep / magnitude;

	let niceStep: number;
	if (normalized <= 1.5) niceStep = 1 * magnitude;
	else if (normalized <= 3.5) niceStep = 2 * magnitude;
	else if (normalized <= 7.5) niceStep = 5 * magnitude;
	else niceStep = 10 * magnitude;

	const niceMin = Math.floor(min / niceStep) * niceStep;
	const niceMax = Math.ceil(max / niceStep) * niceStep;

	const ticks: number[] = [];
	for (let v = niceMin; v <= niceMax + niceStep * 0.5; v += niceStep) {
		ticks.push(Math.round(v * 1e10) / 1e10);
	}

	return ticks;
}

// Compute domain [min, max] from the finite values, with optional nice padding
export function computeDomain(
	values: readonly number[],
	niceExtend = true,
): [number, number] {
	let min = Number.POSITIVE_INFINITY;
	let max = Number.NEGATIVE_INFINITY;
	for (const v of values) {
		if (!Number.isFinite(v)) continue;
		if (v < min) min = v;
		if (v > max) max = v;
	}

	if (min > max) return [0, 1];

	if (min === max) {
		const pad = Math.abs(min) * 0.1;
		return pad === 0 ? [min, min + 1] : [min - pad, max + pad];
	}

	if (niceExtend) {
		const ticks = computeNiceTicks(min, max, 5);
		return [ticks[0]!, ticks[ticks.length - 1]!];
	}

	return [min, max];
}
