/* PRINCIPAL AXIS ROTATION
/*-----------------------------------------------------
/* Rotate a 2D embedding so its first axis follows the
/* direction of largest spread.
/* ==================================================== */

import type { Coordinates, Point } from "./coords.ts";

type Direction = readonly [number, number];

/** Flip so the component with the largest magnitude is positive */
function orient(v: Direction): Direction {
	const dominant = Math.abs(v[1]) > Math.abs(v[0]) ? v[1] : v[0];
	return dominant < 0 ? [-v[0], -v[1]] : v;
}

/**
 * Leading eigenvector of the symmetric matrix [[a, b], [b, c]].
 */
function leadingDirection(a: number, b: number, c: number): Direction {
	if (b === 0) return a >= c ? [1, 0] : [0, 1];
	const lambda = (a + c) / 2 + Math.hypot((a - c) / 2, b);
	const norm = Math.hypot(lambda - c, b);
	return [(lambda - c) / norm, b / norm];
}

/**
 * Centers the coordinates and expresses them in their principal components:
 * the first output axis carries the most variance, the second the rest.
 * Equivalent to the scores `U * diag(d)` of the SVD of the centered matrix.
 */
export function pcRotate(coords: Coordinates): Point[] {
	const n = coords.length;
	if (n === 0) return [];

	let mx = 0;
	let my = 0;
	for (const [x, y] of coords) {
		mx += x;
		my += y;
	}
	mx /= n;
	my /= n;

	let a = 0;
	let b = 0;
	let c = 0;
	for (const [x, y] of coords) {
		const dx = x - mx;
		const dy = y - my;
		a += dx * dx;
		b += dx * dy;
		c += dy * dy;
	}

	const first = leadingDirection(a, b, c);
	const u = orient(first);
	const v = orient([-first[1], first[0]]);

	return coords.map(([x, y]): Point => {
		const dx = x - mx;
		const dy = y - my;
		return [dx * u[0] + dy * u[1], dx * v[0] + dy * v[1]];
	});
}
