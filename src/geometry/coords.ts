/* COORDINATES
/*-----------------------------------------------------
/* Normalise the 2D embedding handed to the renderers.
/* ==================================================== */

import { SchemaError } from "../errors/index.ts";

export type Point = readonly [x: number, y: number];

export type Coordinates = readonly Point[];

type Matrix = readonly (readonly number[])[];

/**
 * An n-by-2 (or wider) matrix of rows, or an object carrying one under
 * `coords` as dimensionality reduction results usually do.
 * Only the first two columns are used.
 */
export type CoordinatesInput = Matrix | { readonly coords: Matrix };

function rowsOf(input: CoordinatesInput): Matrix {
	return "coords" in input ? input.coords : input;
}

export function toCoordinates(input: CoordinatesInput): Coordinates {
	const rows = rowsOf(input);
	if (rows.length === 0) {
		throw new SchemaError("no coordinates to plot", "Pass at least one row");
	}
	const points: Point[] = [];
	for (let i = 0; i < rows.length; i++) {
		const [x, y] = rows[i]!;
		if (x === undefined || y === undefined) {
			throw new SchemaError(
				`coordinate row ${i} has ${rows[i]!.length} values, expected at least 2`,
				"Pass an n x 2 matrix or an object with a `coords` matrix",
			);
		}
		points.push([x, y]);
	}
	return points;
}

function finiteRange(values: Iterable<number>): [number, number] {
	let min = Number.POSITIVE_INFINITY;
	let max = Number.NEGATIVE_INFINITY;
	for (const v of values) {
		if (!Number.isFinite(v)) continue;
		if (v < min) min = v;
		if (v > max) max = v;
	}
	return min <= max ? [min, max] : [0, 1];
}

/**
 * Range of the finite values on one axis, [0, 1] when there are none.
 */
export function axisRange(coords: Coordinates, axis: 0 | 1): [number, number] {
	return finiteRange(coords.map((point) => point[axis]));
}

/**
 * Range over both axes together, used to draw the embedding on equal axes.
 */
export function coordinateRange(coords: Coordinates): [number, number] {
	return finiteRange(coords.flat());
}
