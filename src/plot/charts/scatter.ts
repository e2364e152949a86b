/* EMBEDDING SPEC BUILDER
/*-----------------------------------------------------
/* Produces an EmbedSpec from coordinates and resolved colors.
/* ==================================================== */

import type { ColorVector } from "../../classify/index.ts";
import { SchemaError } from "../../errors/index.ts";
import { type Coordinates, coordinateRange } from "../../geometry/index.ts";
import { computeDomain } from "../scales.ts";
import {
	DEFAULT_CEX,
	DEFAULT_DIMENSIONS,
	DEFAULT_PADDING,
	type EmbedPoint,
	type EmbedSpec,
	type PlotOptions,
} from "../types.ts";

export function buildEmbedSpec(
	coords: Coordinates,
	colors: ColorVector,
	options: PlotOptions = {},
): EmbedSpec {
	const { text } = options;
	if (text && text.length !== coords.length) {
		throw new SchemaError(
			`text has ${text.length} labels but there are ${coords.length} points`,
		);
	}

	const points: EmbedPoint[] = coords.map(([x, y], index) => ({
		index,
		x,
		y,
		color: colors[index] ?? null,
		label: text?.[index],
	}));

	// Equal axes share the joint range of both coordinates
	const lims = options.equalAxes ? coordinateRange(coords) : undefined;

	return {
		mode: text ? "text" : "points",
		points,
		axes: {
			x: { label: "X", domain: lims ?? computeDomain(coords.map((p) => p[0])) },
			y: { label: "Y", domain: lims ?? computeDomain(coords.map((p) => p[1])) },
		},
		dimensions: {
			width: options.width ?? DEFAULT_DIMENSIONS.width,
			height: options.height ?? DEFAULT_DIMENSIONS.height,
		},
		padding: { ...DEFAULT_PADDING, ...options.padding },
		cex: options.cex ?? DEFAULT_CEX,
		title: options.title,
		subtitle: options.subtitle,
	};
}
