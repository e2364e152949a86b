/* EMBEDDING PLOT
/*-----------------------------------------------------
/* Static scatter plot of a 2D embedding, colored by data.
/* Returns PlotResult which can render to SVG or raw JSON.
/* ==================================================== */

import { writeFile } from "node:fs/promises";
import { resolveColors } from "../classify/index.ts";
import { type CoordinatesInput, pcRotate, toCoordinates } from "../geometry/index.ts";
import { buildEmbedSpec } from "./charts/scatter.ts";
import { renderSvg } from "./svg.ts";
import type { EmbedSpec, PlotOptions } from "./types.ts";

export class PlotResult {
	constructor(private readonly spec: EmbedSpec) {}

	toJSON(): EmbedSpec {
		return this.spec;
	}

	toSVG(): string {
		return renderSvg(this.spec);
	}

	async toFile(path: string): Promise<void> {
		const svg = this.toSVG();
		await writeFile(path, svg, "utf8");
	}
}

/**
 * Plots an embedding with each point colored from `x` or `colors`.
 *
 * @example
 * ```ts
 * const frame = DataFrame.fromColumns({ species: category(["a", "b", "a"]) });
 * embedPlot([[0, 1], [1, 0], [2, 2]], { x: frame, title: "PCA" }).toSVG();
 * ```
 */
export function embedPlot(coords: CoordinatesInput, options: PlotOptions = {}): PlotResult {
	const points = toCoordinates(coords);
	const { colors } = resolveColors({ ...options, coordsLength: points.length });
	const drawn = options.pcAxes ? pcRotate(points) : points;
	return new PlotResult(buildEmbedSpec(drawn, colors, options));
}
