/* INTERACTIVE EMBEDDING PLOT
/*-----------------------------------------------------
/* Hoverable scatter plot with a legend, rendered
/* through Vega-Lite.
/* ==================================================== */

import { writeFile } from "node:fs/promises";
import type { TopLevelSpec } from "vega-lite";
import {
	type ColorVector,
	DEFAULT_COLOR_SCHEME,
	DEFAULT_NUM_COLORS,
	resolveColors,
} from "../classify/index.ts";
import { toCssColor } from "../color/parse.ts";
import { toColumn } from "../core/column.ts";
import { DataFrame } from "../core/dataframe/index.ts";
import { SchemaError } from "../errors/index.ts";
import {
	type Coordinates,
	type CoordinatesInput,
	coordinateRange,
	pcRotate,
	toCoordinates,
} from "../geometry/index.ts";
import { resolvePalette } from "../palette/resolve.ts";
import { renderVegaLite, toVegaLiteSpec } from "./adapters/vega-lite.ts";
import {
	type AxisSpec,
	type ColorEncoding,
	DEFAULT_AXIS_MARGIN,
	DEFAULT_CEX,
	DEFAULT_DIMENSIONS,
	DEFAULT_PADDING,
	type InteractiveOptions,
	type InteractivePoint,
	type InteractiveSpec,
} from "./types.ts";

export class InteractiveResult {
	constructor(private readonly spec: InteractiveSpec) {}

	toJSON(): InteractiveSpec {
		return this.spec;
	}

	toVegaLite(): TopLevelSpec {
		return toVegaLiteSpec(this.spec);
	}

	async toSVG(): Promise<string> {
		return renderVegaLite(this.spec);
	}

	/** Writes rendered SVG for a `.svg` path, the Vega-Lite JSON otherwise */
	async toFile(path: string): Promise<void> {
		const content = path.endsWith(".svg")
			? await this.toSVG()
			: JSON.stringify(this.toVegaLite(), null, 2);
		await writeFile(path, content, "utf8");
	}
}

interface Coloring {
	/** Legend group of each point */
	labels: readonly (string | null)[];
	/** Whether each point has a color to be drawn with */
	drawn: readonly boolean[];
	color: ColorEncoding;
	grouped: boolean;
	values?: Float64Array;
}

/**
 * Nominal scale mapping each label to the color of its first point.
 * `order` fixes the legend order; otherwise labels appear as first seen.
 */
function nominalEncoding(
	labels: readonly (string | null)[],
	colors: ColorVector,
	order?: readonly string[],
): ColorEncoding {
	const first = new Map<string, string>();
	for (let i = 0; i < labels.length; i++) {
		const label = labels[i];
		const css = toCssColor(colors[i]);
		if (label === null || label === undefined || css === null || first.has(label)) continue;
		first.set(label, css);
	}
	const domain = order ? order.filter((level) => first.has(level)) : [...first.keys()];
	return {
		type: "nominal",
		domain,
		range: domain.map((label) => first.get(label) ?? "transparent"),
	};
}

function resolveColoring(n: number, options: InteractiveOptions): Coloring {
	const { x, colors, text } = options;

	if (!colors && x !== undefined && !(x instanceof DataFrame)) {
		const column = toColumn(x);
		if (column.dtype === "float64") {
			if (column.values.length !== n) {
				throw new SchemaError(`x has ${column.values.length} entries but there are ${n} points`);
			}
			// Numbers get a continuous scale instead of binned groups
			const scheme = options.colorScheme ?? DEFAULT_COLOR_SCHEME;
			const range = resolvePalette(scheme, options.numColors ?? DEFAULT_NUM_COLORS, options);
			const labels = Array.from(column.values, (v) => (Number.isNaN(v) ? null : String(v)));
			return {
				labels,
				drawn: labels.map((label) => label !== null),
				color: { type: "quantitative", range },
				grouped: true,
				values: column.values,
			};
		}
	}

	const resolved = resolveColors({ ...options, coordsLength: n });
	let labels: readonly (string | null)[];
	let order: readonly string[] | undefined;
	if (colors) {
		labels = text ?? colors;
	} else if (resolved.labels) {
		labels = resolved.labels.toArray();
		order = resolved.labels.levels;
	} else {
		labels = resolved.colors;
	}

	return {
		labels,
		drawn: resolved.colors.map((c) => toCssColor(c) !== null),
		color: nominalEncoding(labels, resolved.colors, order),
		grouped: resolved.grouped,
	};
}

function equalAxes(coords: Coordinates, options: InteractiveOptions): { x: AxisSpec; y: AxisSpec } {
	const margin = options.axisMargin ?? DEFAULT_AXIS_MARGIN;
	const [low, high] = coordinateRange(coords);
	return {
		x: { label: "X", domain: [low * margin.x, high * margin.x] },
		y: { label: "Y", domain: [low * margin.y, high * margin.y] },
	};
}

export function buildInteractiveSpec(
	coords: Coordinates,
	options: InteractiveOptions = {},
): InteractiveSpec {
	const n = coords.length;
	for (const [name, vector] of [
		["text", options.text],
		["tooltip", options.tooltip],
	] as const) {
		if (vector && vector.length !== n) {
			throw new SchemaError(`${name} has ${vector.length} entries but there are ${n} points`);
		}
	}

	const coloring = resolveColoring(n, options);
	const numeric = coloring.values !== undefined;
	const mode = options.text && !numeric ? "text" : "points";
	const hover = options.tooltip ?? options.text ?? coloring.labels;

	const points: InteractivePoint[] = [];
	for (let i = 0; i < n; i++) {
		const [x, y] = coords[i]!;
		if (!coloring.drawn[i]) continue;
		const value = coloring.values?.[i];
		const point: InteractivePoint = {
			index: i,
			x,
			y,
			label: coloring.labels[i] ?? null,
			tooltip: `${i + 1}: ${hover[i] ?? ""}`,
		};
		if (value !== undefined) point.value = value;
		if (mode === "text") point.text = options.text?.[i];
		points.push(point);
	}

	return {
		mode,
		points,
		color: coloring.color,
		showLegend: (options.showLegend ?? true) && coloring.grouped,
		axes: options.equalAxes ? equalAxes(coords, options) : { x: { label: "X" }, y: { label: "Y" } },
		dimensions: {
			width: options.width ?? DEFAULT_DIMENSIONS.width,
			height: options.height ?? DEFAULT_DIMENSIONS.height,
		},
		padding: { ...DEFAULT_PADDING, ...options.padding },
		cex: options.cex ?? DEFAULT_CEX,
		title: options.title,
	};
}

/**
 * Interactive counterpart of `embedPlot`. Hovering a point shows its
 * 1-based position followed by its tooltip, label or color.
 *
 * A numeric `x` is drawn on a continuous color scale. Without `x` or
 * `colors` every point gets its own color and the legend is hidden.
 */
export function embedInteractive(
	coords: CoordinatesInput,
	options: InteractiveOptions = {},
): InteractiveResult {
	const points = toCoordinates(coords);
	const drawn = options.pcAxes ? pcRotate(points) : points;
	return new InteractiveResult(buildInteractiveSpec(drawn, options));
}
