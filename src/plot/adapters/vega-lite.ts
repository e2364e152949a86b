/* VEGA-LITE ADAPTER
/*-----------------------------------------------------
/* Converts InteractiveSpec to a Vega-Lite specification.
/* The conversion itself is zero-dependency.
/* Rendering loads vega-lite + vega on first use.
/* ==================================================== */

import type { TopLevelSpec } from "vega-lite";
import {
	type AxisSpec,
	type ColorEncoding,
	DEFAULT_FONT_SIZE,
	type InteractiveSpec,
	MARKER_SIZE,
} from "../types.ts";

const VEGA_LITE_SCHEMA = "https://vega.github.io/schema/vega-lite/v5.json";

function positionScale(axis: AxisSpec): { zero: false; domain?: [number, number] } {
	return axis.domain ? { zero: false, domain: axis.domain } : { zero: false };
}

function colorField(color: ColorEncoding): "label" | "value" {
	return color.type === "nominal" ? "label" : "value";
}

export function toVegaLiteSpec(spec: InteractiveSpec): TopLevelSpec {
	const { color, axes } = spec;
	const legend = spec.showLegend ? { title: null } : null;

	return {
		$schema: VEGA_LITE_SCHEMA,
		width: spec.dimensions.width - spec.padding.left - spec.padding.right,
		height: spec.dimensions.height - spec.padding.top - spec.padding.bottom,
		padding: { ...spec.padding },
		...(spec.title ? { title: spec.title } : {}),
		data: { values: spec.points },
		mark:
			spec.mode === "text"
				? { type: "text", fontSize: DEFAULT_FONT_SIZE * spec.cex }
				: {
						type: "point",
						filled: true,
						opacity: 1,
						// Vega-Lite sizes are areas; markers are sized by diameter
						size: (MARKER_SIZE * spec.cex) ** 2,
					},
		encoding: {
			x: {
				field: "x",
				type: "quantitative",
				axis: { title: axes.x.label ?? "X", grid: false },
				scale: positionScale(axes.x),
			},
			y: {
				field: "y",
				type: "quantitative",
				axis: { title: axes.y.label ?? "Y", grid: false },
				scale: positionScale(axes.y),
			},
			color:
				color.type === "nominal"
					? {
							field: colorField(color),
							type: "nominal",
							scale: { domain: color.domain, range: color.range },
							legend,
						}
					: {
							field: colorField(color),
							type: "quantitative",
							scale: { range: color.range },
							legend,
						},
			tooltip: { field: "tooltip", type: "nominal" },
			...(spec.mode === "text" ? ({ text: { field: "text", type: "nominal" } } as const) : {}),
		},
	};
}

export async function renderVegaLite(spec: InteractiveSpec): Promise<string> {
	const vegaLite = await import("vega-lite");
	const vega = await import("vega");

	const compiled = vegaLite.compile(toVegaLiteSpec(spec));
	const view = new vega.View(vega.parse(compiled.spec), { renderer: "none" });
	try {
		return await view.toSVG();
	} finally {
		view.finalize();
	}
}
