/* PLOT MODULE
/*-----------------------------------------------------
/* Public API surface for the plot subsystem.
/* ==================================================== */

export { embedPlot, PlotResult } from "./plot.ts";
export { buildInteractiveSpec, embedInteractive, InteractiveResult } from "./interactive.ts";
export { buildEmbedSpec } from "./charts/scatter.ts";
export { renderSvg } from "./svg.ts";
export { linearScale, computeNiceTicks, computeDomain } from "./scales.ts";
export type {
	AxisMargin,
	AxisSpec,
	ColorEncoding,
	EmbedMode,
	EmbedOptions,
	EmbedPoint,
	EmbedSpec,
	InteractiveOptions,
	InteractivePoint,
	InteractiveSpec,
	Padding,
	PlotOptions,
} from "./types.ts";
export {
	DEFAULT_AXIS_MARGIN,
	DEFAULT_CEX,
	DEFAULT_DIMENSIONS,
	DEFAULT_PADDING,
} from "./types.ts";
export { toVegaLiteSpec, renderVegaLite } from "./adapters/vega-lite.ts";
