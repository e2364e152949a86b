/* PLOT TYPES
/*-----------------------------------------------------
/* Neutral intermediate representation for embedding plots.
/* The spec builder produces EmbedSpec, the renderers consume it.
/* ==================================================== */

import type { ResolveOptions } from "../classify/index.ts";

/** Draw each observation as a dot, or as its text label */
export type EmbedMode = "points" | "text";

export interface EmbedPoint {
	/** Position of the observation in the input, 0-based */
	index: number;
	x: number;
	y: number;
	/** Absent colors are not drawn */
	color: string | null;
	label?: string;
}

export interface AxisSpec {
	label?: string;
	ticks?: number;
	domain?: [number, number];
}

export interface Padding {
	top: number;
	right: number;
	bottom: number;
	left: number;
}

export interface EmbedSpec {
	mode: EmbedMode;
	points: EmbedPoint[];
	axes: { x: AxisSpec; y: AxisSpec };
	dimensions: { width: number; height: number };
	padding: Padding;
	/** Size multiplier for dots and text */
	cex: number;
	title?: string;
	subtitle?: string;
}

/**
 * Options shared by the static and the interactive plot.
 */
export interface EmbedOptions extends Omit<ResolveOptions, "coordsLength"> {
	cex?: number;
	title?: string;
	/** Labels drawn instead of dots */
	text?: readonly string[];
	/** Use the same range on both axes */
	equalAxes?: boolean;
	/** Rotate the embedding onto its principal axes before drawing */
	pcAxes?: boolean;
	width?: number;
	height?: number;
	padding?: Partial<Padding>;
}

export interface PlotOptions extends EmbedOptions {
	subtitle?: string;
}

export interface AxisMargin {
	x: number;
	y: number;
}

export interface InteractiveOptions extends Omit<EmbedOptions, "limits" | "top"> {
	showLegend?: boolean;
	/** Hover text, one per point; the labels by default */
	tooltip?: readonly string[];
	/** Factor applied to the shared range of each axis when `equalAxes` is set */
	axisMargin?: AxisMargin;
}

export const DEFAULT_CEX = 1;
export const DEFAULT_POINT_RADIUS = 3;
export const DEFAULT_FONT_SIZE = 12;
/** Interactive marker diameter in pixels at `cex = 1` */
export const MARKER_SIZE = 6;
export const DEFAULT_AXIS_MARGIN: AxisMargin = { x: 1.15, y: 1 } as const;
export const DEFAULT_DIMENSIONS = { width: 800, height: 500 } as const;
export const DEFAULT_PADDING: Padding = {
	top: 40,
	right: 30,
	bottom: 60,
	left: 70,
} as const;

export interface InteractivePoint {
	index: number;
	x: number;
	y: number;
	/** Group the point belongs to in the legend */
	label: string | null;
	/** Value behind a continuous color scale */
	value?: number;
	tooltip: string;
	text?: string;
}

export type ColorEncoding =
	| { type: "nominal"; domain: string[]; range: string[] }
	| { type: "quantitative"; range: string[] };

export interface InteractiveSpec {
	mode: EmbedMode;
	points: InteractivePoint[];
	color: ColorEncoding;
	showLegend: boolean;
	axes: { x: AxisSpec; y: AxisSpec };
	dimensions: { width: number; height: number };
	padding: Padding;
	cex: number;
	title?: string;
}
