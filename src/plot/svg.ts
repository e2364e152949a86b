/* SVG RENDERER
/*-----------------------------------------------------
/* Zero-dep SVG string renderer.
/* Takes an EmbedSpec and returns a complete SVG string.
/* ==================================================== */

import { toCssColor } from "../color/parse.ts";
import { computeNiceTicks, type LinearScale, linearScale } from "./scales.ts";
import {
	DEFAULT_FONT_SIZE,
	DEFAULT_POINT_RADIUS,
	type EmbedPoint,
	type EmbedSpec,
} from "./types.ts";

const FONT_FAMILY = "system-ui, -apple-system, sans-serif";
const FONT_SIZE_LABEL = 12;
const FONT_SIZE_TITLE = 16;
const FONT_SIZE_SUBTITLE = 12;
const FONT_SIZE_TICK = 10;
const AXIS_COLOR = "#333";
const TEXT_COLOR = "#333";

export function renderSvg(spec: EmbedSpec): string {
	const { dimensions, padding } = spec;
	const plotWidth = dimensions.width - padding.left - padding.right;
	const plotHeight = dimensions.height - padding.top - padding.bottom;

	const parts: string[] = [];
	parts.push(svgOpen(dimensions.width, dimensions.height));

	if (spec.title) {
		parts.push(renderTitle(spec.title, dimensions.width, padding.top));
	}

	const xScale = linearScale(spec.axes.x.domain ?? [0, 1], [0, plotWidth]);
	const yScale = linearScale(spec.axes.y.domain ?? [0, 1], [plotHeight, 0]);

	parts.push(`<g transform="translate(${padding.left},${padding.top})">`);

	if (spec.subtitle) {
		parts.push(renderSubtitle(spec.subtitle, plotWidth));
	}

	const drawn =
		spec.mode === "text"
			? renderLabels(spec.points, xScale, yScale, spec.cex)
			: renderPoints(spec.points, xScale, yScale, spec.cex);
	if (drawn) parts.push(drawn);

	// Axes
	parts.push(renderXAxis(xScale, plotHeight, spec.axes.x.label));
	parts.push(renderYAxis(yScale, plotHeight, spec.axes.y.label));

	parts.push("</g>");
	parts.push("</svg>");
	return parts.join("\n");
}

function svgOpen(width: number, height: number): string {
	return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}" font-family="${FONT_FAMILY}">`;
}

function renderTitle(
	title: string,
	totalWidth: number,
	paddingTop: number,
): string {
	const x = totalWidth / 2;
	const y = paddingTop / 2;
	return `<text x="${x}" y="${y}" text-anchor="middle" font-size="${FONT_SIZE_TITLE}" font-weight="600" fill="${TEXT_COLOR}">${escapeXml(title)}</text>`;
}

// Subtitle sits in the top margin of the plot area
function renderSubtitle(subtitle: string, plotWidth: number): string {
	return `<text x="${plotWidth / 2}" y="-6" text-anchor="middle" font-size="${FONT_SIZE_SUBTITLE}" fill="${TEXT_COLOR}">${escapeXml(subtitle)}</text>`;
}

// --- Data renderers ---

function renderPoints(
	points: EmbedPoint[],
	xScale: LinearScale,
	yScale: LinearScale,
	cex: number,
): string {
	const radius = DEFAULT_POINT_RADIUS * cex;
	const parts: string[] = [];
	for (const p of points) {
		const fill = toCssColor(p.color);
		if (fill === null || !Number.isFinite(p.x) || !Number.isFinite(p.y)) continue;
		parts.push(
			`<circle cx="${xScale(p.x)}" cy="${yScale(p.y)}" r="${radius}" fill="${escapeXml(fill)}"/>`,
		);
	}
	return parts.join("\n");
}

function renderLabels(
	points: EmbedPoint[],
	xScale: LinearScale,
	yScale: LinearScale,
	cex: number,
): string {
	const fontSize = DEFAULT_FONT_SIZE * cex;
	const parts: string[] = [];
	for (const p of points) {
		const fill = toCssColor(p.color);
		if (fill === null || p.label === undefined) continue;
		if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) continue;
		parts.push(
			`<text x="${xScale(p.x)}" y="${yScale(p.y)}" text-anchor="middle" dominant-baseline="middle" font-size="${fontSize}" fill="${escapeXml(fill)}">${escapeXml(p.label)}</text>`,
		);
	}
	return parts.join("\n");
}

// --- Axes ---

function renderXAxis(
	xScale: LinearScale,
	plotHeight: number,
	label?: string,
): string {
	const parts: string[] = [];
	// Axis line
	const xEnd = xScale.range[1];
	parts.push(
		`<line x1="0" y1="${plotHeight}" x2="${xEnd}" y2="${plotHeight}" stroke="${AXIS_COLOR}" stroke-width="1"/>`,
	);

	const ticks = computeNiceTicks(xScale.domain[0], xScale.domain[1], 5);
	for (const tick of ticks) {
		const x = xScale(tick);
		if (x < 0 || x > xEnd) continue;
		parts.push(
			`<line x1="${x}" y1="${plotHeight}" x2="${x}" y2="${plotHeight + 5}" stroke="${AXIS_COLOR}"/>`,
		);
		parts.push(
			`<text x="${x}" y="${plotHeight + 18}" text-anchor="middle" font-size="${FONT_SIZE_TICK}" fill="${TEXT_COLOR}">${formatTickValue(tick)}</text>`,
		);
	}

	if (label) {
		const midX = (xScale.range[0] + xScale.range[1]) / 2;
		parts.push(
			`<text x="${midX}" y="${plotHeight + 45}" text-anchor="middle" font-size="${FONT_SIZE_LABEL}" fill="${TEXT_COLOR}">${escapeXml(label)}</text>`,
		);
	}

	return parts.join("\n");
}

function renderYAxis(
	yScale: LinearScale,
	plotHeight: number,
	label?: string,
): string {
	const parts: string[] = [];
	// Axis line
	parts.push(
		`<line x1="0" y1="0" x2="0" y2="${plotHeight}" stroke="${AXIS_COLOR}" stroke-width="1"/>`,
	);

	const ticks = computeNiceTicks(yScale.domain[0], yScale.domain[1], 5);
	for (const tick of ticks) {
		const y = yScale(tick);
		if (y >= 0 && y <= plotHeight) {
			parts.push(
				`<line x1="-5" y1="${y}" x2="0" y2="${y}" stroke="${AXIS_COLOR}"/>`,
			);
			parts.push(
				`<text x="-10" y="${y + 4}" text-anchor="end" font-size="${FONT_SIZE_TICK}" fill="${TEXT_COLOR}">${formatTickValue(tick)}</text>`,
			);
		}
	}

	if (label) {
		const midY = plotHeight / 2;
		parts.push(
			`<text x="${-50}" y="${midY}" text-anchor="middle" font-size="${FONT_SIZE_LABEL}" fill="${TEXT_COLOR}" transform="rotate(-90, -50, ${midY})">${escapeXml(label)}</text>`,
		);
	}

	return parts.join("\n");
}

// --- Helpers ---

function formatTickValue(value: number): string {
	if (Math.abs(value) >= 1_000_000) return `${(value / 1_000_000).toFixed(1)}M`;
	if (Math.abs(value) >= 1_000) return `${(value / 1_000).toFixed(1)}k`;
	if (Number.isInteger(value)) return String(value);
	return value.toFixed(2);
}

function escapeXml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;");
}
