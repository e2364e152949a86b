import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { category } from "../src/core/column.ts";
import { DataFrame } from "../src/core/dataframe/index.ts";
import { SchemaError } from "../src/errors/index.ts";
import { buildEmbedSpec } from "../src/plot/charts/scatter.ts";
import { embedPlot } from "../src/plot/plot.ts";
import { computeDomain, computeNiceTicks, linearScale } from "../src/plot/scales.ts";
import { renderSvg } from "../src/plot/svg.ts";

/* SCALES
/*----------------------------------------------------- */

describe("linearScale", () => {
	it("should map domain values to range values", () => {
		const scale = linearScale([0, 100], [0, 500]);
		expect(scale(0)).toBe(0);
		expect(scale(50)).toBe(250);
		expect(scale(100)).toBe(500);
	});

	it("should handle inverted ranges (top=height, bottom=0)", () => {
		const scale = linearScale([0, 100], [400, 0]);
		expect(scale(0)).toBe(400);
		expect(scale(100)).toBe(0);
	});

	it("should return midpoint when domain span is zero", () => {
		expect(linearScale([5, 5], [0, 100])(5)).toBe(50);
	});

	it("should preserve domain and range on the function object", () => {
		const scale = linearScale([10, 20], [100, 200]);
		expect(scale.domain).toEqual([10, 20]);
		expect(scale.range).toEqual([100, 200]);
	});
});

describe("computeNiceTicks", () => {
	it("should snap to round steps", () => {
		expect(computeNiceTicks(0, 100, 5)).toEqual([0, 20, 40, 60, 80, 100]);
	});

	it("should return single tick for equal min/max", () => {
		expect(computeNiceTicks(42, 42, 5)).toEqual([42]);
	});
});

describe("computeDomain", () => {
	it("should return [0, 1] without finite values", () => {
		expect(computeDomain([])).toEqual([0, 1]);
		expect(computeDomain([Number.NaN])).toEqual([0, 1]);
	});

	it("should widen single-value domains in both directions", () => {
		expect(computeDomain([5])).toEqual([4.5, 5.5]);
		expect(computeDomain([-10])).toEqual([-11, -9]);
		expect(computeDomain([0])).toEqual([0, 1]);
	});

	it("should extend to nice ticks by default", () => {
		expect(computeDomain([3, 97])).toEqual([0, 100]);
		expect(computeDomain([1, Number.NaN, 3], false)).toEqual([1, 3]);
	});
});

/* SPEC BUILDER
/*----------------------------------------------------- */

describe("buildEmbedSpec", () => {
	const coords = [
		[0, 0],
		[1, 2],
	] as const;

	it("should pair each point with its color", () => {
		const spec = buildEmbedSpec(coords, ["red", null]);
		expect(spec.mode).toBe("points");
		expect(spec.points).toEqual([
			{ index: 0, x: 0, y: 0, color: "red" },
			{ index: 1, x: 1, y: 2, color: null },
		]);
		expect(spec.axes.x.label).toBe("X");
		expect(spec.axes.y.label).toBe("Y");
		expect(spec.cex).toBe(1);
	});

	it("should share the joint range on equal axes", () => {
		const spec = buildEmbedSpec(coords, ["red", "blue"], { equalAxes: true });
		expect(spec.axes.x.domain).toEqual([0, 2]);
		expect(spec.axes.y.domain).toEqual([0, 2]);
	});

	it("should switch to text when labels are given", () => {
		const spec = buildEmbedSpec(coords, ["red", "blue"], { text: ["a", "b"] });
		expect(spec.mode).toBe("text");
		expect(spec.points.map((p) => p.label)).toEqual(["a", "b"]);
	});

	it("should reject labels that do not match the points", () => {
		expect(() => buildEmbedSpec(coords, ["red", "blue"], { text: ["a"] })).toThrow(SchemaError);
	});

	it("should apply dimensions and padding overrides", () => {
		const spec = buildEmbedSpec(coords, ["red", "blue"], { width: 400, padding: { top: 10 } });
		expect(spec.dimensions).toEqual({ width: 400, height: 500 });
		expect(spec.padding).toEqual({ top: 10, right: 30, bottom: 60, left: 70 });
	});
});

/* SVG RENDERER
/*----------------------------------------------------- */

describe("renderSvg", () => {
	const coords = [
		[0, 0],
		[1, 1],
		[2, 2],
	] as const;

	it("should skip points without a color", () => {
		const svg = renderSvg(buildEmbedSpec(coords, ["red", null, "2"]));
		expect(svg.match(/<circle /g)?.length).toBe(2);
		expect(svg).toContain('fill="red"');
		expect(svg).toContain('fill="#df536b"');
	});

	it("should scale dots by cex", () => {
		const svg = renderSvg(buildEmbedSpec(coords, ["red", "red", "red"], { cex: 2 }));
		expect(svg).toContain('r="6"');
	});

	it("should draw escaped text labels instead of dots", () => {
		const svg = renderSvg(
			buildEmbedSpec(coords, ["red", "red", "red"], { text: ["a", "<b>", "c"] }),
		);
		expect(svg).not.toContain("<circle");
		expect(svg).toContain(">&lt;b&gt;</text>");
	});

	it("should include title, subtitle and axis labels", () => {
		const svg = renderSvg(
			buildEmbedSpec(coords, ["red", "red", "red"], { title: "PCA", subtitle: "first two" }),
		);
		expect(svg.startsWith("<svg")).toBe(true);
		expect(svg.endsWith("</svg>")).toBe(true);
		expect(svg).toContain(">PCA</text>");
		expect(svg).toContain(">first two</text>");
		expect(svg).toContain(">X</text>");
		expect(svg).toContain(">Y</text>");
	});
});

/* EMBED PLOT
/*----------------------------------------------------- */

describe("embedPlot", () => {
	const coords = [
		[1, 1],
		[2, 2],
		[3, 3],
	];

	it("should color points from a table", () => {
		const frame = DataFrame.fromColumns({ group: category(["a", "b", "a"]) });
		const spec = embedPlot(coords, { x: frame }).toJSON();
		expect(spec.points.map((p) => p.color)).toEqual(["#ff0000", "#00ffff", "#ff0000"]);
	});

	it("should give each point its own color without data", () => {
		const spec = embedPlot({ coords }).toJSON();
		expect(spec.points.map((p) => p.color)).toEqual(["#ff0000", "#00ff00", "#0000ff"]);
	});

	it("should prefer explicit colors", () => {
		const spec = embedPlot(coords, { colors: ["red", "red", "blue"], x: [1, 2, 3] }).toJSON();
		expect(spec.points.map((p) => p.color)).toEqual(["red", "red", "blue"]);
	});

	it("should rotate onto principal axes", () => {
		const spec = embedPlot(coords, { pcAxes: true }).toJSON();
		expect(spec.points[0]?.x).toBeCloseTo(-Math.SQRT2);
		expect(spec.points[2]?.x).toBeCloseTo(Math.SQRT2);
	});

	describe("toFile", () => {
		let dir: string;

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), "hueplot-plot-"));
		});

		afterEach(() => {
			rmSync(dir, { recursive: true, force: true });
		});

		it("should write SVG to disk", async () => {
			const path = join(dir, "embedding.svg");
			await embedPlot(coords, { title: "FileTest" }).toFile(path);
			const content = readFileSync(path, "utf8");
			expect(content.startsWith("<svg")).toBe(true);
			expect(content).toContain("FileTest");
		});
	});
});
