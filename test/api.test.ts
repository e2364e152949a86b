import { describe, expect, it } from "vitest";
import {
	category,
	DataFrame,
	embedInteractive,
	embedPlot,
	resolveColors,
	resolvePalette,
} from "../src/index.ts";

describe("public API", () => {
	const frame = DataFrame.fromColumns({
		A: [1, 2, 3, 4],
		B: category(["x", "y", "x", "y"]),
		C: [5, 6, 7, 8],
	});
	const coords = [
		[0, 0],
		[1, 0],
		[0, 1],
		[1, 1],
	];

	it("should color a table by its factor", () => {
		const { colors, labels, source } = resolveColors({
			coordsLength: 4,
			x: frame,
			colorScheme: "brewer::Set1",
		});
		const [x, y] = resolvePalette("brewer::Set1", 2);
		expect(source).toBe("B");
		expect(colors).toEqual([x, y, x, y]);
		expect(labels?.levels).toEqual(["x", "y"]);
	});

	it("should draw the same colors in both renderers", () => {
		const plotted = embedPlot(coords, { x: frame }).toJSON();
		const interactive = embedInteractive(coords, { x: frame }).toJSON();
		expect(plotted.points.map((p) => p.color)).toEqual(["#ff0000", "#00ffff", "#ff0000", "#00ffff"]);
		expect(interactive.color).toEqual({
			type: "nominal",
			domain: ["x", "y"],
			range: ["#ff0000", "#00ffff"],
		});
	});
});
