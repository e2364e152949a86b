import { describe, expect, it } from "vitest";
import {
	colorRamp,
	isColor,
	isColorColumn,
	isFactorish,
	parseColor,
	rainbow,
	SYSTEM_PALETTE,
	toCssColor,
	toHex,
} from "../src/color/index.ts";
import { bool, category, float64, string } from "../src/core/column.ts";
import { InvalidPaletteSizeError, ParseError } from "../src/errors/index.ts";

/* PARSING
/*----------------------------------------------------- */

describe("parseColor", () => {
	it("should parse names and hex strings", () => {
		const red = parseColor("red");
		expect(red.ok && red.data.formatHex()).toBe("#ff0000");

		const hex = parseColor("#1f77b4");
		expect(hex.ok && hex.data.formatHex()).toBe("#1f77b4");
	});

	it("should treat missing values as transparent", () => {
		const result = parseColor(null);
		expect(result.ok && result.data.opacity).toBe(0);
	});

	it("should index the system table with numbers and digit strings", () => {
		const two = parseColor(2);
		expect(two.ok && two.data.formatHex()).toBe(SYSTEM_PALETTE[1]);

		const wrapped = parseColor("9");
		expect(wrapped.ok && wrapped.data.formatHex()).toBe(SYSTEM_PALETTE[0]);

		const zero = parseColor(0);
		expect(zero.ok && zero.data.opacity).toBe(0);
	});

	it("should return a ParseError instead of throwing", () => {
		const result = parseColor("not-a-color");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ParseError);
			expect(result.error.message).toBe("parse error");
		}
	});

	it("should reject negative indices", () => {
		expect(parseColor(-1).ok).toBe(false);
	});
});

describe("toCssColor", () => {
	it("should pass names through and expand indices", () => {
		expect(toCssColor("steelblue")).toBe("steelblue");
		expect(toCssColor(3)).toBe("#61d04f");
		expect(toCssColor("1")).toBe("#000000");
	});

	it("should return null for things that must not be drawn", () => {
		expect(toCssColor(null)).toBeNull();
		expect(toCssColor(0)).toBeNull();
		expect(toCssColor("#00000000")).toBeNull();
		expect(toCssColor("nope")).toBeNull();
	});
});

describe("toHex", () => {
	it("should normalize to lowercase six-digit hex", () => {
		expect(toHex("#ABC")).toBe("#aabbcc");
		expect(toHex("rgb(255, 0, 0)")).toBe("#ff0000");
	});

	it("should throw on invalid colors", () => {
		expect(() => toHex("nope")).toThrow(ParseError);
	});
});

/* PREDICATES
/*----------------------------------------------------- */

describe("isColor", () => {
	it("should accept names, hex, numbers and missing values", () => {
		expect(isColor("red")).toBe(true);
		expect(isColor("#ff000080")).toBe(true);
		expect(isColor(5)).toBe(true);
		expect(isColor("12")).toBe(true);
		expect(isColor(null)).toBe(true);
	});

	it("should reject other text", () => {
		expect(isColor("setosa")).toBe(false);
		expect(isColor("")).toBe(false);
	});
});

describe("isColorColumn", () => {
	it("should accept text columns made only of colors", () => {
		expect(isColorColumn(string(["red", "#00ff00", null]))).toBe(true);
	});

	it("should reject a column with one non-color", () => {
		expect(isColorColumn(string(["red", "setosa"]))).toBe(false);
	});

	it("should never treat numeric or boolean columns as colors", () => {
		expect(isColorColumn(float64([1, 2, 3]))).toBe(false);
		expect(isColorColumn(bool([true, false]))).toBe(false);
	});

	it("should check the values of a factor", () => {
		expect(isColorColumn(category(["red", "blue", "red"]))).toBe(true);
		expect(isColorColumn(category(["red", "setosa"]))).toBe(false);
	});

	it("should ignore levels no value uses", () => {
		expect(isColorColumn(category(["red"], ["red", "setosa"]))).toBe(true);
	});
});

describe("isFactorish", () => {
	it("should need more than one distinct value", () => {
		expect(isFactorish(string(["a", "a", "a"]))).toBe(false);
	});

	it("should need fewer distinct values than observations", () => {
		expect(isFactorish(string(["a", "b", "c"]))).toBe(false);
	});

	it("should accept repeated categories", () => {
		expect(isFactorish(string(["a", "a", "b"]))).toBe(true);
	});

	it("should only consider text columns", () => {
		expect(isFactorish(float64([1, 1, 2]))).toBe(false);
		expect(isFactorish(category(["a", "a", "b"]))).toBe(false);
	});
});

/* RAMPS AND GENERATORS
/*----------------------------------------------------- */

describe("colorRamp", () => {
	it("should keep both ends and blend in between", () => {
		expect(colorRamp(["#ff0000", "#0000ff"], 3)).toEqual(["#ff0000", "#800080", "#0000ff"]);
	});

	it("should pass through every stop when sampling at the stops", () => {
		expect(colorRamp(["black", "#808080", "white"], 3)).toEqual([
			"#000000",
			"#808080",
			"#ffffff",
		]);
	});

	it("should return the first stop for a single sample", () => {
		expect(colorRamp(["#ff0000", "#0000ff"], 1)).toEqual(["#ff0000"]);
	});

	it("should return nothing for zero samples", () => {
		expect(colorRamp(["#ff0000", "#0000ff"], 0)).toEqual([]);
	});

	it("should fill with a lone stop", () => {
		expect(colorRamp(["red"], 2)).toEqual(["#ff0000", "#ff0000"]);
	});

	it("should throw without stops", () => {
		expect(() => colorRamp([], 2)).toThrow(InvalidPaletteSizeError);
	});
});

describe("rainbow", () => {
	it("should space hues evenly from red", () => {
		expect(rainbow(3)).toEqual(["#ff0000", "#00ff00", "#0000ff"]);
		expect(rainbow(2)).toEqual(["#ff0000", "#00ffff"]);
	});

	it("should return exactly n colors", () => {
		expect(rainbow(0)).toEqual([]);
		expect(rainbow(15)).toHaveLength(15);
	});
});
