import { describe, expect, it, vi } from "vitest";
import {
	bool,
	category,
	columnText,
	float64,
	inferColumn,
	string,
	toColumn,
} from "../src/core/column.ts";
import { DataFrame } from "../src/core/dataframe/index.ts";
import { Factor, MISSING_CODE } from "../src/core/factor.ts";
import {
	ColumnNotFoundError,
	HueplotError,
	MalformedPaletteSpecError,
	SchemaError,
	UnknownPaletteError,
	stackLocation,
} from "../src/errors/index.ts";

/* FACTOR
/*----------------------------------------------------- */

describe("Factor", () => {
	it("should sort inferred levels", () => {
		const factor = Factor.from(["b", "a", null, "b"]);
		expect(factor.levels).toEqual(["a", "b"]);
		expect(Array.from(factor.codes)).toEqual([1, 0, MISSING_CODE, 1]);
		expect(factor.toArray()).toEqual(["b", "a", null, "b"]);
	});

	it("should sort inferred levels by code unit", () => {
		expect(Factor.from(["a", "B", "b", "A"]).levels).toEqual(["A", "B", "a", "b"]);
	});

	it("should keep declared levels and drop unknown values", () => {
		const factor = Factor.from(["low", "high", "mid"], ["low", "high"]);
		expect(factor.levels).toEqual(["low", "high"]);
		expect(factor.toArray()).toEqual(["low", "high", null]);
		expect(factor.nlevels).toBe(2);
	});

	it("should reject duplicate levels", () => {
		expect(() => Factor.from(["a"], ["a", "a"])).toThrow(SchemaError);
	});

	it("should build from codes", () => {
		const factor = Factor.fromCodes([0, -1, 1], ["x", "y"]);
		expect([...factor]).toEqual(["x", null, "y"]);
		expect(() => Factor.fromCodes([2], ["x", "y"])).toThrow(SchemaError);
	});
});

/* COLUMNS
/*----------------------------------------------------- */

describe("inferColumn", () => {
	it("should infer numbers, booleans and text", () => {
		expect(inferColumn([1, null, 3]).dtype).toBe("float64");
		expect(inferColumn([true, undefined]).dtype).toBe("bool");
		expect(inferColumn([1, "a"]).dtype).toBe("string");
		expect(inferColumn([null, null]).dtype).toBe("string");
	});

	it("should store missing numbers as NaN", () => {
		const column = inferColumn([1, null]);
		expect(column.dtype === "float64" && Number.isNaN(column.values[1] ?? 0)).toBe(true);
	});
});

describe("toColumn", () => {
	it("should wrap factors and typed arrays", () => {
		expect(toColumn(Factor.from(["a"])).dtype).toBe("category");
		expect(toColumn(new Float64Array([1])).dtype).toBe("float64");
	});

	it("should pass columns through", () => {
		const column = string(["a"]);
		expect(toColumn(column)).toBe(column);
	});
});

describe("columnText", () => {
	it("should render every dtype as text", () => {
		expect(columnText(float64([1.5, Number.NaN]))).toEqual(["1.5", null]);
		expect(columnText(bool([true, null]))).toEqual(["true", null]);
		expect(columnText(category(["a", null]))).toEqual(["a", null]);
		expect(columnText(string(["a", null]))).toEqual(["a", null]);
	});
});

/* DATAFRAME
/*----------------------------------------------------- */

describe("DataFrame", () => {
	it("should keep column order", () => {
		const df = DataFrame.fromColumns({ b: [1, 2], a: ["x", "y"] });
		expect(df.columnNames).toEqual(["b", "a"]);
		expect(df.shape).toEqual([2, 2]);
		expect([...df.entries()].map(([name, column]) => [name, column.dtype])).toEqual([
			["b", "float64"],
			["a", "string"],
		]);
	});

	it("should reject columns of different lengths", () => {
		expect(() => DataFrame.fromColumns({ a: [1, 2], b: [1] })).toThrow(SchemaError);
	});

	it("should build from records", () => {
		const df = DataFrame.fromRecords([
			{ name: "a", size: 1 },
			{ name: "b", size: 2 },
		]);
		expect(df.height).toBe(2);
		expect(df.column("size").dtype).toBe("float64");
		expect(DataFrame.fromRecords([]).width).toBe(0);
	});

	it("should throw ColumnNotFoundError for missing columns", () => {
		const df = DataFrame.fromColumns({ a: [1] });
		expect(() => df.column("b")).toThrow(ColumnNotFoundError);
	});

	it("should append new columns and replace existing ones in place", () => {
		const df = DataFrame.fromColumns({ a: [1, 2], b: [3, 4] });
		expect(df.withColumn("c", ["x", "y"]).columnNames).toEqual(["a", "b", "c"]);
		const replaced = df.withColumn("a", category(["x", "y"]));
		expect(replaced.columnNames).toEqual(["a", "b"]);
		expect(replaced.column("a").dtype).toBe("category");
		expect(() => df.withColumn("c", [1])).toThrow(SchemaError);
	});

	it("should format as a table", () => {
		const df = DataFrame.fromColumns({ g: category(["a", null]), n: [1.5, 2] });
		expect(df.toString().split("\n")).toEqual([
			"shape: (2, 2)",
			"┌──────────┬─────────┐",
			"│        g │       n │",
			"│ category │ float64 │",
			"├──────────┼─────────┤",
			"│        a │     1.5 │",
			"│     null │       2 │",
			"└──────────┴─────────┘",
		]);
	});

	it("should print the table to the console", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		const df = DataFrame.fromColumns({ n: [1] });
		df.print();
		expect(log).toHaveBeenCalledWith(df.toString());
		log.mockRestore();
	});
});

/* ERRORS
/*----------------------------------------------------- */

describe("HueplotError", () => {
	it("should be the base of every error", () => {
		const error = new UnknownPaletteError("brewer", "Nope");
		expect(error).toBeInstanceOf(HueplotError);
		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe("UnknownPaletteError");
	});

	it("should format expression and detail", () => {
		const lines = new UnknownPaletteError("brewer", "Nope").format().split("\n");
		expect(lines[1]).toBe("  --> catalog.lookup('brewer', 'Nope')");
		expect(lines[3]).toBe("   └── unknown palette 'Nope' for catalog 'brewer'");
	});

	it("should append the hint", () => {
		const formatted = new MalformedPaletteSpecError("Dark2").format();
		expect(formatted.split("\n").at(-1)).toBe(
			"help: use the format '<catalog>::<palette>', e.g. 'brewer::Dark2'",
		);
	});

	it("should list available columns", () => {
		expect(new ColumnNotFoundError("c", ["a", "b"]).hint).toBe("available columns are: 'a', 'b'");
	});

	it("should locate the first frame past the error constructors", () => {
		const stack = [
			"SchemaError: bad rows",
			"    at new HueplotError (/lib/src/errors/base.ts:40:5)",
			"    at new SchemaError (/lib/src/errors/schema-error.ts:8:5)",
			"    at render (/app/src/ui/ErrorPanel.ts:12:7)",
		].join("\n");
		expect(stackLocation(stack)).toEqual({ file: "/app/src/ui/ErrorPanel.ts", line: 12, column: 7 });
	});

	it("should skip dependency frames", () => {
		const stack = [
			"Error: x",
			"    at run (/app/node_modules/lib/index.js:1:1)",
			"    at /app/main.ts:3:9",
		].join("\n");
		expect(stackLocation(stack)).toEqual({ file: "/app/main.ts", line: 3, column: 9 });
	});
});
