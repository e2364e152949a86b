/* COLOR PARSING
/*-----------------------------------------------------
/* Color-string parser backed by d3-color.
/* Numbers (and digit strings) index the system color table.
/* ==================================================== */

import { type RGBColor, color, rgb } from "d3-color";
import { ParseError } from "../errors/index.ts";
import { type Result, err, ok } from "../types/result.ts";

/** Any value that may denote a color */
export type ColorValue = string | number | null | undefined;

/**
 * Table that numeric colors index into, 1-based. Index 0 is the
 * background and renders as transparent.
 */
export const SYSTEM_PALETTE = [
	"#000000",
	"#df536b",
	"#61d04f",
	"#2297e6",
	"#28e2e5",
	"#cd0bbc",
	"#f5c710",
	"#9e9e9e",
] as const;

const DIGITS = /^\d+$/;

function transparent(): RGBColor {
	return rgb(0, 0, 0, 0);
}

function fromIndex(index: number): RGBColor {
	if (index === 0) return transparent();
	return rgb(SYSTEM_PALETTE[(index - 1) % SYSTEM_PALETTE.length] ?? SYSTEM_PALETTE[0]);
}

/**
 * Parses a color. Missing values parse as transparent.
 */
export function parseColor(value: ColorValue): Result<RGBColor, ParseError> {
	if (value === null || value === undefined) return ok(transparent());

	if (typeof value === "number") {
		if (!Number.isFinite(value) || value < 0) {
			return err(new ParseError("color", String(value), "color indices must be >= 0"));
		}
		return ok(fromIndex(Math.trunc(value)));
	}

	const text = value.trim();
	if (DIGITS.test(text)) return ok(fromIndex(Number.parseInt(text, 10)));

	const parsed = color(text);
	if (parsed === null) {
		return err(
			new ParseError("color", value, "use a color name or a hex string such as '#1f77b4'"),
		);
	}
	return ok(parsed.rgb());
}

/**
 * Converts a color value to something a renderer can paint, or null when
 * nothing should be drawn (missing, fully transparent or unparseable).
 * Color names and hex strings are passed through unchanged.
 */
export function toCssColor(value: ColorValue): string | null {
	if (value === null || value === undefined) return null;
	const parsed = parseColor(value);
	if (!parsed.ok || parsed.data.opacity === 0) return null;
	if (typeof value === "number" || DIGITS.test(value.trim())) {
		return parsed.data.formatHex();
	}
	return value;
}

/**
 * Normalizes a color to `#rrggbb`, dropping any alpha.
 * @throws ParseError when the value is not a color
 */
export function toHex(value: ColorValue): string {
	const parsed = parseColor(value);
	if (!parsed.ok) throw parsed.error;
	return parsed.data.formatHex();
}
