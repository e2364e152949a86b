/* COLOR SCHEMES
/*-----------------------------------------------------
/* Tagged union describing where palette colors come from,
/* and normalization of the loose forms callers pass in.
/* ==================================================== */

import type { PaletteGenerator } from "../color/generators.ts";
import { parseColor } from "../color/parse.ts";
import {
	InvalidPaletteSizeError,
	MalformedPaletteSpecError,
} from "../errors/index.ts";

export interface GeneratorScheme {
	readonly kind: "generator";
	readonly generate: PaletteGenerator;
}

export interface ExplicitScheme {
	readonly kind: "palette";
	readonly colors: readonly string[];
}

export interface NamedScheme {
	readonly kind: "named";
	readonly catalog: string;
	readonly palette: string;
}

export type ColorScheme = GeneratorScheme | ExplicitScheme | NamedScheme;

/**
 * Everything accepted where a color scheme is expected: a scheme, a
 * generator function, a list of at least two colors, or a
 * `"<catalog>::<palette>"` name.
 */
export type ColorSchemeInput = ColorScheme | PaletteGenerator | readonly string[] | string;

export const QUALIFIED_SEPARATOR = "::";

export function generator(generate: PaletteGenerator): GeneratorScheme {
	return { kind: "generator", generate };
}

/**
 * @throws InvalidPaletteSizeError with fewer than two colors
 * @throws ParseError when an entry is not a color
 */
export function palette(colors: readonly string[]): ExplicitScheme {
	if (colors.length < 2) throw new InvalidPaletteSizeError(colors.length);
	for (const c of colors) {
		const parsed = parseColor(c);
		if (!parsed.ok) throw parsed.error;
	}
	return { kind: "palette", colors: [...colors] };
}

/**
 * Parses `"<catalog>::<palette>"`.
 * @throws MalformedPaletteSpecError unless there are exactly two non-empty segments
 */
export function named(name: string): NamedScheme {
	const segments = name.split(QUALIFIED_SEPARATOR);
	const [catalog, paletteName] = segments;
	if (segments.length !== 2 || !catalog || !paletteName) {
		throw new MalformedPaletteSpecError(name);
	}
	return { kind: "named", catalog, palette: paletteName };
}

function isColorScheme(input: ColorSchemeInput): input is ColorScheme {
	return typeof input === "object" && !Array.isArray(input);
}

/**
 * Normalizes and validates a scheme given in any accepted form.
 */
export function toColorScheme(input: ColorSchemeInput): ColorScheme {
	if (typeof input === "function") return generator(input);
	if (typeof input === "string") return named(input);
	if (isColorScheme(input)) {
		switch (input.kind) {
			case "generator":
				return input;
			case "palette":
				return palette(input.colors);
			case "named":
				return named(`${input.catalog}${QUALIFIED_SEPARATOR}${input.palette}`);
		}
	}
	return palette(input);
}
