/* PALETTE RESOLUTION
/*-----------------------------------------------------
/* Produce exactly k colors from any color scheme,
/* interpolating past a palette's native size.
/* ==================================================== */

import { colorRamp } from "../color/ramp.ts";
import { InvalidOperationError } from "../errors/index.ts";
import { defaultCatalog } from "./builtin.ts";
import type { PaletteCatalog } from "./catalog.ts";
import { type ColorSchemeInput, toColorScheme } from "./scheme.ts";

export interface PaletteOptions {
	/** Catalog for `"<catalog>::<palette>"` names; the built-in one by default */
	catalog?: PaletteCatalog;
	/** Log a notice when colors have to be interpolated */
	verbose?: boolean;
}

function interpolationNotice(k: number, verbose: boolean | undefined): void {
	if (verbose) {
		console.info(`Interpolating palette for ${k} colors`);
	}
}

/**
 * Returns `k` colors from `scheme`.
 *
 * - generator: called with `k`, output used as is
 * - explicit palette: always a continuous ramp through the given colors
 * - catalog name: queried directly up to its native size, interpolated beyond
 *
 * @example
 * ```ts
 * resolvePalette(["#ff0000", "#0000ff"], 3); // ["#ff0000", "#800080", "#0000ff"]
 * resolvePalette("brewer::Dark2", 12, { verbose: true }); // interpolates from 8
 * ```
 */
export function resolvePalette(
	scheme: ColorSchemeInput,
	k: number,
	options: PaletteOptions = {},
): string[] {
	if (!Number.isInteger(k) || k < 0) {
		throw new InvalidOperationError(
			"resolvePalette",
			`cannot produce ${k} colors`,
			"the color count must be a non-negative integer",
		);
	}

	const resolved = toColorScheme(scheme);
	switch (resolved.kind) {
		case "generator":
			return [...resolved.generate(k)];
		case "palette":
			if (k > resolved.colors.length) interpolationNotice(k, options.verbose);
			return colorRamp(resolved.colors, k);
		case "named": {
			const catalog = options.catalog ?? defaultCatalog();
			const entry = catalog.lookup(resolved.catalog, resolved.palette);
			if (k <= entry.maxColors) {
				return entry.query(k);
			}
			interpolationNotice(k, options.verbose);
			return colorRamp(entry.query(entry.maxColors), k);
		}
	}
}
