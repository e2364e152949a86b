/* PALETTE CATALOG
/*-----------------------------------------------------
/* Read-only registry of named palettes, grouped by catalog.
/* Each entry knows its native size and how to produce colors.
/* ==================================================== */

import { toHex } from "../color/parse.ts";
import { sampleInterpolator } from "../color/ramp.ts";
import {
	InvalidOperationError,
	UnknownCatalogError,
	UnknownPaletteError,
} from "../errors/index.ts";

/**
 * How a palette produces colors:
 * - continuous: sampled from a color function, any count
 * - discrete: a fixed list, the first n are taken
 * - dynamic: a separate list per count, up to a maximum
 */
export type PaletteKind = "continuous" | "discrete" | "dynamic";

export interface PaletteEntry {
	readonly catalog: string;
	readonly name: string;
	readonly kind: PaletteKind;
	/** Largest count `query` supports; Infinity for continuous palettes */
	readonly maxColors: number;
	query(n: number): string[];
}

function checkCount(entry: { catalog: string; name: string; maxColors: number }, n: number): void {
	if (!Number.isInteger(n) || n < 0 || n > entry.maxColors) {
		throw new InvalidOperationError(
			"query",
			`cannot produce ${n} colors from '${entry.catalog}::${entry.name}'`,
			`request between 0 and ${entry.maxColors} colors`,
		);
	}
}

export function continuousPalette(
	catalog: string,
	name: string,
	interpolate: (t: number) => string,
): PaletteEntry {
	const entry = { catalog, name, maxColors: Number.POSITIVE_INFINITY };
	return {
		...entry,
		kind: "continuous",
		query(n) {
			checkCount(entry, n);
			return sampleInterpolator(interpolate, n);
		},
	};
}

export function discretePalette(
	catalog: string,
	name: string,
	colors: readonly string[],
): PaletteEntry {
	const hex = colors.map((c) => toHex(c));
	const entry = { catalog, name, maxColors: hex.length };
	return {
		...entry,
		kind: "discrete",
		query(n) {
			checkCount(entry, n);
			return hex.slice(0, n);
		},
	};
}

/**
 * A palette with one list per size, as sequential and diverging ColorBrewer
 * schemes are published: `schemes[k]` holds `k` colors. Counts below the
 * smallest size take a prefix of the smallest list.
 */
export function dynamicPalette(
	catalog: string,
	name: string,
	schemes: readonly (readonly string[] | undefined)[],
): PaletteEntry {
	const bySize = new Map<number, string[]>();
	for (let k = 0; k < schemes.length; k++) {
		const colors = schemes[k];
		if (colors && colors.length === k && k > 0) {
			bySize.set(k, colors.map((c) => toHex(c)));
		}
	}
	const sizes = [...bySize.keys()].sort((a, b) => a - b);
	const smallest = sizes[0] ?? 0;
	const entry = { catalog, name, maxColors: sizes[sizes.length - 1] ?? 0 };

	return {
		...entry,
		kind: "dynamic",
		query(n) {
			checkCount(entry, n);
			const exact = bySize.get(n);
			if (exact) return [...exact];
			if (n < smallest) return (bySize.get(smallest) ?? []).slice(0, n);
			// gaps between published sizes fall back to the next larger list
			const larger = sizes.find((size) => size > n);
			return (larger === undefined ? [] : (bySize.get(larger) ?? [])).slice(0, n);
		},
	};
}

/**
 * Immutable palette registry. Build it once and share it.
 *
 * @example
 * ```ts
 * const catalog = new PaletteCatalog([discretePalette("brand", "main", ["#123456", "#abcdef"])]);
 * catalog.lookup("brand", "main").query(2);
 * ```
 */
export class PaletteCatalog {
	private readonly catalogsByName = new Map<string, Map<string, PaletteEntry>>();

	constructor(entries: Iterable<PaletteEntry>) {
		for (const entry of entries) {
			let palettes = this.catalogsByName.get(entry.catalog);
			if (!palettes) {
				palettes = new Map();
				this.catalogsByName.set(entry.catalog, palettes);
			}
			palettes.set(entry.name, entry);
		}
	}

	/**
	 * @throws UnknownCatalogError when the catalog is not registered
	 * @throws UnknownPaletteError when the catalog has no such palette
	 */
	lookup(catalog: string, name: string): PaletteEntry {
		const palettes = this.catalogsByName.get(catalog);
		if (!palettes) {
			throw new UnknownCatalogError(catalog, this.catalogs());
		}
		const entry = palettes.get(name);
		if (!entry) {
			throw new UnknownPaletteError(catalog, name);
		}
		return entry;
	}

	has(catalog: string, name?: string): boolean {
		const palettes = this.catalogsByName.get(catalog);
		if (!palettes) return false;
		return name === undefined || palettes.has(name);
	}

	catalogs(): string[] {
		return [...this.catalogsByName.keys()];
	}

	/**
	 * @throws UnknownCatalogError when the catalog is not registered
	 */
	palettes(catalog: string): string[] {
		const palettes = this.catalogsByName.get(catalog);
		if (!palettes) {
			throw new UnknownCatalogError(catalog, this.catalogs());
		}
		return [...palettes.keys()];
	}

	/**
	 * Returns a new catalog with `entries` added; same-named entries replace
	 * existing ones.
	 */
	extend(entries: Iterable<PaletteEntry>): PaletteCatalog {
		return new PaletteCatalog([...this.entries(), ...entries]);
	}

	*entries(): IterableIterator<PaletteEntry> {
		for (const palettes of this.catalogsByName.values()) {
			yield* palettes.values();
		}
	}
}
