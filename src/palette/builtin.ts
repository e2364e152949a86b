/* BUILT-IN PALETTES
/*-----------------------------------------------------
/* The default catalog: d3-scale-chromatic schemes plus the
/* discrete palettes listed in data/palettes.json.
/* ==================================================== */

import { readFileSync } from "node:fs";
import {
	interpolateCividis,
	interpolateCool,
	interpolateCubehelixDefault,
	interpolateInferno,
	interpolateMagma,
	interpolatePlasma,
	interpolateRainbow,
	interpolateSinebow,
	interpolateTurbo,
	interpolateViridis,
	interpolateWarm,
	schemeAccent,
	schemeBlues,
	schemeBrBG,
	schemeBuGn,
	schemeBuPu,
	schemeCategory10,
	schemeDark2,
	schemeGnBu,
	schemeGreens,
	schemeGreys,
	schemeOranges,
	schemeOrRd,
	schemePaired,
	schemePastel1,
	schemePastel2,
	schemePiYG,
	schemePRGn,
	schemePuBu,
	schemePuBuGn,
	schemePuOr,
	schemePuRd,
	schemePurples,
	schemeRdBu,
	schemeRdGy,
	schemeRdPu,
	schemeRdYlBu,
	schemeRdYlGn,
	schemeReds,
	schemeSet1,
	schemeSet2,
	schemeSet3,
	schemeSpectral,
	schemeTableau10,
	schemeYlGn,
	schemeYlGnBu,
	schemeYlOrBr,
	schemeYlOrRd,
} from "d3-scale-chromatic";
import { parseColor } from "../color/parse.ts";
import { SchemaError } from "../errors/index.ts";
import {
	continuousPalette,
	discretePalette,
	dynamicPalette,
	PaletteCatalog,
	type PaletteEntry,
} from "./catalog.ts";

const PALETTE_FILE = new URL("../../data/palettes.json", import.meta.url);

const BREWER_QUALITATIVE = {
	Accent: schemeAccent,
	Dark2: schemeDark2,
	Paired: schemePaired,
	Pastel1: schemePastel1,
	Pastel2: schemePastel2,
	Set1: schemeSet1,
	Set2: schemeSet2,
	Set3: schemeSet3,
};

const BREWER_SCALED = {
	Blues: schemeBlues,
	Greens: schemeGreens,
	Greys: schemeGreys,
	Oranges: schemeOranges,
	Purples: schemePurples,
	Reds: schemeReds,
	BuGn: schemeBuGn,
	BuPu: schemeBuPu,
	GnBu: schemeGnBu,
	OrRd: schemeOrRd,
	PuBu: schemePuBu,
	PuBuGn: schemePuBuGn,
	PuRd: schemePuRd,
	RdPu: schemeRdPu,
	YlGn: schemeYlGn,
	YlGnBu: schemeYlGnBu,
	YlOrBr: schemeYlOrBr,
	YlOrRd: schemeYlOrRd,
	BrBG: schemeBrBG,
	PRGn: schemePRGn,
	PiYG: schemePiYG,
	PuOr: schemePuOr,
	RdBu: schemeRdBu,
	RdGy: schemeRdGy,
	RdYlBu: schemeRdYlBu,
	RdYlGn: schemeRdYlGn,
	Spectral: schemeSpectral,
};

const VIRIDIS = {
	viridis: interpolateViridis,
	magma: interpolateMagma,
	inferno: interpolateInferno,
	plasma: interpolatePlasma,
	cividis: interpolateCividis,
	turbo: interpolateTurbo,
};

const D3_CONTINUOUS = {
	rainbow: interpolateRainbow,
	sinebow: interpolateSinebow,
	warm: interpolateWarm,
	cool: interpolateCool,
	cubehelix: interpolateCubehelixDefault,
};

function* chromaticEntries(): Generator<PaletteEntry> {
	yield discretePalette("d3", "category10", schemeCategory10);
	yield discretePalette("d3", "tableau10", schemeTableau10);
	for (const [name, interpolate] of Object.entries(D3_CONTINUOUS)) {
		yield continuousPalette("d3", name, interpolate);
	}
	for (const [name, colors] of Object.entries(BREWER_QUALITATIVE)) {
		yield discretePalette("brewer", name, colors);
	}
	for (const [name, schemes] of Object.entries(BREWER_SCALED)) {
		yield dynamicPalette("brewer", name, schemes);
	}
	for (const [name, interpolate] of Object.entries(VIRIDIS)) {
		yield continuousPalette("viridis", name, interpolate);
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses palette JSON of the form `{ catalog: { palette: [colors] } }` into
 * discrete entries.
 * @throws SchemaError when the document does not have that shape
 */
export function parsePaletteData(data: unknown, source = "palette data"): PaletteEntry[] {
	if (!isRecord(data)) {
		throw new SchemaError(`${source} must be an object of catalogs`);
	}

	const entries: PaletteEntry[] = [];
	for (const [catalog, palettes] of Object.entries(data)) {
		if (!isRecord(palettes)) {
			throw new SchemaError(`${source}: catalog '${catalog}' must be an object of palettes`);
		}
		for (const [name, colors] of Object.entries(palettes)) {
			if (!Array.isArray(colors) || colors.length === 0) {
				throw new SchemaError(
					`${source}: palette '${catalog}::${name}' must be a non-empty array of colors`,
				);
			}
			const checked: string[] = [];
			for (const c of colors) {
				if (typeof c !== "string" || !parseColor(c).ok) {
					throw new SchemaError(
						`${source}: palette '${catalog}::${name}' has invalid color ${JSON.stringify(c)}`,
					);
				}
				checked.push(c);
			}
			entries.push(discretePalette(catalog, name, checked));
		}
	}
	return entries;
}

/**
 * Reads a palette JSON file (see `parsePaletteData`).
 */
export function loadPaletteFile(path: string | URL): PaletteEntry[] {
	const text = readFileSync(path, "utf8");
	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (error) {
		throw new SchemaError(
			`${String(path)} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
		);
	}
	return parsePaletteData(data, String(path));
}

let shared: PaletteCatalog | undefined;

/**
 * The built-in catalog, built on first use and shared afterwards.
 */
export function defaultCatalog(): PaletteCatalog {
	if (!shared) {
		shared = new PaletteCatalog([...chromaticEntries(), ...loadPaletteFile(PALETTE_FILE)]);
	}
	return shared;
}
