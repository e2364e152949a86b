export { defaultCatalog, loadPaletteFile, parsePaletteData } from "./builtin.ts";
export {
	continuousPalette,
	discretePalette,
	dynamicPalette,
	PaletteCatalog,
	type PaletteEntry,
	type PaletteKind,
} from "./catalog.ts";
export { type PaletteOptions, resolvePalette } from "./resolve.ts";
export {
	type ColorScheme,
	type ColorSchemeInput,
	type ExplicitScheme,
	type GeneratorScheme,
	generator,
	type NamedScheme,
	named,
	palette,
	QUALIFIED_SEPARATOR,
	toColorScheme,
} from "./scheme.ts";
