/**
 * Hueplot - color resolution and plotting for 2D embeddings
 *
 * Main entry point for the library.
 */

// Re-export data model
export {
	bool,
	category,
	type Column,
	type ColumnInput,
	float64,
	string,
	toColumn,
} from "./core/column.ts";
export { DataFrame, formatDataFrame } from "./core/dataframe/index.ts";
export { Factor, MISSING_CODE } from "./core/factor.ts";
export type { DTypeKind } from "./core/types/index.ts";

// Re-export colors
export {
	type ColorValue,
	colorRamp,
	fromInterpolator,
	isColor,
	isColorColumn,
	isFactorish,
	type PaletteGenerator,
	parseColor,
	rainbow,
	SYSTEM_PALETTE,
	toCssColor,
	toHex,
} from "./color/index.ts";

// Re-export palettes
export {
	type ColorScheme,
	type ColorSchemeInput,
	defaultCatalog,
	generator,
	named,
	PaletteCatalog,
	type PaletteEntry,
	type PaletteKind,
	type PaletteOptions,
	palette,
	resolvePalette,
} from "./palette/index.ts";

// Re-export classification
export {
	type ClassifyOptions,
	type ColorResolution,
	type ColorVector,
	classifyColumn,
	classifyTable,
	DEFAULT_COLOR_SCHEME,
	DEFAULT_NUM_COLORS,
	factorToColors,
	type Limits,
	numericToColors,
	type ResolveOptions,
	resolveColors,
	type TableColoring,
} from "./classify/index.ts";

// Re-export geometry
export {
	type Coordinates,
	type CoordinatesInput,
	coordinateRange,
	pcRotate,
	type Point,
	toCoordinates,
} from "./geometry/index.ts";

// Re-export plotting
export {
	DEFAULT_AXIS_MARGIN,
	DEFAULT_CEX,
	type EmbedSpec,
	embedInteractive,
	embedPlot,
	type InteractiveOptions,
	InteractiveResult,
	type PlotOptions,
	PlotResult,
} from "./plot/index.ts";

// Re-export errors
export {
	ColumnNotFoundError,
	HueplotError,
	InvalidOperationError,
	InvalidPaletteSizeError,
	MalformedPaletteSpecError,
	ParseError,
	SchemaError,
	UnknownCatalogError,
	UnknownPaletteError,
} from "./errors/index.ts";

export { err, ok, type Result } from "./types/result.ts";
