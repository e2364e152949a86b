export { classifyColumn } from "./column.ts";
export { factorToColors } from "./factor.ts";
export { numericToColors } from "./numeric.ts";
export { type ResolveOptions, resolveColors } from "./resolve.ts";
export { classifyTable } from "./table.ts";
export {
	type ClassifyOptions,
	type ColorResolution,
	type ColorVector,
	DEFAULT_COLOR_SCHEME,
	DEFAULT_NUM_COLORS,
	type Limits,
	type TableColoring,
} from "./types.ts";
