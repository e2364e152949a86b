export { isFactorish } from "./factorish.ts";
export { fromInterpolator, type PaletteGenerator, rainbow } from "./generators.ts";
export {
	type ColorValue,
	parseColor,
	SYSTEM_PALETTE,
	toCssColor,
	toHex,
} from "./parse.ts";
export { isColor, isColorColumn } from "./predicate.ts";
export { colorRamp, sampleInterpolator } from "./ramp.ts";
