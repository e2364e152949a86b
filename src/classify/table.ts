/* TABLE CLASSIFIER
/*-----------------------------------------------------
/* Pick the column of a table that best explains the colors.
/* Each step takes the last matching column.
/* ==================================================== */

import { isFactorish } from "../color/factorish.ts";
import { isColorColumn } from "../color/predicate.ts";
import { type Column, columnText, type TypedColumn } from "../core/column.ts";
import type { DataFrame } from "../core/dataframe/index.ts";
import { Factor } from "../core/factor.ts";
import { resolvePalette } from "../palette/resolve.ts";
import { factorToColors } from "./factor.ts";
import {
	type ClassifyOptions,
	DEFAULT_COLOR_SCHEME,
	type TableColoring,
} from "./types.ts";

function lastColumn<C extends Column>(
	frame: DataFrame,
	predicate: (column: Column) => column is C,
): [string, C] | undefined;
function lastColumn(
	frame: DataFrame,
	predicate: (column: Column) => boolean,
): [string, Column] | undefined;
function lastColumn(
	frame: DataFrame,
	predicate: (column: Column) => boolean,
): [string, Column] | undefined {
	let found: [string, Column] | undefined;
	for (const entry of frame.entries()) {
		if (predicate(entry[1])) found = entry;
	}
	return found;
}

function isCategory(column: Column): column is TypedColumn<"category"> {
	return column.dtype === "category";
}

function isFactorishText(column: Column): column is TypedColumn<"string"> {
	return column.dtype === "string" && isFactorish(column);
}

function notice(verbose: boolean | undefined, message: string): void {
	if (verbose) console.info(message);
}

/**
 * Colors the rows of a table from one of its columns.
 *
 * 1. a column of colors is used as is
 * 2. otherwise a categorical column gets a color per level
 * 3. otherwise a text column that looks categorical is treated as one
 * 4. otherwise each row gets its own color
 *
 * Numeric columns are never picked. When the colors come from a categorical
 * column, `labels` holds its factor.
 */
export function classifyTable(frame: DataFrame, options: ClassifyOptions = {}): TableColoring {
	const scheme = options.colorScheme ?? DEFAULT_COLOR_SCHEME;

	const colorColumn = lastColumn(frame, isColorColumn);
	if (colorColumn) {
		const [name, column] = colorColumn;
		notice(options.verbose, `Found color column '${name}'`);
		return { colors: columnText(column), source: name };
	}

	const factorColumn = lastColumn(frame, isCategory);
	if (factorColumn) {
		const [name, column] = factorColumn;
		notice(options.verbose, `Found a factor '${name}' for mapping to colors`);
		return {
			colors: factorToColors(column.values, options),
			labels: column.values,
			source: name,
		};
	}

	const textColumn = lastColumn(frame, isFactorishText);
	if (textColumn) {
		const [name, column] = textColumn;
		notice(options.verbose, `Found a character column '${name}' for mapping to colors`);
		const labels = Factor.from(column.values);
		return { colors: factorToColors(labels, options), labels, source: name };
	}

	notice(options.verbose, "Using one color per point");
	return { colors: resolvePalette(scheme, frame.height, options) };
}
