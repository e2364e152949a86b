/**
 * DataFrame module.
 * Provides the ordered, named column table the classifiers search.
 */

export { DataFrame } from './dataframe';
export { formatDataFrame } from './display';
