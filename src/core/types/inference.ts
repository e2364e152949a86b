import type { Factor } from '../factor';
import type { DTypeKind } from './dtype';

/**
 * Maps a DType kind to its underlying storage type.
 */
export type StorageType<T extends DTypeKind> = T extends 'float64'
  ? Float64Array
  : T extends 'string'
    ? readonly (string | null)[]
    : T extends 'bool'
      ? readonly (boolean | null)[]
      : T extends 'category'
        ? Factor
        : never;
