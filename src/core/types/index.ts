export type { DTypeKind } from './dtype';
export type { StorageType } from './inference';
