// Public API barrel for the selector-walk/store subpath.

export { Link } from './types.js';
export type { DataValue, DataMap, BlockSource, BlockStore, StoredBlock } from './types.js';
export { MemoryBlockStore } from './memory-store.js';
export { PostgresBlockStore } from './postgres-store.js';
export type { BlockStoreConfig } from './postgres-store.js';
export { encodeBlock, decodeBlock, cidOf } from './codec.js';
