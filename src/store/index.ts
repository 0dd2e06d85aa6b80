/**
 * Shared Store Module
 *
 * @module store
 */

export type { SharedStore, SharedStoreKind, IncrementResult, StoreConfig } from "./types.js";
export { StoreUnavailableError } from "./errors.js";
export { MemorySharedStore, globToRegExp } from "./memory-store.js";
export { RedisSharedStore } from "./redis-store.js";
export { createSharedStore } from "./store-factory.js";
