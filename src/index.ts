export { ResultCache, createResultCache } from './cache.js';
export type { BatchOperation, CacheStats, Operation } from './cache.js';
export { cacheConfigSchema, errorExpirationDecisionSchema, evictorPeriodSchema, resolveConfig } from './config.js';
export type { CacheConfig, ErrorExpirationDecision, ErrorExpirationPolicy, ResolvedCacheConfig } from './config.js';
export { CacheEntry, entryState, fulfilled, rejected } from './entry.js';
export type { EntryState, Outcome } from './entry.js';
export { runEvictor } from './evictor.js';
export type { Evictable } from './evictor.js';
export { normalizeKey } from './keys.js';
export { BatchOperationError, CacheConfigError, MAX_KEY_LENGTH, selectByIndices } from './lib.js';
export type { CacheLogger } from './lib.js';
