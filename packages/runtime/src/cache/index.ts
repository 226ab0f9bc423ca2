export { LruCache } from './lru.js';
export type { CacheStats, LruCacheOptions } from './lru.js';
export { QueryResultCache } from './query-cache.js';
export type { QueryLookup } from './query-cache.js';
export { stableKey } from './keys.js';
