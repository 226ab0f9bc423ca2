// QUERY result cache
//
// Holds results of QUERY actions keyed by entity id, action name and params.
// Every entry is indexed by its entity so a mutation can drop exactly that
// entity's results.

import type { Id } from '@tessera/protocol';
import type { RuntimeLogger } from '../logger.js';
import { LruCache, type CacheStats } from './lru.js';
import { stableKey } from './keys.js';

export type QueryLookup = { hit: true; value: unknown } | { hit: false };

export class QueryResultCache {
  private readonly cache: LruCache<string, { result: unknown }>;
  private readonly ownerOf = new Map<string, Id>();
  private readonly keysByEntity = new Map<Id, Set<string>>();

  constructor(maxSize: number, logger?: RuntimeLogger) {
    this.cache = new LruCache({
      maxSize,
      onEvict: (key) => {
        this.unindex(key);
        logger?.debug('Query cache eviction', { key });
      },
    });
  }

  lookup(entityId: Id, action: string, params: Record<string, unknown>): QueryLookup {
    const key = this.keyFor(entityId, action, params);
    if (key === null) return { hit: false };
    const entry = this.cache.get(key);
    return entry ? { hit: true, value: entry.result } : { hit: false };
  }

  store(entityId: Id, action: string, params: Record<string, unknown>, value: unknown): void {
    const key = this.keyFor(entityId, action, params);
    if (key === null) return;
    this.ownerOf.set(key, entityId);
    let keys = this.keysByEntity.get(entityId);
    if (!keys) {
      keys = new Set();
      this.keysByEntity.set(entityId, keys);
    }
    keys.add(key);
    this.cache.put(key, { result: value });
  }

  /**
   * Drop every cached result for one entity.
   *
   * @returns Number of entries removed
   */
  invalidateEntity(entityId: Id): number {
    const keys = this.keysByEntity.get(entityId);
    if (!keys) return 0;
    for (const key of keys) {
      this.cache.delete(key);
      this.ownerOf.delete(key);
    }
    this.keysByEntity.delete(entityId);
    return keys.size;
  }

  clear(): void {
    this.cache.clear();
    this.ownerOf.clear();
    this.keysByEntity.clear();
  }

  stats(): CacheStats {
    return this.cache.stats();
  }

  /** Null for params that cannot be keyed; those calls bypass the cache */
  private keyFor(entityId: Id, action: string, params: Record<string, unknown>): string | null {
    const paramsKey = stableKey(params);
    return paramsKey === null ? null : `${entityId}\u0000${action}\u0000${paramsKey}`;
  }

  private unindex(key: string): void {
    const owner = this.ownerOf.get(key);
    if (owner === undefined) return;
    this.ownerOf.delete(key);
    const keys = this.keysByEntity.get(owner);
    keys?.delete(key);
    if (keys && keys.size === 0) {
      this.keysByEntity.delete(owner);
    }
  }
}
