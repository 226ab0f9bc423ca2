// Bounded least-recently-used cache with hit/miss counters.

export type CacheStats = {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 before the first lookup */
  hitRate: number;
  evictions: number;
};

export type LruCacheOptions<K, V> = {
  maxSize: number;
  /** Called for every entry dropped to make room */
  onEvict?: (key: K, value: V) => void;
};

/**
 * Map-backed LRU cache. Map iteration order is insertion order, so the first
 * key is always the least recently used one.
 *
 * @example
 * ```typescript
 * const cache = new LruCache<string, number>({ maxSize: 2 });
 * cache.put('a', 1);
 * cache.put('b', 2);
 * cache.get('a');
 * cache.put('c', 3); // evicts 'b'
 * ```
 */
export class LruCache<K, V> {
  private readonly entries = new Map<K, { value: V }>();
  private readonly maxSize: number;
  private readonly onEvict?: (key: K, value: V) => void;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: LruCacheOptions<K, V>) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new RangeError(`LruCache maxSize must be a positive integer, got ${options.maxSize}`);
    }
    this.maxSize = options.maxSize;
    this.onEvict = options.onEvict;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Read an entry and mark it most recently used.
   */
  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  /**
   * Read an entry without touching recency or counters.
   */
  peek(key: K): V | undefined {
    return this.entries.get(key)?.value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  put(key: K, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { value });

    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.entries().next();
      if (oldest.done) break;
      const [evictedKey, evicted] = oldest.value;
      this.entries.delete(evictedKey);
      this.evictions++;
      this.onEvict?.(evictedKey, evicted.value);
    }
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop every entry. Counters are kept.
   */
  clear(): void {
    this.entries.clear();
  }

  /**
   * Keys from least to most recently used.
   */
  keys(): K[] {
    return [...this.entries.keys()];
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
      evictions: this.evictions,
    };
  }
}
