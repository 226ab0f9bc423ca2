// Tests for the LRU cache

import { describe, it, expect, vi } from 'vitest';
import { LruCache } from './lru.js';

describe('LruCache', () => {
  it('evicts the least recently used entry', () => {
    const onEvict = vi.fn();
    const cache = new LruCache<string, number>({ maxSize: 2, onEvict });

    cache.put('a', 1);
    cache.put('b', 2);
    cache.get('a');
    cache.put('c', 3);

    expect(cache.keys()).toEqual(['a', 'c']);
    expect(onEvict).toHaveBeenCalledTimes(1);
    expect(onEvict).toHaveBeenCalledWith('b', 2);
  });

  it('counts hits, misses and evictions', () => {
    const cache = new LruCache<string, number>({ maxSize: 2 });
    cache.put('a', 1);
    cache.put('b', 2);
    cache.put('c', 3);

    expect(cache.get('c')).toBe(3);
    expect(cache.get('a')).toBeUndefined();

    expect(cache.stats()).toEqual({
      size: 2,
      maxSize: 2,
      hits: 1,
      misses: 1,
      hitRate: 0.5,
      evictions: 1,
    });
  });

  it('reports a zero hit rate before any lookup', () => {
    expect(new LruCache<string, number>({ maxSize: 1 }).stats().hitRate).toBe(0);
  });

  it('peek leaves recency and counters alone', () => {
    const cache = new LruCache<string, number>({ maxSize: 2 });
    cache.put('a', 1);
    cache.put('b', 2);

    expect(cache.peek('a')).toBe(1);
    cache.put('c', 3);

    expect(cache.has('a')).toBe(false);
    expect(cache.stats().hits).toBe(0);
  });

  it('put on an existing key replaces the value and refreshes recency', () => {
    const cache = new LruCache<string, number>({ maxSize: 2 });
    cache.put('a', 1);
    cache.put('b', 2);
    cache.put('a', 10);
    cache.put('c', 3);

    expect(cache.keys()).toEqual(['a', 'c']);
    expect(cache.peek('a')).toBe(10);
  });

  it('delete and clear remove entries', () => {
    const cache = new LruCache<string, number>({ maxSize: 3 });
    cache.put('a', 1);
    cache.put('b', 2);

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);
    cache.clear();

    expect(cache.size).toBe(0);
  });

  it('rejects a non-positive bound', () => {
    expect(() => new LruCache({ maxSize: 0 })).toThrow(RangeError);
  });
});
