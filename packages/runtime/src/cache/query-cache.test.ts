// Tests for the QUERY result cache and stable keys

import { describe, it, expect } from 'vitest';
import { QueryResultCache } from './query-cache.js';
import { stableKey } from './keys.js';

describe('stableKey', () => {
  it('ignores object key order', () => {
    expect(stableKey({ b: 1, a: { d: 2, c: 3 } })).toBe(stableKey({ a: { c: 3, d: 2 }, b: 1 }));
  });

  it('distinguishes values JSON would conflate', () => {
    expect(stableKey(undefined)).not.toBe(stableKey(null));
    expect(stableKey(new Map([['a', 1]]))).not.toBe(stableKey({}));
    expect(stableKey([1, 2])).not.toBe(stableKey([2, 1]));
  });

  it('gives non-finite numbers and negative zero their own keys', () => {
    const keys = [null, NaN, Infinity, -Infinity, 0, -0].map((x) => stableKey({ x }));

    expect(keys).toEqual(['{"x":null}', '{"x":NaN}', '{"x":Infinity}', '{"x":-Infinity}', '{"x":0}', '{"x":-0}']);
  });

  it('refuses to key class instances and functions', () => {
    class Point {
      constructor(readonly x: number) {}
    }

    expect(stableKey({ at: new Point(1) })).toBeNull();
    expect(stableKey([() => 1])).toBeNull();
    expect(stableKey(new Map([['a', Symbol('s')]]))).toBeNull();
  });

  it('writes dates as ISO strings', () => {
    expect(stableKey(new Date('2024-01-01T00:00:00.000Z'))).toBe('date:2024-01-01T00:00:00.000Z');
  });
});

describe('QueryResultCache', () => {
  it('serves a stored result for equal params', () => {
    const cache = new QueryResultCache(10);
    cache.store('e1', 'summary', { a: 1, b: 2 }, 'result');

    expect(cache.lookup('e1', 'summary', { b: 2, a: 1 })).toEqual({ hit: true, value: 'result' });
    expect(cache.lookup('e1', 'summary', { a: 2 })).toEqual({ hit: false });
    expect(cache.lookup('e2', 'summary', { a: 1, b: 2 })).toEqual({ hit: false });
  });

  it('keeps results for NaN, Infinity and null params apart', () => {
    const cache = new QueryResultCache(10);
    cache.store('e1', 'echo', { x: null }, 'null');
    cache.store('e1', 'echo', { x: NaN }, 'NaN');
    cache.store('e1', 'echo', { x: Infinity }, 'Infinity');

    const results = [null, NaN, Infinity].map((x) => cache.lookup('e1', 'echo', { x }));

    expect(results).toEqual([
      { hit: true, value: 'null' },
      { hit: true, value: 'NaN' },
      { hit: true, value: 'Infinity' },
    ]);
  });

  it('never caches params it cannot key', () => {
    class Filter {}
    const cache = new QueryResultCache(10);
    cache.store('e1', 'find', { filter: new Filter() }, 'first');

    expect(cache.lookup('e1', 'find', { filter: new Filter() })).toEqual({ hit: false });
    expect(cache.stats().size).toBe(0);
  });

  it('caches undefined results too', () => {
    const cache = new QueryResultCache(10);
    cache.store('e1', 'nothing', {}, undefined);
    expect(cache.lookup('e1', 'nothing', {})).toEqual({ hit: true, value: undefined });
  });

  it('invalidates only the given entity', () => {
    const cache = new QueryResultCache(10);
    cache.store('e1', 'a', {}, 1);
    cache.store('e1', 'b', {}, 2);
    cache.store('e2', 'a', {}, 3);

    expect(cache.invalidateEntity('e1')).toBe(2);

    expect(cache.lookup('e1', 'a', {})).toEqual({ hit: false });
    expect(cache.lookup('e2', 'a', {})).toEqual({ hit: true, value: 3 });
    expect(cache.invalidateEntity('e1')).toBe(0);
  });

  it('forgets evicted entries in its entity index', () => {
    const cache = new QueryResultCache(1);
    cache.store('e1', 'a', {}, 1);
    cache.store('e2', 'a', {}, 2);

    expect(cache.invalidateEntity('e1')).toBe(0);
    expect(cache.stats().evictions).toBe(1);
  });
});
