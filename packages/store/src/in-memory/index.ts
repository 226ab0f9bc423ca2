// In-memory Field Store
//
// Holds entity data as one nested plain object. Objects are copied on the
// way in and on the way out, so no caller holds a reference into the store.

import type { PlainMapping } from '@tessera/protocol';
import type { FieldStore, ReadonlyFieldStore } from '../interfaces/index.js';
import { deleteAtPath, getAtPath, parsePath, setAtPath } from '../paths.js';

function copyOf(value: unknown): unknown {
  return typeof value === 'object' && value !== null ? structuredClone(value) : value;
}

/**
 * Field Store backed by a nested plain object.
 */
export class NestedFieldStore implements FieldStore {
  private data: PlainMapping;

  constructor(initial: PlainMapping = {}) {
    this.data = structuredClone(initial);
  }

  get(path: string, defaultValue?: unknown): unknown {
    const lookup = getAtPath(this.data, parsePath(path));
    return lookup.found ? copyOf(lookup.value) : defaultValue;
  }

  has(path: string): boolean {
    return getAtPath(this.data, parsePath(path)).found;
  }

  set(path: string, value: unknown): void {
    setAtPath(this.data, parsePath(path), copyOf(value));
  }

  delete(path: string): boolean {
    return deleteAtPath(this.data, parsePath(path));
  }

  toPlainMapping(): PlainMapping {
    return structuredClone(this.data);
  }

  loadFromPlainMapping(mapping: PlainMapping): void {
    this.data = structuredClone(mapping);
  }
}

/**
 * Create an empty (or pre-filled) Field Store.
 */
export function createFieldStore(initial?: PlainMapping): FieldStore {
  return new NestedFieldStore(initial);
}

/**
 * Wrap a store in a view that exposes only its read methods.
 *
 * @example
 * ```typescript
 * const view = readonlyView(store);
 * view.get('profile.bio');
 * view.set('x', 1); // compile error
 * ```
 */
export function readonlyView(source: ReadonlyFieldStore): ReadonlyFieldStore {
  return Object.freeze({
    get: (path: string, defaultValue?: unknown) => source.get(path, defaultValue),
    has: (path: string) => source.has(path),
    toPlainMapping: () => source.toPlainMapping(),
  });
}
