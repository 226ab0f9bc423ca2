import type { PlainMapping } from '@tessera/protocol';

/**
 * Read side of a Field Store.
 *
 * Paths are dotted (`profile.bio`) and address nested plain objects.
 */
export interface ReadonlyFieldStore {
  /**
   * Read the value at a path, or `defaultValue` when nothing is stored there.
   */
  get(path: string, defaultValue?: unknown): unknown;

  has(path: string): boolean;

  /**
   * Deep copy of everything stored.
   */
  toPlainMapping(): PlainMapping;
}

/**
 * Generic path-addressable key/value container backing delegated fields
 * and undeclared entity data.
 */
export interface FieldStore extends ReadonlyFieldStore {
  set(path: string, value: unknown): void;

  /**
   * @returns Whether a value was removed
   */
  delete(path: string): boolean;

  /**
   * Replace the whole contents with a copy of `mapping`.
   */
  loadFromPlainMapping(mapping: PlainMapping): void;
}
