// Dotted-path helpers for nested plain objects.

/**
 * Raised when a path is malformed or walks through a non-object value.
 */
export class StorePathError extends Error {
  readonly code = 'STORE_PATH_ERROR';

  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`Invalid store path "${path}": ${reason}`);
    this.name = 'StorePathError';
  }
}

export type PathLookup = { found: true; value: unknown } | { found: false };

/**
 * Whether a value is a plain object (not an array, Date, Map, class instance, ...).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Split a dotted path into segments.
 *
 * @example
 * ```typescript
 * parsePath('profile.bio'); // => ['profile', 'bio']
 * ```
 */
export function parsePath(path: string): string[] {
  if (path.length === 0) {
    throw new StorePathError(path, 'path is empty');
  }
  const segments = path.split('.');
  if (segments.some((segment) => segment.length === 0)) {
    throw new StorePathError(path, 'path has an empty segment');
  }
  return segments;
}

export function getAtPath(root: Record<string, unknown>, segments: readonly string[]): PathLookup {
  let current: unknown = root;
  for (const segment of segments) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) {
      return { found: false };
    }
    current = current[segment];
  }
  return { found: true, value: current };
}

/**
 * Write a value, creating intermediate objects as needed.
 */
export function setAtPath(
  root: Record<string, unknown>,
  segments: readonly string[],
  value: unknown
): void {
  let current = root;
  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i];
    const next = current[segment];
    if (next === undefined) {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    } else if (isPlainObject(next)) {
      current = next;
    } else {
      throw new StorePathError(
        segments.join('.'),
        `"${segments.slice(0, i + 1).join('.')}" is not an object`
      );
    }
  }
  current[segments[segments.length - 1]] = value;
}

/**
 * Remove the value at a path.
 *
 * @returns Whether anything was removed
 */
export function deleteAtPath(root: Record<string, unknown>, segments: readonly string[]): boolean {
  const parent = getAtPath(root, segments.slice(0, -1));
  if (!parent.found || !isPlainObject(parent.value)) {
    return false;
  }
  const leaf = segments[segments.length - 1];
  if (!Object.hasOwn(parent.value, leaf)) {
    return false;
  }
  delete parent.value[leaf];
  return true;
}
