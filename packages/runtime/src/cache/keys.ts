import { isPlainObject } from '@tessera/store';

function numberKey(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '-Infinity';
  if (Object.is(value, -0)) return '-0';
  return String(value);
}

function joinKeys(parts: readonly (string | null)[]): string | null {
  const keys: string[] = [];
  for (const part of parts) {
    if (part === null) return null;
    keys.push(part);
  }
  return keys.join(',');
}

/**
 * Serialize a value so that equal params always give the same key,
 * whatever order their object keys were written in.
 *
 * @returns null when the value holds something with no stable identity
 * (class instances, functions, symbols); such params are never cached
 *
 * @example
 * ```typescript
 * stableKey({ b: 1, a: [true] }) === stableKey({ a: [true], b: 1 }); // true
 * ```
 */
export function stableKey(value: unknown): string | null {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';

  switch (typeof value) {
    case 'number':
      return numberKey(value);
    case 'bigint':
      return `${value}n`;
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return String(value);
    case 'function':
    case 'symbol':
      return null;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'date:invalid' : `date:${value.toISOString()}`;
  }
  if (value instanceof Map) {
    const entries = stableKey([...value.entries()]);
    return entries === null ? null : `map:${entries}`;
  }
  if (value instanceof Set) {
    const values = stableKey([...value.values()]);
    return values === null ? null : `set:${values}`;
  }
  if (Array.isArray(value)) {
    const items = joinKeys(value.map(stableKey));
    return items === null ? null : `[${items}]`;
  }
  if (isPlainObject(value)) {
    const parts = joinKeys(
      Object.keys(value)
        .sort()
        .map((key) => {
          const entry = stableKey(value[key]);
          return entry === null ? null : `${JSON.stringify(key)}:${entry}`;
        })
    );
    return parts === null ? null : `{${parts}}`;
  }
  return null;
}
