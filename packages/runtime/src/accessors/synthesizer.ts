// Accessor Synthesizer
//
// Turns a class's field table into one accessor per field, each bound to a
// storage strategy. Runs once per class; instances only carry the backing
// (slot array + Field Store) the accessors read and write.

import { evaluateField } from '@tessera/protocol';
import type { FieldIssue, FieldSpec } from '@tessera/protocol';
import type { FieldStore } from '@tessera/store';
import { ValidationError } from '../errors.js';
import { storageKindFor, type FieldStrategy, type ResolvedPolicy } from './policy.js';

/** Marks a slot that was never written */
const UNSET: unique symbol = Symbol('unset');

/**
 * Per-instance storage the accessors operate on.
 */
export type FieldBacking = {
  readonly slots: unknown[];
  readonly store: FieldStore;
};

export type FieldAccessor = {
  readonly field: FieldSpec;
  readonly strategy: FieldStrategy;
  /** Stored value, or the field default when nothing is stored */
  get(backing: FieldBacking): unknown;
  /** Validate (when enabled) and store */
  set(backing: FieldBacking, value: unknown): void;
  /** Store without validation, for trusted data */
  load(backing: FieldBacking, value: unknown): void;
  /** Remove the stored value so the default shows through */
  clear(backing: FieldBacking): void;
  isSet(backing: FieldBacking): boolean;
};

export type AccessorSet = {
  readonly entityType: string;
  readonly policy: ResolvedPolicy;
  readonly slotCount: number;
  readonly accessors: readonly FieldAccessor[];
  get(name: string): FieldAccessor | undefined;
  /** Fresh backing sized for this set */
  createBacking(store: FieldStore): FieldBacking;
};

export type SynthesizeOptions = {
  entityType: string;
  /** When false, set() never calls the evaluator */
  validate: boolean;
};

/**
 * Build the ValidationError for a failed field check.
 */
export function fieldValidationError(
  entityType: string,
  field: FieldSpec,
  issue: FieldIssue,
  details?: Record<string, unknown>
): ValidationError {
  const message = issue.required
    ? `Field "${issue.field}" of ${entityType} is required`
    : `Invalid value for field "${issue.field}" of ${entityType}: ${issue.detail}`;

  return new ValidationError(message, {
    field: issue.field,
    value: issue.value,
    constraints: field.constraints,
    required: issue.required,
    details,
  });
}

function copyOf(value: unknown): unknown {
  return typeof value === 'object' && value !== null ? structuredClone(value) : value;
}

function defaultOf(field: FieldSpec): unknown {
  // the class default is shared; hand out copies
  return copyOf(field.defaultValue);
}

function storeFailure(entityType: string, field: FieldSpec, value: unknown, error: unknown): ValidationError {
  const reason = error instanceof Error ? error.message : String(error);
  return new ValidationError(`Cannot store field "${field.name}" of ${entityType}: ${reason}`, {
    field: field.name,
    value,
    cause: error,
  });
}

function directAccessor(
  entityType: string,
  field: FieldSpec,
  slot: number,
  check: (value: unknown) => void
): FieldAccessor {
  const write = (backing: FieldBacking, value: unknown) => {
    try {
      backing.slots[slot] = copyOf(value);
    } catch (error) {
      throw storeFailure(entityType, field, value, error);
    }
  };

  return {
    field,
    strategy: { kind: 'direct', slot },

    // slots hold private copies; objects never leave or enter by reference
    get(backing) {
      const value = backing.slots[slot];
      return value === UNSET ? defaultOf(field) : copyOf(value);
    },

    set(backing, value) {
      check(value);
      write(backing, value);
    },

    load: write,

    clear(backing) {
      backing.slots[slot] = UNSET;
    },

    isSet(backing) {
      return backing.slots[slot] !== UNSET;
    },
  };
}

function delegatedAccessor(
  entityType: string,
  field: FieldSpec,
  check: (value: unknown) => void
): FieldAccessor {
  const path = field.name;

  const write = (backing: FieldBacking, value: unknown) => {
    try {
      backing.store.set(path, value);
    } catch (error) {
      throw storeFailure(entityType, field, value, error);
    }
  };

  return {
    field,
    strategy: { kind: 'delegated', path },

    get(backing) {
      return backing.store.has(path) ? backing.store.get(path) : defaultOf(field);
    },

    set(backing, value) {
      check(value);
      write(backing, value);
    },

    load: write,

    clear(backing) {
      try {
        backing.store.delete(path);
      } catch (error) {
        throw storeFailure(entityType, field, undefined, error);
      }
    },

    isSet(backing) {
      return backing.store.has(path);
    },
  };
}

/**
 * Synthesize accessors for a field table under a resolved policy.
 *
 * @example
 * ```typescript
 * const set = synthesize(fieldTable, 'mixed', { entityType: 'user', validate: true });
 * set.get('username')?.strategy; // { kind: 'direct', slot: 0 }
 * ```
 */
export function synthesize(
  fieldTable: readonly FieldSpec[],
  policy: ResolvedPolicy,
  options: SynthesizeOptions
): AccessorSet {
  const { entityType, validate } = options;
  const byName = new Map<string, FieldAccessor>();
  const accessors: FieldAccessor[] = [];
  let slotCount = 0;

  for (const field of fieldTable) {
    const check = (value: unknown) => {
      if (!validate) return;
      const issue = evaluateField(field, value);
      if (issue) throw fieldValidationError(entityType, field, issue);
    };

    const accessor =
      storageKindFor(field, policy) === 'direct'
        ? directAccessor(entityType, field, slotCount++, check)
        : delegatedAccessor(entityType, field, check);

    accessors.push(accessor);
    byName.set(field.name, accessor);
  }

  return {
    entityType,
    policy,
    slotCount,
    accessors,
    get: (name) => byName.get(name),
    createBacking: (store) => ({
      slots: new Array<unknown>(slotCount).fill(UNSET),
      store,
    }),
  };
}
