// Accessor policy - decides where each field's value lives.
//
// direct:    every field gets a private slot
// delegated: every field lives in the entity's Field Store
// mixed:     hot fields get slots, the rest are delegated
// auto:      resolved per class on first instantiation (see StrategyResolver)

import type { AccessorPolicy, FieldSpec, StorageKind } from '@tessera/protocol';

export type ResolvedPolicy = Exclude<AccessorPolicy, 'auto'>;

/**
 * Where one field's value is stored.
 */
export type FieldStrategy =
  | { kind: 'direct'; slot: number }
  | { kind: 'delegated'; path: string };

/**
 * Field names read often enough to earn a slot under the mixed policy.
 * Matched case-insensitively.
 */
export const HOT_FIELD_NAMES: ReadonlySet<string> = new Set([
  'id',
  'name',
  'username',
  'email',
  'status',
  'active',
]);

export function isHotField(name: string): boolean {
  return HOT_FIELD_NAMES.has(name.toLowerCase());
}

/**
 * Storage kind for one field. A per-field `storage` override wins over the policy.
 */
export function storageKindFor(field: FieldSpec, policy: ResolvedPolicy): StorageKind {
  if (field.storage) return field.storage;

  switch (policy) {
    case 'direct':
      return 'direct';
    case 'delegated':
      return 'delegated';
    case 'mixed':
      return isHotField(field.name) ? 'direct' : 'delegated';
  }
}

export type AutoThresholds = {
  fieldThreshold: number;
  instanceThreshold: number;
};

/**
 * Resolves the AUTO policy.
 *
 * The instance counter is shared by every AUTO class of one runtime: a class
 * resolved after many AUTO instances already exist gets delegated storage
 * even if it is small.
 */
export class StrategyResolver {
  private autoInstances = 0;

  constructor(private readonly thresholds: AutoThresholds) {}

  get autoInstanceCount(): number {
    return this.autoInstances;
  }

  /**
   * Count one new instance of an AUTO class.
   *
   * @returns The running total
   */
  recordAutoInstance(): number {
    this.autoInstances += 1;
    return this.autoInstances;
  }

  /**
   * Pick the concrete policy for an AUTO class with `fieldCount` fields.
   * Call after recordAutoInstance for the instance being created.
   */
  resolveAuto(fieldCount: number): ResolvedPolicy {
    if (
      fieldCount > this.thresholds.fieldThreshold ||
      this.autoInstances > this.thresholds.instanceThreshold
    ) {
      return 'delegated';
    }
    return 'direct';
  }
}
