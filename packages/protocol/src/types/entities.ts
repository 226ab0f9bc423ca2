// Entity types - identity and lifecycle metadata

import type { Id, Timestamp } from './common.js';

/**
 * Lifecycle states of an entity.
 *
 * draft      -> validated, archived
 * validated  -> committed, draft, archived
 * committed  -> archived
 * archived   -> draft
 */
export type LifecycleState = 'draft' | 'validated' | 'committed' | 'archived';

export const LIFECYCLE_STATES: readonly LifecycleState[] = [
  'draft',
  'validated',
  'committed',
  'archived',
];

/**
 * Identity of an entity. Never changes once created.
 */
export type EntityIdentity = {
  readonly id: Id;
  readonly entityType: string;
};

/**
 * Serialized form of an entity's identity and lifecycle metadata.
 */
export type EntityMetadataRecord = {
  id: Id;
  type: string;
  state: LifecycleState;
  version: number;
  createdAt: Timestamp;
  updatedAt: Timestamp;
  tags: string[];
  metadata: Record<string, unknown>;
};
