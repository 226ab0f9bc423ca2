// Snapshot types - persisted entity state and collection bundles

import type { Id, PlainMapping, Timestamp } from './common.js';
import type { ActionExport } from './actions.js';
import type { AccessorPolicy, ConstraintSet, StorageKind } from './fields.js';
import type { LifecycleState } from './entities.js';

/**
 * One field in a schema descriptor.
 */
export type FieldDescriptor = {
  name: string;
  constraints: ConstraintSet;
  default?: unknown;
  required: boolean;
  storage?: StorageKind;
  description?: string;
};

/**
 * Plain description of an entity class's field table.
 */
export type EntitySchemaDescriptor = {
  type: string;
  policy: AccessorPolicy;
  fields: FieldDescriptor[];
};

/**
 * Metadata block of a snapshot.
 * The id may be left out and supplied when the snapshot is loaded.
 */
export type SnapshotMetadata = {
  id?: Id;
  type: string;
  state: LifecycleState;
  version: number;
  createdAt: Timestamp;
  updatedAt: Timestamp;
  tags: string[];
  metadata: Record<string, unknown>;
};

/**
 * Persisted state of a single entity.
 */
export type EntitySnapshot = {
  metadata: SnapshotMetadata;
  data: PlainMapping;
  schema?: EntitySchemaDescriptor;
  actions?: Record<string, ActionExport>;
};

/**
 * Many entities of one class sharing a schema and action block.
 * `data` maps entity id to that entity's field data.
 */
export type CollectionBundle = {
  metadata: {
    type: string;
    entityCount: number;
    exportedAt: Timestamp;
  };
  data: Record<Id, PlainMapping>;
  schema?: EntitySchemaDescriptor;
  actions?: Record<string, ActionExport>;
};
