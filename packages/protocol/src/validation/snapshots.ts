// Snapshot Validation
//
// Validates persisted entity snapshots and collection bundles before they are
// loaded. Input comes from files or the network, so it is treated as unknown.

import { z } from 'zod';
import type { CollectionBundle, EntitySnapshot } from '../types/snapshots.js';
import { constraintSetSchema } from './constraints.js';

/**
 * Result of validating a snapshot or bundle
 */
export type SnapshotValidationResult = {
  valid: boolean;
  errors: SnapshotValidationError[];
};

/**
 * A single validation problem, addressed by a dotted path
 */
export type SnapshotValidationError = {
  path: string;
  message: string;
  code: SnapshotValidationErrorCode;
};

export type SnapshotValidationErrorCode = 'MISSING_FIELD' | 'INVALID_TYPE' | 'INVALID_VALUE';

/**
 * Outcome of parsing: either the typed value or the errors found.
 */
export type ParseResult<T> =
  | { success: true; value: T }
  | { success: false; errors: SnapshotValidationError[] };

const timestampSchema = z.string().datetime({ offset: true, message: 'must be an ISO-8601 timestamp' });

const lifecycleStateSchema = z.enum(['draft', 'validated', 'committed', 'archived']);

const storageKindSchema = z.enum(['direct', 'delegated']);

const accessorPolicySchema = z.enum(['direct', 'delegated', 'mixed', 'auto']);

const actionProfileSchema = z.enum(['query', 'command', 'task', 'workflow', 'endpoint']);

const plainMappingSchema = z.record(z.unknown());

const fieldDescriptorSchema = z.object({
  name: z.string().min(1),
  constraints: constraintSetSchema,
  default: z.unknown(),
  required: z.boolean(),
  storage: storageKindSchema.optional(),
  description: z.string().optional(),
});

const schemaDescriptorSchema = z.object({
  type: z.string().min(1),
  policy: accessorPolicySchema,
  fields: z.array(fieldDescriptorSchema),
});

const actionExportSchema = z.object({
  name: z.string().min(1),
  roles: z.array(z.string()),
  profile: actionProfileSchema,
  inputConstraints: z.record(constraintSetSchema),
  description: z.string(),
  rollback: z.literal('none').optional(),
});

const snapshotMetadataSchema = z.object({
  id: z.string().min(1).optional(),
  type: z.string().min(1),
  state: lifecycleStateSchema,
  version: z.number().int().min(1),
  createdAt: timestampSchema,
  updatedAt: timestampSchema,
  tags: z.array(z.string()),
  metadata: plainMappingSchema,
});

const entitySnapshotSchema = z.object({
  metadata: snapshotMetadataSchema,
  data: plainMappingSchema,
  schema: schemaDescriptorSchema.optional(),
  actions: z.record(actionExportSchema).optional(),
});

const collectionBundleSchema = z.object({
  metadata: z.object({
    type: z.string().min(1),
    entityCount: z.number().int().nonnegative(),
    exportedAt: timestampSchema,
  }),
  data: z.record(plainMappingSchema),
  schema: schemaDescriptorSchema.optional(),
  actions: z.record(actionExportSchema).optional(),
});

function toValidationErrors(root: string, error: z.ZodError): SnapshotValidationError[] {
  return error.issues.map((issue) => {
    let code: SnapshotValidationErrorCode = 'INVALID_VALUE';
    if (issue.code === z.ZodIssueCode.invalid_type) {
      code = issue.received === 'undefined' ? 'MISSING_FIELD' : 'INVALID_TYPE';
    }
    return {
      path: [root, ...issue.path].join('.'),
      message: issue.message,
      code,
    };
  });
}

/**
 * Parse an unknown value as an entity snapshot.
 */
export function parseEntitySnapshot(input: unknown): ParseResult<EntitySnapshot> {
  const result = entitySnapshotSchema.safeParse(input);
  if (!result.success) {
    return { success: false, errors: toValidationErrors('snapshot', result.error) };
  }
  return { success: true, value: result.data };
}

/**
 * Parse an unknown value as a collection bundle.
 */
export function parseCollectionBundle(input: unknown): ParseResult<CollectionBundle> {
  const result = collectionBundleSchema.safeParse(input);
  if (!result.success) {
    return { success: false, errors: toValidationErrors('bundle', result.error) };
  }

  const { metadata, data } = result.data;
  const actualCount = Object.keys(data).length;
  if (metadata.entityCount !== actualCount) {
    return {
      success: false,
      errors: [
        {
          path: 'bundle.metadata.entityCount',
          message: `entityCount is ${metadata.entityCount} but data holds ${actualCount} entities`,
          code: 'INVALID_VALUE',
        },
      ],
    };
  }

  return { success: true, value: result.data };
}

/**
 * Validate an entity snapshot.
 *
 * @param snapshot - The snapshot to validate
 * @returns Validation result with errors
 */
export function validateSnapshot(snapshot: unknown): SnapshotValidationResult {
  const parsed = parseEntitySnapshot(snapshot);
  return parsed.success ? { valid: true, errors: [] } : { valid: false, errors: parsed.errors };
}

/**
 * Validate a collection bundle.
 */
export function validateCollectionBundle(bundle: unknown): SnapshotValidationResult {
  const parsed = parseCollectionBundle(bundle);
  return parsed.success ? { valid: true, errors: [] } : { valid: false, errors: parsed.errors };
}
