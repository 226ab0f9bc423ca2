// Snapshot and bundle reading
//
// Untrusted input is parsed against the protocol schemas first; the first
// problem found is raised as a ValidationError naming its path.

import { parseCollectionBundle, parseEntitySnapshot } from '@tessera/protocol';
import type {
  CollectionBundle,
  EntitySnapshot,
  ParseResult,
  SnapshotValidationError,
} from '@tessera/protocol';
import { ValidationError } from '../errors.js';

function firstError(kind: string, errors: SnapshotValidationError[]): ValidationError {
  const first = errors[0];
  return new ValidationError(`Invalid ${kind} at ${first.path}: ${first.message}`, {
    field: first.path,
    details: { errors },
  });
}

function unwrap<T>(kind: string, parsed: ParseResult<T>): T {
  if (!parsed.success) {
    throw firstError(kind, parsed.errors);
  }
  return parsed.value;
}

function checkType(kind: string, actual: string, expected: string, path: string): void {
  if (actual !== expected) {
    throw new ValidationError(`${kind} holds "${actual}" entities, expected "${expected}"`, {
      field: path,
      value: actual,
    });
  }
}

/**
 * Parse a snapshot for an entity class of `entityType`.
 */
export function readEntitySnapshot(input: unknown, entityType: string): EntitySnapshot {
  const snapshot = unwrap('snapshot', parseEntitySnapshot(input));
  checkType('Snapshot', snapshot.metadata.type, entityType, 'snapshot.metadata.type');
  return snapshot;
}

/**
 * Parse a collection bundle for an entity class of `entityType`.
 */
export function readCollectionBundle(input: unknown, entityType: string): CollectionBundle {
  const bundle = unwrap('bundle', parseCollectionBundle(input));
  checkType('Bundle', bundle.metadata.type, entityType, 'bundle.metadata.type');
  return bundle;
}
