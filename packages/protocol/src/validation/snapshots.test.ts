// Tests for snapshot validation

import { describe, it, expect } from 'vitest';
import type { EntitySnapshot } from '../types/snapshots.js';
import {
  parseCollectionBundle,
  parseEntitySnapshot,
  validateCollectionBundle,
  validateSnapshot,
} from './snapshots.js';

// --- Test Fixtures ---

function createSnapshot(overrides: Partial<EntitySnapshot['metadata']> = {}): EntitySnapshot {
  return {
    metadata: {
      id: 'user-1',
      type: 'user',
      state: 'draft',
      version: 1,
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:00.000Z',
      tags: ['beta'],
      metadata: { source: 'test' },
      ...overrides,
    },
    data: { username: 'abc', profile: { bio: 'hi' } },
  };
}

// --- Tests ---

describe('validateSnapshot', () => {
  it('accepts a well-formed snapshot', () => {
    expect(validateSnapshot(createSnapshot())).toEqual({ valid: true, errors: [] });
  });

  it('accepts a snapshot without an id', () => {
    const snapshot = createSnapshot();
    delete snapshot.metadata.id;
    expect(validateSnapshot(snapshot).valid).toBe(true);
  });

  it('reports a missing data block', () => {
    const { metadata } = createSnapshot();
    const result = validateSnapshot({ metadata });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { path: 'snapshot.data', message: 'Required', code: 'MISSING_FIELD' },
    ]);
  });

  it('reports an unknown lifecycle state', () => {
    const snapshot = { ...createSnapshot(), metadata: { ...createSnapshot().metadata, state: 'deleted' } };
    const result = validateSnapshot(snapshot);

    expect(result.valid).toBe(false);
    expect(result.errors[0].path).toBe('snapshot.metadata.state');
    expect(result.errors[0].code).toBe('INVALID_VALUE');
  });

  it('reports a version below 1', () => {
    const result = validateSnapshot(createSnapshot({ version: 0 }));
    expect(result.errors[0].path).toBe('snapshot.metadata.version');
  });

  it('reports a malformed timestamp', () => {
    const result = validateSnapshot(createSnapshot({ updatedAt: 'yesterday' }));
    expect(result.errors).toEqual([
      {
        path: 'snapshot.metadata.updatedAt',
        message: 'must be an ISO-8601 timestamp',
        code: 'INVALID_VALUE',
      },
    ]);
  });

  it('rejects dates that are not ISO-8601 even when they parse', () => {
    const result = validateSnapshot(createSnapshot({ createdAt: 'Jan 1 2024' }));
    expect(result.errors).toEqual([
      {
        path: 'snapshot.metadata.createdAt',
        message: 'must be an ISO-8601 timestamp',
        code: 'INVALID_VALUE',
      },
    ]);
  });

  it('accepts timestamps with a UTC offset', () => {
    expect(validateSnapshot(createSnapshot({ updatedAt: '2024-01-01T02:00:00+02:00' })).valid).toBe(true);
  });

  it('reports a wrong type', () => {
    const result = validateSnapshot({ ...createSnapshot(), data: 'nope' });
    expect(result.errors[0]).toMatchObject({ path: 'snapshot.data', code: 'INVALID_TYPE' });
  });
});

describe('parseEntitySnapshot', () => {
  it('returns the typed snapshot', () => {
    const parsed = parseEntitySnapshot(createSnapshot());
    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(parsed.value.data).toEqual({ username: 'abc', profile: { bio: 'hi' } });
      expect(parsed.value.metadata.tags).toEqual(['beta']);
    }
  });
});

describe('collection bundles', () => {
  const bundle = {
    metadata: { type: 'user', entityCount: 2, exportedAt: '2024-01-02T00:00:00.000Z' },
    data: {
      'user-1': { username: 'abc' },
      'user-2': { username: 'def' },
    },
  };

  it('accepts a consistent bundle', () => {
    expect(validateCollectionBundle(bundle)).toEqual({ valid: true, errors: [] });
  });

  it('rejects an entity count that does not match the data', () => {
    const result = parseCollectionBundle({ ...bundle, metadata: { ...bundle.metadata, entityCount: 3 } });
    expect(result).toEqual({
      success: false,
      errors: [
        {
          path: 'bundle.metadata.entityCount',
          message: 'entityCount is 3 but data holds 2 entities',
          code: 'INVALID_VALUE',
        },
      ],
    });
  });
});
