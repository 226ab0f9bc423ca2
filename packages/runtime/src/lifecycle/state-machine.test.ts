// Tests for the entity state machine

import { describe, it, expect } from 'vitest';
import type { LifecycleState } from '@tessera/protocol';
import { StateError } from '../errors.js';
import { EntityLifecycle, LIFECYCLE_TRANSITIONS, type Clock } from './state-machine.js';

// --- Test Fixtures ---

function createSteppingClock(startIso = '2024-01-01T00:00:00.000Z', stepMs = 1000): Clock {
  let current = Date.parse(startIso) - stepMs;
  return () => {
    current += stepMs;
    return new Date(current);
  };
}

function createLifecycle(clock: Clock = createSteppingClock()): EntityLifecycle {
  return new EntityLifecycle({ identity: { id: 'user-1', entityType: 'user' }, clock });
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

// --- Tests ---

describe('EntityLifecycle', () => {
  it('starts as a draft at version 1', () => {
    const lifecycle = createLifecycle();

    expect(lifecycle.state).toBe('draft');
    expect(lifecycle.version).toBe(1);
    expect(lifecycle.createdAt).toBe('2024-01-01T00:00:00.000Z');
    expect(lifecycle.updatedAt).toBe(lifecycle.createdAt);
  });

  it('follows the transition table', () => {
    const expected: Record<LifecycleState, LifecycleState[]> = {
      draft: ['validated', 'archived'],
      validated: ['committed', 'draft', 'archived'],
      committed: ['archived'],
      archived: ['draft'],
    };
    expect(LIFECYCLE_TRANSITIONS).toEqual(expected);
  });

  it('bumps version and updatedAt on each accepted transition', () => {
    const lifecycle = createLifecycle();

    lifecycle.transitionTo('validated', () => true);
    expect(lifecycle.state).toBe('validated');
    expect(lifecycle.version).toBe(2);
    expect(lifecycle.updatedAt).toBe('2024-01-01T00:00:01.000Z');

    lifecycle.transitionTo('committed');
    lifecycle.transitionTo('archived');
    lifecycle.transitionTo('draft');
    expect(lifecycle.version).toBe(5);
    expect(lifecycle.updatedAt).toBe('2024-01-01T00:00:04.000Z');
  });

  it('refuses transitions outside the table', () => {
    const lifecycle = createLifecycle();

    const error = captureError(() => lifecycle.transitionTo('committed'));

    expect(error).toBeInstanceOf(StateError);
    if (error instanceof StateError) {
      expect(error.message).toBe('Cannot transition from "draft" to "committed": transition not allowed');
      expect(error.currentState).toBe('draft');
      expect(error.targetState).toBe('committed');
    }
    expect(lifecycle.state).toBe('draft');
    expect(lifecycle.version).toBe(1);
  });

  it('refuses validated when the gate fails, without changes', () => {
    const lifecycle = createLifecycle();

    expect(() => lifecycle.transitionTo('validated', () => false)).toThrow(
      'Cannot transition from "draft" to "validated": validation failed'
    );
    expect(lifecycle.state).toBe('draft');
    expect(lifecycle.version).toBe(1);
  });

  it('reports allowed transitions', () => {
    const lifecycle = createLifecycle();

    expect(lifecycle.allowedTransitions()).toEqual(['validated', 'archived']);
    expect(lifecycle.canTransitionTo('archived')).toBe(true);
    expect(lifecycle.canTransitionTo('committed')).toBe(false);
  });

  it('touch bumps the version without changing state', () => {
    const lifecycle = createLifecycle();
    lifecycle.touch();

    expect(lifecycle.state).toBe('draft');
    expect(lifecycle.version).toBe(2);
  });

  it('never moves updatedAt backwards', () => {
    const lifecycle = createLifecycle(createSteppingClock('2024-06-01T00:00:00.000Z', -1000));
    lifecycle.touch();

    expect(lifecycle.updatedAt).toBe('2024-06-01T00:00:00.000Z');
    expect(lifecycle.version).toBe(2);
  });

  it('clamps a loaded updatedAt that precedes createdAt', () => {
    const lifecycle = new EntityLifecycle({
      identity: { id: 'user-1', entityType: 'user' },
      clock: createSteppingClock(),
      createdAt: '2024-02-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:00.000Z',
    });

    expect(lifecycle.updatedAt).toBe('2024-02-01T00:00:00.000Z');
  });

  it('keeps tags unique and hands out copies', () => {
    const lifecycle = new EntityLifecycle({
      identity: { id: 'user-1', entityType: 'user' },
      clock: createSteppingClock(),
      tags: ['a', 'a', 'b'],
      metadata: { source: { system: 'import' } },
    });

    lifecycle.addTag('b');
    lifecycle.addTag('c');
    lifecycle.removeTag('a');
    expect(lifecycle.tags).toEqual(['b', 'c']);

    const metadata = lifecycle.metadata;
    metadata.source = 'changed';
    expect(lifecycle.metadata).toEqual({ source: { system: 'import' } });
  });

  it('serializes to a metadata record', () => {
    const lifecycle = createLifecycle();
    lifecycle.setMetadata('owner', 'ops');

    expect(lifecycle.toRecord()).toEqual({
      id: 'user-1',
      type: 'user',
      state: 'draft',
      version: 1,
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:00.000Z',
      tags: [],
      metadata: { owner: 'ops' },
    });
  });
});
