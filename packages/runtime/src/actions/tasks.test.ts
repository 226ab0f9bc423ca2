// Tests for the task queue and audit log

import { describe, it, expect } from 'vitest';
import { createCapturingLogger } from '../logger.js';
import { createTaskQueue } from './tasks.js';
import { createInMemoryActionAuditLog, type ActionAuditEntry } from './audit.js';

describe('createTaskQueue', () => {
  it('hands out queued handles and runs jobs in FIFO order', async () => {
    const queue = createTaskQueue();
    const order: string[] = [];

    const first = queue.enqueue({ action: 'a', entityId: 'e1', run: () => order.push('a') });
    queue.enqueue({ action: 'b', entityId: 'e1', run: () => order.push('b') });

    expect(first).toEqual({ taskId: 'task-1', status: 'queued' });
    expect(queue.pending).toBe(2);

    const outcomes = await queue.drain();

    expect(order).toEqual(['a', 'b']);
    expect(outcomes.map((outcome) => outcome.taskId)).toEqual(['task-1', 'task-2']);
    expect(queue.pending).toBe(0);
  });

  it('awaits async jobs', async () => {
    const queue = createTaskQueue();
    queue.enqueue({ action: 'fetch', entityId: 'e1', run: async () => 'fetched' });

    const [outcome] = await queue.drain();

    expect(outcome).toEqual({
      taskId: 'task-1',
      action: 'fetch',
      entityId: 'e1',
      success: true,
      result: 'fetched',
    });
  });

  it('catches failures, logs them and keeps going', async () => {
    const logger = createCapturingLogger();
    const queue = createTaskQueue({ logger, generateId: () => 'job' });

    queue.enqueue({
      action: 'send',
      entityId: 'e1',
      run: () => {
        throw new Error('smtp down');
      },
    });
    queue.enqueue({ action: 'after', entityId: 'e1', run: () => 'ok' });

    const outcomes = await queue.drain();

    expect(outcomes).toEqual([
      { taskId: 'job', action: 'send', entityId: 'e1', success: false, error: 'smtp down' },
      { taskId: 'job', action: 'after', entityId: 'e1', success: true, result: 'ok' },
    ]);
    const warnings = logger.entries.filter((entry) => entry.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe('Task failed');
    expect(warnings[0].data).toEqual({ taskId: 'job', action: 'send', entityId: 'e1', error: 'smtp down' });
  });

  it('runs jobs enqueued while draining', async () => {
    const queue = createTaskQueue();
    queue.enqueue({
      action: 'parent',
      entityId: 'e1',
      run: () => queue.enqueue({ action: 'child', entityId: 'e1', run: () => 'child done' }),
    });

    const outcomes = await queue.drain();

    expect(outcomes.map((outcome) => outcome.action)).toEqual(['parent', 'child']);
  });
});

describe('createInMemoryActionAuditLog', () => {
  function createEntry(overrides: Partial<ActionAuditEntry> = {}): ActionAuditEntry {
    return {
      id: 'audit-1',
      entityId: 'e1',
      entityType: 'account',
      action: 'deposit',
      profile: 'command',
      actorId: null,
      roles: [],
      success: true,
      versionBefore: 1,
      versionAfter: 2,
      timestamp: '2024-01-01T00:00:00.000Z',
      ...overrides,
    };
  }

  it('returns entries newest first, filtered', () => {
    const log = createInMemoryActionAuditLog();
    log.append(createEntry({ id: 'a1' }));
    log.append(createEntry({ id: 'a2', entityId: 'e2' }));
    log.append(createEntry({ id: 'a3', success: false }));

    expect(log.size).toBe(3);
    expect(log.query().map((e) => e.id)).toEqual(['a3', 'a2', 'a1']);
    expect(log.query({ entityId: 'e1' }).map((e) => e.id)).toEqual(['a3', 'a1']);
    expect(log.query({ success: false }).map((e) => e.id)).toEqual(['a3']);
    expect(log.query({ limit: 1 }).map((e) => e.id)).toEqual(['a3']);

    log.clear();
    expect(log.size).toBe(0);
  });

  it('drops the oldest entries past its cap', () => {
    const log = createInMemoryActionAuditLog({ maxEntries: 2 });
    log.append(createEntry({ id: 'a1' }));
    log.append(createEntry({ id: 'a2' }));
    log.append(createEntry({ id: 'a3' }));

    expect(log.size).toBe(2);
    expect(log.query().map((e) => e.id)).toEqual(['a3', 'a2']);
  });
});
