// Task queue for TASK-profile actions
//
// With a queue on the runtime, TASK bodies are deferred until the caller
// drains it. A failing job is logged and reported; it never touches the
// state of the entity it ran against beyond what the body itself did.

import type { Id } from '@tessera/protocol';
import type { RuntimeLogger } from '../logger.js';
import { silentLogger } from '../logger.js';

export type TaskHandle = {
  taskId: string;
  status: 'queued';
};

export type TaskJob = {
  action: string;
  entityId: Id;
  run: () => unknown;
};

export type TaskOutcome = {
  taskId: string;
  action: string;
  entityId: Id;
  success: boolean;
  result?: unknown;
  error?: string;
};

export interface TaskQueue {
  enqueue(job: TaskJob): TaskHandle;

  /**
   * Run every queued job in FIFO order, including jobs enqueued while
   * draining. Failures are caught per job.
   */
  drain(): Promise<TaskOutcome[]>;

  readonly pending: number;
}

export type TaskQueueOptions = {
  logger?: RuntimeLogger;
  generateId?: () => string;
};

export function createTaskQueue(options: TaskQueueOptions = {}): TaskQueue {
  const { logger = silentLogger } = options;
  let counter = 0;
  const generateId = options.generateId ?? (() => `task-${++counter}`);
  const queue: Array<TaskJob & { taskId: string }> = [];

  return {
    enqueue(job: TaskJob): TaskHandle {
      const taskId = generateId();
      queue.push({ ...job, taskId });
      logger.debug('Task queued', { taskId, action: job.action, entityId: job.entityId });
      return { taskId, status: 'queued' };
    },

    async drain(): Promise<TaskOutcome[]> {
      const outcomes: TaskOutcome[] = [];

      let job = queue.shift();
      while (job) {
        const { taskId, action, entityId } = job;
        try {
          const result = await job.run();
          outcomes.push({ taskId, action, entityId, success: true, result });
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn('Task failed', { taskId, action, entityId, error: message });
          outcomes.push({ taskId, action, entityId, success: false, error: message });
        }
        job = queue.shift();
      }

      return outcomes;
    },

    get pending() {
      return queue.length;
    },
  };
}
