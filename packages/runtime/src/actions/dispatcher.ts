// Action Dispatcher
//
// execute(name, params, caller):
// 1. Unknown name -> ActionNotFoundError
// 2. No allowed role -> AuthorizationError
// 3. Inputs checked against their constraint sets -> ValidationError
// 4. Body invoked, then the profile's side effects:
//    query    - served from / stored in the runtime query cache
//    command  - version bumped once more, audit entry recorded
//    task     - enqueued when the runtime has a task queue, else run inline
//    workflow - any failure re-raised as ActionExecutionError (no rollback)
//    endpoint - plain invocation

import { evaluate } from '@tessera/protocol';
import type { ActionCaller, Id, PlainMapping } from '@tessera/protocol';
import {
  ActionExecutionError,
  ActionNotFoundError,
  AuthorizationError,
  RuntimeError,
  ValidationError,
} from '../errors.js';
import type { EntityRuntime } from '../runtime.js';
import { isAuthorized, type ActionContext, type ActionSpec, type ActionTable } from './registry.js';

/**
 * The entity an action runs against, as the dispatcher sees it.
 */
export type DispatchSubject<E> = {
  entity: E;
  id: Id;
  type: string;
  version(): number;
  /** Bump the version after a successful COMMAND */
  recordCommand(): void;
};

export type DispatchRequest = {
  name: string;
  params: PlainMapping;
  caller: ActionCaller;
};

/**
 * Check supplied params against the action's input constraints.
 * Params without a constraint entry pass through unchecked.
 */
export function checkInputs<E>(spec: ActionSpec<E>, params: PlainMapping): void {
  for (const [param, constraints] of Object.entries(spec.inputConstraints)) {
    const value = params[param];

    if (value === undefined) {
      if (constraints.required) {
        throw new ValidationError(`Parameter "${param}" of action "${spec.name}" is required`, {
          action: spec.name,
          param,
          constraints,
          required: true,
        });
      }
      continue;
    }

    const result = evaluate(value, constraints);
    if (!result.ok) {
      throw new ValidationError(
        `Invalid value for parameter "${param}" of action "${spec.name}": ${result.detail}`,
        { action: spec.name, param, value, constraints }
      );
    }
  }
}

function copyParams(action: string, params: PlainMapping): PlainMapping {
  try {
    return structuredClone(params);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Parameters of action "${action}" cannot be queued: ${reason}`, {
      action,
      cause: error,
    });
  }
}

function invoke<E>(spec: ActionSpec<E>, subject: DispatchSubject<E>, params: PlainMapping, context: ActionContext): unknown {
  try {
    return spec.body(subject.entity, params, context);
  } catch (error) {
    if (error instanceof RuntimeError) throw error;
    throw new ActionExecutionError(spec.name, spec.profile, error);
  }
}

/**
 * Dispatch one action call.
 *
 * Bodies run synchronously; an async body's promise is returned as its
 * result without being awaited.
 */
export function dispatch<E>(
  runtime: EntityRuntime,
  table: ActionTable<E>,
  subject: DispatchSubject<E>,
  request: DispatchRequest
): unknown {
  const { name, params, caller } = request;
  const { logger } = runtime;

  const spec = table.get(name);
  if (!spec) {
    throw new ActionNotFoundError(name, subject.type);
  }

  if (!isAuthorized(spec.roles, caller.roles)) {
    logger.warn('Action denied', {
      entityId: subject.id,
      action: name,
      callerRoles: [...caller.roles],
      allowedRoles: [...spec.roles],
    });
    throw new AuthorizationError(name, caller.roles, spec.roles);
  }

  // a deferred body must see exactly the params that were checked
  const input = spec.profile === 'task' && runtime.tasks ? copyParams(name, params) : params;
  checkInputs(spec, input);

  const context: ActionContext = { caller, profile: spec.profile, runtime, logger };

  switch (spec.profile) {
    case 'query': {
      const cache = runtime.queryCache;
      if (!cache) return invoke(spec, subject, params, context);

      const cached = cache.lookup(subject.id, name, params);
      if (cached.hit) return cached.value;

      const result = invoke(spec, subject, params, context);
      cache.store(subject.id, name, params, result);
      return result;
    }

    case 'command': {
      const versionBefore = subject.version();
      const record = (success: boolean, error?: string) => {
        runtime.auditLog.append({
          id: runtime.generateId(),
          entityId: subject.id,
          entityType: subject.type,
          action: name,
          profile: spec.profile,
          actorId: caller.actorId ?? null,
          roles: [...caller.roles],
          success,
          ...(error !== undefined ? { error } : {}),
          versionBefore,
          versionAfter: subject.version(),
          timestamp: runtime.clock().toISOString(),
        });
      };

      let result: unknown;
      try {
        result = invoke(spec, subject, params, context);
      } catch (error) {
        record(false, error instanceof Error ? error.message : String(error));
        throw error;
      }
      subject.recordCommand();
      record(true);
      return result;
    }

    case 'task': {
      const tasks = runtime.tasks;
      if (!tasks) return invoke(spec, subject, params, context);
      return tasks.enqueue({
        action: name,
        entityId: subject.id,
        run: () => invoke(spec, subject, input, context),
      });
    }

    case 'workflow':
      try {
        return spec.body(subject.entity, params, context);
      } catch (error) {
        throw new ActionExecutionError(name, spec.profile, error, false);
      }

    case 'endpoint':
      return invoke(spec, subject, params, context);
  }
}
