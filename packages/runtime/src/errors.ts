// Runtime error types

import type { ActionProfile, ConstraintSet, LifecycleState } from '@tessera/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

export type ValidationErrorOptions = {
  /** Field (or dotted path) whose value was rejected */
  field?: string;
  /** Action parameter whose value was rejected */
  param?: string;
  /** Action whose input was rejected */
  action?: string;
  value?: unknown;
  constraints?: ConstraintSet;
  /** Set when the value was missing rather than malformed */
  required?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
};

/**
 * A value was rejected by its constraints, or input could not be parsed.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly param?: string;
  readonly action?: string;
  readonly value?: unknown;
  readonly constraints?: ConstraintSet;
  readonly required: boolean;
  readonly details?: Record<string, unknown>;

  constructor(message: string, options: ValidationErrorOptions = {}) {
    super('VALIDATION_ERROR', message, { cause: options.cause });
    this.name = 'ValidationError';
    this.field = options.field;
    this.param = options.param;
    this.action = options.action;
    this.value = options.value;
    this.constraints = options.constraints;
    this.required = options.required ?? false;
    this.details = options.details;
  }
}

/**
 * A lifecycle transition was refused.
 */
export class StateError extends RuntimeError {
  readonly currentState: LifecycleState;
  readonly targetState: LifecycleState;
  readonly reason: string;

  constructor(currentState: LifecycleState, targetState: LifecycleState, reason: string) {
    super('STATE_ERROR', `Cannot transition from "${currentState}" to "${targetState}": ${reason}`);
    this.name = 'StateError';
    this.currentState = currentState;
    this.targetState = targetState;
    this.reason = reason;
  }
}

export class ActionNotFoundError extends RuntimeError {
  readonly actionName: string;
  readonly entityType: string;

  constructor(actionName: string, entityType: string) {
    super('ACTION_NOT_FOUND', `Action "${actionName}" is not defined on ${entityType}`);
    this.name = 'ActionNotFoundError';
    this.actionName = actionName;
    this.entityType = entityType;
  }
}

/**
 * The caller holds none of the roles an action allows.
 */
export class AuthorizationError extends RuntimeError {
  readonly action: string;
  readonly callerRoles: readonly string[];
  readonly allowedRoles: readonly string[];

  constructor(action: string, callerRoles: readonly string[], allowedRoles: readonly string[]) {
    super(
      'AUTHORIZATION_ERROR',
      `Roles [${callerRoles.join(', ')}] may not execute "${action}" (allowed: ${allowedRoles.join(', ')})`
    );
    this.name = 'AuthorizationError';
    this.action = action;
    this.callerRoles = callerRoles;
    this.allowedRoles = allowedRoles;
  }
}

/**
 * An entity class declaration is malformed.
 */
export class DefinitionError extends RuntimeError {
  readonly entityType: string;
  readonly member: string | null;
  readonly reason: string;

  constructor(entityType: string, member: string | null, reason: string) {
    const subject = member === null ? entityType : `${entityType}.${member}`;
    super('DEFINITION_ERROR', `Invalid definition of "${subject}": ${reason}`);
    this.name = 'DefinitionError';
    this.entityType = entityType;
    this.member = member;
    this.reason = reason;
  }
}

/**
 * An action body threw something outside the runtime error taxonomy,
 * or a WORKFLOW body failed part way.
 */
export class ActionExecutionError extends RuntimeError {
  readonly action: string;
  readonly profile: ActionProfile;
  /** Always false: steps a body completed before failing are kept */
  readonly rolledBack: boolean;

  constructor(action: string, profile: ActionProfile, cause: unknown, rolledBack = false) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('ACTION_EXECUTION_ERROR', `Action "${action}" failed: ${reason}`, { cause });
    this.name = 'ActionExecutionError';
    this.action = action;
    this.profile = profile;
    this.rolledBack = rolledBack;
  }
}

export class EntityNotFoundError extends RuntimeError {
  readonly entityId: string;
  readonly entityType?: string;

  constructor(entityId: string, entityType?: string) {
    super(
      'ENTITY_NOT_FOUND',
      entityType ? `Entity not found: ${entityType}#${entityId}` : `Entity not found: ${entityId}`
    );
    this.name = 'EntityNotFoundError';
    this.entityId = entityId;
    this.entityType = entityType;
  }
}
