// Action Registry - the per-class table of declared actions
//
// Built once when an entity class is defined. Declarations are checked up
// front so that a bad constraint set or a duplicate name fails at definition
// time, not on first dispatch.

import { ACTION_PROFILES, WILDCARD_ROLE, checkConstraintSet } from '@tessera/protocol';
import type {
  ActionCaller,
  ActionExport,
  ActionProfile,
  ConstraintSet,
  PlainMapping,
} from '@tessera/protocol';
import { DefinitionError } from '../errors.js';
import type { RuntimeLogger } from '../logger.js';
import type { EntityRuntime } from '../runtime.js';

// --- Types ---

/**
 * What an action body receives besides the entity and its params.
 */
export type ActionContext = {
  caller: ActionCaller;
  profile: ActionProfile;
  runtime: EntityRuntime;
  logger: RuntimeLogger;
};

export type ActionHandler<E> = (entity: E, params: PlainMapping, context: ActionContext) => unknown;

/**
 * An action as written in an entity class definition.
 *
 * @example
 * ```typescript
 * const promote: ActionDeclaration<Entity> = {
 *   name: 'promote',
 *   roles: ['admin'],
 *   profile: 'command',
 *   input: { level: { type: 'integer', min: 1, required: true } },
 *   handler: (user, params) => user.set('level', params.level),
 * };
 * ```
 */
export type ActionDeclaration<E> = {
  name: string;
  /** Defaults to ['*'] */
  roles?: readonly string[];
  /** Defaults to 'command' */
  profile?: ActionProfile;
  input?: Record<string, ConstraintSet>;
  description?: string;
  handler: ActionHandler<E>;
};

/**
 * A checked, immutable action entry.
 */
export type ActionSpec<E> = {
  readonly name: string;
  readonly roles: readonly string[];
  readonly profile: ActionProfile;
  readonly inputConstraints: Readonly<Record<string, ConstraintSet>>;
  readonly description: string;
  readonly body: ActionHandler<E>;
};

// --- Authorization ---

/**
 * Whether any of the caller's roles is allowed, or the action is open to all.
 */
export function isAuthorized(allowedRoles: readonly string[], callerRoles: readonly string[]): boolean {
  if (allowedRoles.includes(WILDCARD_ROLE)) return true;
  return callerRoles.some((role) => allowedRoles.includes(role));
}

// --- Table ---

function checkDeclaration<E>(entityType: string, declaration: ActionDeclaration<E>): ActionSpec<E> {
  const { name } = declaration;

  if (typeof name !== 'string' || name.length === 0) {
    throw new DefinitionError(entityType, null, 'action name must be a non-empty string');
  }

  const profile = declaration.profile ?? 'command';
  if (!ACTION_PROFILES.includes(profile)) {
    throw new DefinitionError(entityType, name, `unknown action profile "${profile}"`);
  }

  const roles = declaration.roles ?? [WILDCARD_ROLE];
  if (roles.length === 0) {
    throw new DefinitionError(entityType, name, 'an action must allow at least one role');
  }

  if (typeof declaration.handler !== 'function') {
    throw new DefinitionError(entityType, name, 'handler must be a function');
  }

  const inputConstraints: Record<string, ConstraintSet> = {};
  for (const [param, constraints] of Object.entries(declaration.input ?? {})) {
    const problems = checkConstraintSet(constraints);
    if (problems.length > 0) {
      throw new DefinitionError(entityType, `${name}(${param})`, problems.join('; '));
    }
    inputConstraints[param] = Object.freeze({ ...constraints });
  }

  return Object.freeze({
    name,
    roles: Object.freeze([...roles]),
    profile,
    inputConstraints: Object.freeze(inputConstraints),
    description: declaration.description ?? '',
    body: declaration.handler,
  });
}

/**
 * Declared actions of one entity class, in declaration order.
 */
export class ActionTable<E> {
  private readonly specs = new Map<string, ActionSpec<E>>();

  constructor(
    readonly entityType: string,
    declarations: readonly ActionDeclaration<E>[] = []
  ) {
    for (const declaration of declarations) {
      const spec = checkDeclaration(entityType, declaration);
      if (this.specs.has(spec.name)) {
        throw new DefinitionError(entityType, spec.name, 'duplicate action name');
      }
      this.specs.set(spec.name, spec);
    }
  }

  get size(): number {
    return this.specs.size;
  }

  get(name: string): ActionSpec<E> | undefined {
    return this.specs.get(name);
  }

  has(name: string): boolean {
    return this.specs.has(name);
  }

  names(): string[] {
    return [...this.specs.keys()];
  }

  /**
   * Introspection records for every action. Never dispatches.
   */
  export(): Record<string, ActionExport> {
    const exported: Record<string, ActionExport> = {};
    for (const spec of this.specs.values()) {
      exported[spec.name] = {
        name: spec.name,
        roles: [...spec.roles],
        profile: spec.profile,
        inputConstraints: { ...spec.inputConstraints },
        description: spec.description,
        ...(spec.profile === 'workflow' ? { rollback: 'none' as const } : {}),
      };
    }
    return exported;
  }
}
