// Action types - declared operations on an entity

import type { ConstraintSet } from './fields.js';

/**
 * Execution contract of an action.
 *
 * - query: reads only; results may be served from a cache
 * - command: mutates; every invocation is attributed to a caller
 * - task: may be deferred to a task queue
 * - workflow: several internal steps, no automatic rollback
 * - endpoint: parameters map 1:1 to request fields, each optional unless required
 */
export type ActionProfile = 'query' | 'command' | 'task' | 'workflow' | 'endpoint';

export const ACTION_PROFILES: readonly ActionProfile[] = [
  'query',
  'command',
  'task',
  'workflow',
  'endpoint',
];

/**
 * Role granting access to everyone.
 */
export const WILDCARD_ROLE = '*';

/**
 * Who is invoking an action.
 */
export type ActionCaller = {
  roles: readonly string[];

  /** Recorded on the audit trail of command actions */
  actorId?: string;
};

/**
 * Introspection record of a declared action.
 * Produced without dispatching anything.
 */
export type ActionExport = {
  name: string;
  roles: string[];
  profile: ActionProfile;
  inputConstraints: Record<string, ConstraintSet>;
  description: string;

  /**
   * Workflows apply their steps directly to the entity.
   * A failing step leaves earlier steps in place.
   */
  rollback?: 'none';
};
