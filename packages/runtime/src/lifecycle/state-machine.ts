// Entity State Machine
//
// Owns an entity's identity, lifecycle state, version counter, timestamps,
// tags and metadata. Every accepted transition or mutation bumps the version
// by exactly one; nothing ever lowers it.
//
//   draft     -> validated, archived
//   validated -> committed, draft, archived
//   committed -> archived
//   archived  -> draft

import type {
  EntityIdentity,
  EntityMetadataRecord,
  LifecycleState,
  PlainMapping,
  Timestamp,
} from '@tessera/protocol';
import { StateError } from '../errors.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const LIFECYCLE_TRANSITIONS: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  draft: ['validated', 'archived'],
  validated: ['committed', 'draft', 'archived'],
  committed: ['archived'],
  archived: ['draft'],
};

export type LifecycleInit = {
  identity: EntityIdentity;
  clock: Clock;
  state?: LifecycleState;
  version?: number;
  createdAt?: Timestamp;
  updatedAt?: Timestamp;
  tags?: readonly string[];
  metadata?: PlainMapping;
};

export class EntityLifecycle {
  readonly identity: EntityIdentity;
  readonly createdAt: Timestamp;
  private readonly clock: Clock;
  private currentState: LifecycleState;
  private currentVersion: number;
  private lastUpdatedAt: Timestamp;
  private readonly tagList: string[];
  private readonly metadataMap: PlainMapping;

  constructor(init: LifecycleInit) {
    this.identity = Object.freeze({ ...init.identity });
    this.clock = init.clock;
    this.currentState = init.state ?? 'draft';
    this.currentVersion = init.version ?? 1;
    this.createdAt = init.createdAt ?? init.clock().toISOString();
    this.lastUpdatedAt =
      init.updatedAt !== undefined && Date.parse(init.updatedAt) > Date.parse(this.createdAt)
        ? init.updatedAt
        : this.createdAt;
    this.tagList = [...new Set(init.tags ?? [])];
    this.metadataMap = structuredClone(init.metadata ?? {});
  }

  get state(): LifecycleState {
    return this.currentState;
  }

  get version(): number {
    return this.currentVersion;
  }

  get updatedAt(): Timestamp {
    return this.lastUpdatedAt;
  }

  get tags(): readonly string[] {
    return [...this.tagList];
  }

  get metadata(): PlainMapping {
    return structuredClone(this.metadataMap);
  }

  canTransitionTo(target: LifecycleState): boolean {
    return LIFECYCLE_TRANSITIONS[this.currentState].includes(target);
  }

  allowedTransitions(): readonly LifecycleState[] {
    return LIFECYCLE_TRANSITIONS[this.currentState];
  }

  /**
   * Move to `target`.
   *
   * Entering `validated` runs `gate` first; a false result refuses the
   * transition and leaves state and version untouched.
   *
   * @throws StateError when the table forbids the move or the gate fails
   */
  transitionTo(target: LifecycleState, gate?: () => boolean): void {
    if (!this.canTransitionTo(target)) {
      throw new StateError(this.currentState, target, 'transition not allowed');
    }
    if (target === 'validated' && gate && !gate()) {
      throw new StateError(this.currentState, target, 'validation failed');
    }
    this.currentState = target;
    this.bump();
  }

  /**
   * Record a mutation: bump version and refresh updatedAt, state unchanged.
   */
  touch(): void {
    this.bump();
  }

  addTag(tag: string): void {
    if (!this.tagList.includes(tag)) this.tagList.push(tag);
  }

  removeTag(tag: string): void {
    const index = this.tagList.indexOf(tag);
    if (index !== -1) this.tagList.splice(index, 1);
  }

  setMetadata(key: string, value: unknown): void {
    this.metadataMap[key] = value;
  }

  toRecord(): EntityMetadataRecord {
    return {
      id: this.identity.id,
      type: this.identity.entityType,
      state: this.currentState,
      version: this.currentVersion,
      createdAt: this.createdAt,
      updatedAt: this.lastUpdatedAt,
      tags: [...this.tagList],
      metadata: this.metadata,
    };
  }

  private bump(): void {
    this.currentVersion += 1;
    const now = this.clock().toISOString();
    // a clock that steps backwards must not regress updatedAt
    if (Date.parse(now) > Date.parse(this.lastUpdatedAt)) {
      this.lastUpdatedAt = now;
    }
  }
}
