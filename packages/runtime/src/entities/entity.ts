// Entity Facade
//
// The composition root of one entity: a Field Store and slot array behind
// the class's accessors, a lifecycle state machine, and the class's action
// table. Field paths whose first segment is a declared field go through that
// field's accessor; anything else goes straight to the Field Store.
//
// Every mutation (set, delete, update, tag and metadata edits, COMMAND
// actions) bumps the version once and drops the entity's cached derived
// state: memoized validation and cached QUERY results.

import { evaluateFields } from '@tessera/protocol';
import type {
  ActionCaller,
  ActionExport,
  EntitySnapshot,
  FieldIssue,
  Id,
  LifecycleState,
  PlainMapping,
  Timestamp,
} from '@tessera/protocol';
import {
  StorePathError,
  deleteAtPath,
  getAtPath,
  isPlainObject,
  parsePath,
  readonlyView,
  setAtPath,
  type FieldStore,
  type ReadonlyFieldStore,
} from '@tessera/store';
import { StateError, ValidationError } from '../errors.js';
import type { EntityRuntime } from '../runtime.js';
import type { EntityLifecycle } from '../lifecycle/state-machine.js';
import {
  fieldValidationError,
  type AccessorSet,
  type FieldAccessor,
  type FieldBacking,
} from '../accessors/synthesizer.js';
import type { FieldStrategy } from '../accessors/policy.js';
import { dispatch } from '../actions/dispatcher.js';
import type { EntityClass } from './entity-class.js';

export type PerformanceStats = {
  /** Reads through get() */
  accessCount: number;
  /** Validation passes actually run (memoized passes are not counted) */
  validationCount: number;
  /** Accepted mutations */
  mutationCount: number;
};

export type SnapshotOptions = {
  includeSchema?: boolean;
  includeActions?: boolean;
};

/**
 * Everything an entity is assembled from. Built by EntityClass.
 */
export type EntityParts = {
  entityClass: EntityClass;
  runtime: EntityRuntime;
  accessors: AccessorSet;
  lifecycle: EntityLifecycle;
  store: FieldStore;
};

/**
 * How initial data is applied: checked through the accessors, or loaded as is.
 */
export type InitialData = {
  values: PlainMapping;
  trusted: boolean;
};

/** No roles: only actions open to '*' pass */
const ANONYMOUS: ActionCaller = { roles: [] };

function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
}

/**
 * Lower-cased class name of an extension, or its typeof for primitives.
 */
function extensionTypeName(extension: unknown): string {
  if ((typeof extension === 'object' && extension !== null) || typeof extension === 'function') {
    const ctor: unknown = extension.constructor;
    return typeof ctor === 'function' ? ctor.name.toLowerCase() : '';
  }
  return typeof extension;
}

function copyValue(value: unknown): unknown {
  return typeof value === 'object' && value !== null ? structuredClone(value) : value;
}

export class Entity {
  /** Read-only view of the entity's data; write methods are absent from its type */
  readonly data: ReadonlyFieldStore;

  private readonly entityClass: EntityClass;
  private readonly runtime: EntityRuntime;
  private readonly accessors: AccessorSet;
  private readonly lifecycle: EntityLifecycle;
  private readonly store: FieldStore;
  private readonly backing: FieldBacking;
  private readonly counters: PerformanceStats = { accessCount: 0, validationCount: 0, mutationCount: 0 };
  private cachedIssues: FieldIssue[] | null = null;
  private cachedHash: number | null = null;
  private readonly extensions = new Map<string, unknown>();

  /**
   * @internal Use an EntityClass factory (create, fromData, fromSnapshot).
   */
  constructor(parts: EntityParts, initial: InitialData) {
    this.entityClass = parts.entityClass;
    this.runtime = parts.runtime;
    this.accessors = parts.accessors;
    this.lifecycle = parts.lifecycle;
    this.store = parts.store;
    this.backing = parts.accessors.createBacking(parts.store);

    // initial data is not a mutation: the entity starts at version 1
    for (const [path, value] of Object.entries(initial.values)) {
      this.write(path, value, initial.trusted);
    }

    this.data = readonlyView({
      get: (path, defaultValue) => this.read(path, defaultValue),
      has: (path) => this.has(path),
      toPlainMapping: () => this.toData(),
    });
  }

  // --- Identity and metadata ---

  get id(): Id {
    return this.lifecycle.identity.id;
  }

  get type(): string {
    return this.lifecycle.identity.entityType;
  }

  get state(): LifecycleState {
    return this.lifecycle.state;
  }

  get version(): number {
    return this.lifecycle.version;
  }

  get createdAt(): Timestamp {
    return this.lifecycle.createdAt;
  }

  get updatedAt(): Timestamp {
    return this.lifecycle.updatedAt;
  }

  get tags(): readonly string[] {
    return this.lifecycle.tags;
  }

  get metadata(): PlainMapping {
    return this.lifecycle.metadata;
  }

  /**
   * The class this entity was created from.
   */
  get schema(): EntityClass {
    return this.entityClass;
  }

  /**
   * Storage strategy of a declared field.
   */
  strategyOf(field: string): FieldStrategy | undefined {
    return this.accessors.get(field)?.strategy;
  }

  // --- Field access ---

  /**
   * Read a field or dotted path.
   *
   * @example
   * ```typescript
   * user.get('username');
   * user.get('profile.bio', '');
   * ```
   */
  get(path: string, defaultValue?: unknown): unknown {
    this.counters.accessCount++;
    return this.read(path, defaultValue);
  }

  has(path: string): boolean {
    const [head, ...rest] = this.splitPath(path);
    const accessor = this.accessors.get(head);
    if (!accessor) return this.store.has(path);
    if (rest.length === 0) return accessor.isSet(this.backing);

    const value = accessor.get(this.backing);
    return isPlainObject(value) && getAtPath(value, rest).found;
  }

  /**
   * Write a field or dotted path. Nested writes under a declared field
   * replace the field with an edited copy, so the field's constraints
   * still apply.
   *
   * @throws ValidationError when the value is rejected
   */
  set(path: string, value: unknown): this {
    this.write(path, value, false);
    this.mutated();
    return this;
  }

  /**
   * Remove a field or dotted path. Clearing a declared field lets its
   * default show through again.
   */
  delete(path: string): this {
    const [head, ...rest] = this.splitPath(path);
    const accessor = this.accessors.get(head);

    if (!accessor) {
      try {
        this.store.delete(path);
      } catch (error) {
        throw this.pathFailure(path, undefined, error);
      }
    } else if (rest.length === 0) {
      accessor.clear(this.backing);
    } else {
      const current = accessor.get(this.backing);
      if (isPlainObject(current)) {
        const copy = structuredClone(current);
        if (deleteAtPath(copy, rest)) {
          accessor.set(this.backing, copy);
        }
      }
    }

    this.mutated();
    return this;
  }

  /**
   * Apply several writes in iteration order. Not atomic: a rejected pair
   * leaves the earlier pairs applied.
   */
  update(values: PlainMapping): this {
    for (const [path, value] of Object.entries(values)) {
      this.set(path, value);
    }
    return this;
  }

  // --- Tags and metadata ---

  addTag(tag: string): this {
    this.lifecycle.addTag(tag);
    this.mutated();
    return this;
  }

  removeTag(tag: string): this {
    this.lifecycle.removeTag(tag);
    this.mutated();
    return this;
  }

  setMetadata(key: string, value: unknown): this {
    this.lifecycle.setMetadata(key, value);
    this.mutated();
    return this;
  }

  // --- Validation ---

  /**
   * Every failing field with its detail, in declaration order.
   * Memoized until the next mutation.
   */
  validationIssues(): FieldIssue[] {
    if (!this.cachedIssues) {
      this.counters.validationCount++;
      const values: PlainMapping = {};
      for (const accessor of this.accessors.accessors) {
        values[accessor.field.name] = accessor.get(this.backing);
      }
      this.cachedIssues = evaluateFields(values, this.entityClass.fieldTable);
    }
    return [...this.cachedIssues];
  }

  validate(): boolean {
    return this.validationIssues().length === 0;
  }

  /**
   * @throws ValidationError for the first failing field, with every issue in `details.issues`
   */
  validateOrRaise(): void {
    const issues = this.validationIssues();
    if (issues.length === 0) return;

    const first = issues[0];
    const field = this.accessors.get(first.field)?.field;
    if (!field) {
      throw new ValidationError(`Invalid value for field "${first.field}" of ${this.type}: ${first.detail}`, {
        field: first.field,
        details: { issues },
      });
    }
    throw fieldValidationError(this.type, field, first, { issues });
  }

  // --- Lifecycle ---

  canTransitionTo(target: LifecycleState): boolean {
    return this.lifecycle.canTransitionTo(target);
  }

  allowedTransitions(): readonly LifecycleState[] {
    return this.lifecycle.allowedTransitions();
  }

  /**
   * Move to `validated`; requires every field to pass.
   */
  toValidated(): this {
    return this.transition('validated', () => this.validate());
  }

  commit(): this {
    return this.transition('committed');
  }

  archive(): this {
    return this.transition('archived');
  }

  /**
   * Bring an archived entity back to `draft`.
   */
  restore(): this {
    if (this.state !== 'archived') {
      const error = new StateError(this.state, 'draft', 'can only restore from archived state');
      this.runtime.logger.warn('Transition rejected', {
        id: this.id,
        from: error.currentState,
        to: error.targetState,
        reason: error.reason,
      });
      throw error;
    }
    return this.transition('draft');
  }

  // --- Actions ---

  /**
   * Run a declared action.
   *
   * @param caller - Defaults to a caller with no roles
   */
  executeAction(name: string, params: PlainMapping = {}, caller: ActionCaller = ANONYMOUS): unknown {
    const subject = {
      entity: this,
      id: this.id,
      type: this.type,
      version: () => this.version,
      recordCommand: () => this.mutated(),
    };
    return dispatch(this.runtime, this.entityClass.actionTable, subject, { name, params, caller });
  }

  listActions(): string[] {
    return this.entityClass.actionTable.names();
  }

  hasAction(name: string): boolean {
    return this.entityClass.actionTable.has(name);
  }

  exportActions(): Record<string, ActionExport> {
    return this.entityClass.actionTable.export();
  }

  // --- Extensions ---

  /**
   * Attach an object to this entity under a name, replacing any previous
   * one. Extensions are not field data: they are not versioned, copied or
   * serialized.
   *
   * @example
   * ```typescript
   * user.registerExtension('audit', new AuditTrail());
   * user.hasExtensionType('audit'); // true
   * ```
   */
  registerExtension(name: string, extension: unknown): this {
    this.extensions.set(name, extension);
    return this;
  }

  getExtension(name: string): unknown {
    return this.extensions.get(name);
  }

  hasExtension(name: string): boolean {
    return this.extensions.has(name);
  }

  /**
   * Names in registration order.
   */
  listExtensions(): string[] {
    return [...this.extensions.keys()];
  }

  removeExtension(name: string): boolean {
    return this.extensions.delete(name);
  }

  /**
   * Whether any extension's class name contains `type`, ignoring case.
   */
  hasExtensionType(type: string): boolean {
    const needle = type.toLowerCase();
    for (const extension of this.extensions.values()) {
      if (extensionTypeName(extension).includes(needle)) return true;
    }
    return false;
  }

  // --- Copies, equality, serialization ---

  /**
   * Deep copy of data, tags and metadata under a new identity,
   * at version 1 in `draft`.
   */
  copy(): Entity {
    return this.entityClass.fromData(this.toData(), {
      tags: this.tags,
      metadata: this.metadata,
    });
  }

  equals(other: unknown): boolean {
    return other instanceof Entity && other.id === this.id;
  }

  /**
   * Hash of the id, computed once.
   */
  hashCode(): number {
    if (this.cachedHash === null) {
      this.cachedHash = hashString(this.id);
    }
    return this.cachedHash;
  }

  /**
   * Field data as a plain mapping: declared fields first (set values, or
   * their defaults), then undeclared store entries.
   */
  toData(): PlainMapping {
    const data: PlainMapping = {};
    for (const accessor of this.accessors.accessors) {
      const value = accessor.get(this.backing);
      if (value !== undefined) {
        data[accessor.field.name] = copyValue(value);
      }
    }
    for (const [key, value] of Object.entries(this.store.toPlainMapping())) {
      if (!this.accessors.get(key)) {
        data[key] = value;
      }
    }
    return data;
  }

  toSnapshot(options: SnapshotOptions = {}): EntitySnapshot {
    const { includeSchema = false, includeActions = false } = options;
    return {
      metadata: this.lifecycle.toRecord(),
      data: this.toData(),
      ...(includeSchema ? { schema: this.entityClass.describe() } : {}),
      ...(includeActions ? { actions: this.exportActions() } : {}),
    };
  }

  getPerformanceStats(): PerformanceStats {
    return { ...this.counters };
  }

  toString(): string {
    return `${this.type}#${this.id}`;
  }

  // --- Internals ---

  private read(path: string, defaultValue: unknown): unknown {
    const [head, ...rest] = this.splitPath(path);
    const accessor = this.accessors.get(head);
    if (!accessor) return this.store.get(path, defaultValue);

    const value = accessor.get(this.backing);
    if (rest.length === 0) return value === undefined ? defaultValue : value;
    if (!isPlainObject(value)) return defaultValue;

    const nested = getAtPath(value, rest);
    return nested.found ? nested.value : defaultValue;
  }

  private transition(target: LifecycleState, gate?: () => boolean): this {
    const from = this.state;
    try {
      this.lifecycle.transitionTo(target, gate);
    } catch (error) {
      if (error instanceof StateError) {
        this.runtime.logger.warn('Transition rejected', {
          id: this.id,
          from,
          to: target,
          reason: error.reason,
        });
      }
      throw error;
    }
    this.runtime.logger.debug('Lifecycle transition', {
      id: this.id,
      from,
      to: target,
      version: this.version,
    });
    this.runtime.invalidateEntity(this.id);
    return this;
  }

  private mutated(): void {
    this.lifecycle.touch();
    this.counters.mutationCount++;
    this.cachedIssues = null;
    this.runtime.invalidateEntity(this.id);
  }

  private splitPath(path: string): string[] {
    try {
      return parsePath(path);
    } catch (error) {
      throw this.pathFailure(path, undefined, error);
    }
  }

  /**
   * Route one path write to its accessor or the Field Store.
   * Trusted writes skip constraint checks.
   */
  private write(path: string, value: unknown, trusted: boolean): void {
    const [head, ...rest] = this.splitPath(path);
    const accessor = this.accessors.get(head);
    if (!accessor) {
      this.storeSet(path, value);
      return;
    }

    let next = value;
    if (rest.length > 0) {
      const copy = this.editableCopy(accessor, path);
      try {
        setAtPath(copy, rest, value);
      } catch (error) {
        throw this.pathFailure(path, value, error);
      }
      next = copy;
    }

    if (trusted) accessor.load(this.backing, next);
    else accessor.set(this.backing, next);
  }

  private storeSet(path: string, value: unknown): void {
    try {
      this.store.set(path, value);
    } catch (error) {
      throw this.pathFailure(path, value, error);
    }
  }

  private editableCopy(accessor: FieldAccessor, path: string): Record<string, unknown> {
    const current = accessor.get(this.backing);
    if (current === undefined || current === null) return {};
    if (isPlainObject(current)) return structuredClone(current);
    throw new ValidationError(
      `Cannot set "${path}" on ${this.type}: field "${accessor.field.name}" does not hold an object`,
      { field: path, value: current }
    );
  }

  private pathFailure(path: string, value: unknown, error: unknown): ValidationError {
    let reason = String(error);
    if (error instanceof StorePathError) reason = error.reason;
    else if (error instanceof Error) reason = error.message;
    return new ValidationError(`Cannot use path "${path}" on ${this.type}: ${reason}`, {
      field: path,
      value,
      cause: error,
    });
  }
}
