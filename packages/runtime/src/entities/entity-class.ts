// Entity classes
//
// defineEntityClass turns a declaration into an immutable field table and
// action table, synthesizes accessors (lazily for AUTO classes) and
// registers the class with its runtime. The class is then the factory for
// its entities.

import { checkConstraintSet, evaluate } from '@tessera/protocol';
import type {
  AccessorPolicy,
  ActionExport,
  CollectionBundle,
  EntitySchemaDescriptor,
  FieldDeclaration,
  FieldDescriptor,
  FieldSpec,
  Id,
  LifecycleState,
  PlainMapping,
  Timestamp,
} from '@tessera/protocol';
import { createFieldStore } from '@tessera/store';
import { DefinitionError, ValidationError } from '../errors.js';
import { defaultRuntime, type EntityRuntime } from '../runtime.js';
import { EntityLifecycle } from '../lifecycle/state-machine.js';
import { synthesize, type AccessorSet } from '../accessors/synthesizer.js';
import type { ResolvedPolicy } from '../accessors/policy.js';
import { ActionTable, type ActionDeclaration } from '../actions/registry.js';
import { Entity, type SnapshotOptions } from './entity.js';
import { readCollectionBundle, readEntitySnapshot } from './serialization.js';

const ACCESSOR_POLICIES: readonly AccessorPolicy[] = ['direct', 'delegated', 'mixed', 'auto'];

export type EntityClassDefinition = {
  type: string;
  fields?: readonly FieldDeclaration[];
  actions?: readonly ActionDeclaration<Entity>[];
  /** Defaults to the runtime's accessorPolicy */
  policy?: AccessorPolicy;
  description?: string;
};

export type CreateOptions = {
  id?: Id;
  tags?: readonly string[];
  metadata?: PlainMapping;
};

type InstanceInit = CreateOptions & {
  state?: LifecycleState;
  version?: number;
  createdAt?: Timestamp;
  updatedAt?: Timestamp;
};

// --- Field table ---

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

/**
 * The class owns its defaults: a private, frozen copy of what was declared.
 */
function copyDefault(entityType: string, name: string, value: unknown): unknown {
  if (typeof value !== 'object' || value === null) return value;
  try {
    return deepFreeze(structuredClone(value));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DefinitionError(entityType, name, `default value cannot be copied: ${reason}`);
  }
}

function buildFieldSpec(entityType: string, declaration: FieldDeclaration): FieldSpec {
  const { name } = declaration;

  if (typeof name !== 'string' || name.length === 0) {
    throw new DefinitionError(entityType, null, 'field name must be a non-empty string');
  }
  if (name.includes('.')) {
    throw new DefinitionError(entityType, name, 'field names may not contain "."');
  }
  if (declaration.storage !== undefined && declaration.storage !== 'direct' && declaration.storage !== 'delegated') {
    throw new DefinitionError(entityType, name, `unknown storage "${String(declaration.storage)}"`);
  }

  const constraints = declaration.constraints ?? {};
  const problems = checkConstraintSet(constraints);
  if (problems.length > 0) {
    throw new DefinitionError(entityType, name, problems.join('; '));
  }

  const defaultValue = copyDefault(entityType, name, declaration.default);
  if (defaultValue !== undefined && defaultValue !== null) {
    const result = evaluate(defaultValue, constraints);
    if (!result.ok) {
      throw new DefinitionError(entityType, name, `default value is invalid: ${result.detail}`);
    }
  }

  return Object.freeze({
    name,
    constraints: Object.freeze({ ...constraints }),
    defaultValue,
    required: defaultValue === undefined,
    ...(declaration.storage ? { storage: declaration.storage } : {}),
    ...(declaration.description ? { description: declaration.description } : {}),
  });
}

function buildFieldTable(entityType: string, declarations: readonly FieldDeclaration[]): readonly FieldSpec[] {
  const seen = new Set<string>();
  const table: FieldSpec[] = [];
  for (const declaration of declarations) {
    const spec = buildFieldSpec(entityType, declaration);
    if (seen.has(spec.name)) {
      throw new DefinitionError(entityType, spec.name, 'duplicate field name');
    }
    seen.add(spec.name);
    table.push(spec);
  }
  return Object.freeze(table);
}

// --- Class ---

export class EntityClass {
  readonly type: string;
  readonly policy: AccessorPolicy;
  readonly description: string;
  readonly fieldTable: readonly FieldSpec[];
  readonly actionTable: ActionTable<Entity>;
  readonly runtime: EntityRuntime;

  private accessorSet: AccessorSet | null = null;

  constructor(definition: EntityClassDefinition, runtime: EntityRuntime) {
    const { type } = definition;
    if (typeof type !== 'string' || type.length === 0) {
      throw new DefinitionError(String(type), null, 'entity type must be a non-empty string');
    }

    const policy = definition.policy ?? runtime.config.accessorPolicy;
    if (!ACCESSOR_POLICIES.includes(policy)) {
      throw new DefinitionError(type, null, `unknown accessor policy "${policy}"`);
    }

    this.type = type;
    this.policy = policy;
    this.description = definition.description ?? '';
    this.runtime = runtime;
    this.fieldTable = buildFieldTable(type, definition.fields ?? []);
    this.actionTable = new ActionTable(type, definition.actions ?? []);

    if (policy !== 'auto') {
      this.accessorSet = this.synthesize(policy);
    }

    runtime.registerClass(this);
    runtime.logger.debug('Entity class defined', {
      type,
      policy,
      fieldCount: this.fieldTable.length,
      actionCount: this.actionTable.size,
    });
  }

  /**
   * Concrete policy in use, or null for an AUTO class not yet instantiated.
   */
  get resolvedPolicy(): ResolvedPolicy | null {
    return this.accessorSet?.policy ?? null;
  }

  // --- Factories ---

  /**
   * Create a new draft entity. Supplied values are checked against their
   * field constraints; required fields may still be missing until the
   * entity is validated.
   *
   * @throws ValidationError when a supplied value is rejected
   *
   * @example
   * ```typescript
   * const user = User.create({ username: 'ada' }, { tags: ['beta'] });
   * ```
   */
  create(values: PlainMapping = {}, options: CreateOptions = {}): Entity {
    return this.instantiate({ values, trusted: false }, options);
  }

  /**
   * Build an entity from trusted field data, without validation.
   */
  fromData(data: PlainMapping, options: CreateOptions = {}): Entity {
    return this.instantiate({ values: data, trusted: true }, options);
  }

  /**
   * Rebuild an entity from a snapshot. State, version, timestamps, tags and
   * metadata are restored; `id` overrides the snapshot's id.
   *
   * @throws ValidationError when the snapshot is malformed or of another type
   */
  fromSnapshot(input: unknown, options: { id?: Id } = {}): Entity {
    const snapshot = readEntitySnapshot(input, this.type);
    const { metadata } = snapshot;
    return this.instantiate(
      { values: snapshot.data, trusted: true },
      {
        id: options.id ?? metadata.id,
        state: metadata.state,
        version: metadata.version,
        createdAt: metadata.createdAt,
        updatedAt: metadata.updatedAt,
        tags: metadata.tags,
        metadata: metadata.metadata,
      }
    );
  }

  /**
   * Bundle entities of this class. Schema and actions are written once for
   * the whole collection.
   */
  toCollection(entities: readonly Entity[], options: SnapshotOptions = {}): CollectionBundle {
    const data: Record<Id, PlainMapping> = {};
    for (const entity of entities) {
      if (entity.type !== this.type) {
        throw new ValidationError(`Cannot bundle ${entity.toString()} into a ${this.type} collection`, {
          field: 'type',
          value: entity.type,
        });
      }
      data[entity.id] = entity.toData();
    }

    return {
      metadata: {
        type: this.type,
        entityCount: Object.keys(data).length,
        exportedAt: this.runtime.clock().toISOString(),
      },
      data,
      ...(options.includeSchema ? { schema: this.describe() } : {}),
      ...(options.includeActions ? { actions: this.actionTable.export() } : {}),
    };
  }

  /**
   * Rebuild the entities of a bundle, in bundle order, as drafts.
   */
  fromCollection(input: unknown): Entity[] {
    const bundle = readCollectionBundle(input, this.type);
    return Object.entries(bundle.data).map(([id, data]) => this.fromData(data, { id }));
  }

  // --- Introspection ---

  /**
   * Plain schema descriptor, built once into the runtime's schema cache.
   * Every call returns a fresh copy.
   */
  describe(): EntitySchemaDescriptor {
    return this.runtime.describeClass(this, () => ({
      type: this.type,
      policy: this.policy,
      fields: this.fieldTable.map((field): FieldDescriptor => ({
        name: field.name,
        constraints: { ...field.constraints },
        ...(field.defaultValue !== undefined ? { default: field.defaultValue } : {}),
        required: field.required,
        ...(field.storage ? { storage: field.storage } : {}),
        ...(field.description ? { description: field.description } : {}),
      })),
    }));
  }

  exportActions(): Record<string, ActionExport> {
    return this.actionTable.export();
  }

  toString(): string {
    return `EntityClass(${this.type})`;
  }

  // --- Internals ---

  private synthesize(policy: ResolvedPolicy): AccessorSet {
    return synthesize(this.fieldTable, policy, {
      entityType: this.type,
      validate: this.runtime.config.enableValidation,
    });
  }

  /**
   * Accessors for a new instance. AUTO classes count every instance and
   * resolve their policy on the first one.
   */
  private accessorsForInstance(): AccessorSet {
    if (this.policy !== 'auto') {
      return this.accessorSet ?? this.synthesize(this.policy);
    }

    const autoInstances = this.runtime.strategies.recordAutoInstance();
    if (this.accessorSet) return this.accessorSet;

    const resolved = this.runtime.strategies.resolveAuto(this.fieldTable.length);
    const accessors = this.synthesize(resolved);
    this.accessorSet = accessors;
    this.runtime.logger.debug('Resolved AUTO accessor policy', {
      type: this.type,
      policy: resolved,
      fieldCount: this.fieldTable.length,
      autoInstances,
    });
    return accessors;
  }

  private instantiate(initial: { values: PlainMapping; trusted: boolean }, init: InstanceInit): Entity {
    const accessors = this.accessorsForInstance();
    const lifecycle = new EntityLifecycle({
      identity: { id: init.id ?? this.runtime.generateId(), entityType: this.type },
      clock: this.runtime.clock,
      state: init.state,
      version: init.version,
      createdAt: init.createdAt,
      updatedAt: init.updatedAt,
      tags: init.tags,
      metadata: init.metadata,
    });

    const entity = new Entity(
      { entityClass: this, runtime: this.runtime, accessors, lifecycle, store: createFieldStore() },
      initial
    );
    this.runtime.track(entity);
    return entity;
  }
}

/**
 * Define an entity class.
 *
 * @example
 * ```typescript
 * const User = defineEntityClass({
 *   type: 'user',
 *   fields: [
 *     { name: 'username', constraints: { type: 'string', minLength: 3, maxLength: 20 } },
 *     { name: 'age', constraints: { type: 'integer', min: 0, max: 150 }, default: null },
 *   ],
 *   actions: [
 *     { name: 'greet', profile: 'query', handler: (user) => `hi ${String(user.get('username'))}` },
 *   ],
 * });
 * ```
 */
export function defineEntityClass(
  definition: EntityClassDefinition,
  runtime: EntityRuntime = defaultRuntime
): EntityClass {
  return new EntityClass(definition, runtime);
}
