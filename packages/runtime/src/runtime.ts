// Entity Runtime - the shared context entity classes are defined against
//
// Holds the resolved config, logger, clock, id generator, AUTO strategy
// counter, the three caches, the action audit log and the optional task
// queue. A process-wide defaultRuntime exists for convenience; every entry
// point also accepts an explicit runtime.

import { randomUUID } from 'node:crypto';
import type { EntitySchemaDescriptor, Id } from '@tessera/protocol';
import { resolveConfig, type RuntimeConfig } from './config.js';
import { DefinitionError, EntityNotFoundError } from './errors.js';
import { silentLogger, type RuntimeLogger } from './logger.js';
import { systemClock, type Clock } from './lifecycle/state-machine.js';
import { StrategyResolver, type ResolvedPolicy } from './accessors/policy.js';
import { LruCache, type CacheStats } from './cache/lru.js';
import { QueryResultCache } from './cache/query-cache.js';
import { createInMemoryActionAuditLog, type ActionAuditLog } from './actions/audit.js';
import type { TaskQueue } from './actions/tasks.js';
import type { Entity } from './entities/entity.js';

export type EntityRuntimeOptions = {
  config?: Partial<RuntimeConfig>;
  logger?: RuntimeLogger;
  clock?: Clock;
  generateId?: () => Id;
  /** When set, TASK actions are enqueued instead of run inline */
  taskQueue?: TaskQueue;
  auditLog?: ActionAuditLog;
};

/**
 * What the runtime needs to know about a registered entity class.
 */
export type RegisteredClass = {
  readonly type: string;
  /** Null while an AUTO class has not been instantiated yet */
  readonly resolvedPolicy: ResolvedPolicy | null;
};

export type RuntimeStats = {
  policy: RuntimeConfig['accessorPolicy'];
  autoInstances: number;
  classCount: number;
  strategies: Record<string, ResolvedPolicy | 'unresolved'>;
  caches: {
    entities: CacheStats | null;
    schemas: CacheStats | null;
    queries: CacheStats | null;
  };
};

export class EntityRuntime {
  readonly config: Readonly<RuntimeConfig>;
  readonly logger: RuntimeLogger;
  readonly clock: Clock;
  readonly generateId: () => Id;
  readonly tasks: TaskQueue | null;
  readonly auditLog: ActionAuditLog;
  readonly strategies: StrategyResolver;
  readonly queryCache: QueryResultCache | null;

  private readonly entityCache: LruCache<Id, Entity> | null;
  private readonly schemaCache: LruCache<object, EntitySchemaDescriptor> | null;
  private readonly classes = new Map<string, RegisteredClass>();

  constructor(options: EntityRuntimeOptions = {}) {
    const {
      logger = silentLogger,
      clock = systemClock,
      generateId = randomUUID,
      taskQueue,
    } = options;

    this.config = resolveConfig(options.config);
    this.logger = logger;
    this.clock = clock;
    this.generateId = generateId;
    this.tasks = taskQueue ?? null;
    this.auditLog = options.auditLog ?? createInMemoryActionAuditLog({ maxEntries: this.config.auditLogSize });
    this.strategies = new StrategyResolver({
      fieldThreshold: this.config.autoFieldThreshold,
      instanceThreshold: this.config.autoInstanceThreshold,
    });

    this.entityCache = this.config.enableEntityCache
      ? new LruCache<Id, Entity>({
          maxSize: this.config.entityCacheSize,
          onEvict: (id) => logger.debug('Entity cache eviction', { id }),
        })
      : null;

    this.schemaCache = this.config.enableSchemaCache
      ? new LruCache<object, EntitySchemaDescriptor>({
          maxSize: this.config.schemaCacheSize,
          onEvict: (_key, schema) => logger.debug('Schema cache eviction', { type: schema.type }),
        })
      : null;

    this.queryCache = this.config.enableQueryCache
      ? new QueryResultCache(this.config.maxQueryCacheSize, logger)
      : null;
  }

  // --- Classes ---

  /**
   * Register an entity class. Types are unique per runtime.
   *
   * @throws DefinitionError when the type is already taken
   */
  registerClass(entityClass: RegisteredClass): void {
    if (this.classes.has(entityClass.type)) {
      throw new DefinitionError(entityClass.type, null, 'an entity class with this type already exists');
    }
    this.classes.set(entityClass.type, entityClass);
  }

  hasClass(type: string): boolean {
    return this.classes.has(type);
  }

  /**
   * Schema descriptor for a class, built on first request and then served
   * from the schema cache. Callers get a copy; the cached one never leaves.
   */
  describeClass(key: object, build: () => EntitySchemaDescriptor): EntitySchemaDescriptor {
    const cached = this.schemaCache?.get(key);
    if (cached) return structuredClone(cached);

    const descriptor = build();
    this.schemaCache?.put(key, descriptor);
    return structuredClone(descriptor);
  }

  // --- Entities ---

  /**
   * Remember an entity in the entity cache.
   */
  track(entity: Entity): void {
    this.entityCache?.put(entity.id, entity);
  }

  /**
   * Find a live entity by id. Only entities still in the entity cache are found.
   */
  lookup(id: Id): Entity | undefined {
    return this.entityCache?.get(id);
  }

  /**
   * @throws EntityNotFoundError when the entity is not cached
   */
  require(id: Id): Entity {
    const entity = this.lookup(id);
    if (!entity) {
      throw new EntityNotFoundError(id);
    }
    return entity;
  }

  /**
   * Drop derived state cached for one entity (query results).
   */
  invalidateEntity(id: Id): void {
    const dropped = this.queryCache?.invalidateEntity(id) ?? 0;
    if (dropped > 0) {
      this.logger.debug('Invalidated cached query results', { id, dropped });
    }
  }

  /**
   * Empty the entity, schema and query caches. Counters are kept.
   */
  clearCaches(): void {
    this.entityCache?.clear();
    this.schemaCache?.clear();
    this.queryCache?.clear();
  }

  getStats(): RuntimeStats {
    const strategies: Record<string, ResolvedPolicy | 'unresolved'> = {};
    for (const [type, entityClass] of this.classes) {
      strategies[type] = entityClass.resolvedPolicy ?? 'unresolved';
    }

    return {
      policy: this.config.accessorPolicy,
      autoInstances: this.strategies.autoInstanceCount,
      classCount: this.classes.size,
      strategies,
      caches: {
        entities: this.entityCache?.stats() ?? null,
        schemas: this.schemaCache?.stats() ?? null,
        queries: this.queryCache?.stats() ?? null,
      },
    };
  }
}

/**
 * Create a runtime.
 *
 * @example
 * ```typescript
 * const runtime = createEntityRuntime({
 *   config: { accessorPolicy: 'mixed' },
 *   logger: consoleLogger,
 * });
 * ```
 */
export function createEntityRuntime(options: EntityRuntimeOptions = {}): EntityRuntime {
  return new EntityRuntime(options);
}

/**
 * Process-wide runtime used when a class is defined without one.
 */
export const defaultRuntime: EntityRuntime = createEntityRuntime();
