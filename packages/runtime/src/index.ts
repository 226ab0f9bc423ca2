// @tessera/runtime
// Schema-driven entities: synthesized field accessors, a lifecycle state
// machine, role-checked actions and the caches around them.

// Runtime context
export {
  EntityRuntime,
  createEntityRuntime,
  defaultRuntime,
  type EntityRuntimeOptions,
  type RegisteredClass,
  type RuntimeStats,
} from './runtime.js';

// Configuration
export {
  CONFIG_ENV_VARS,
  DEFAULT_CONFIG,
  configFromEnv,
  resolveConfig,
  runtimeConfigSchema,
  type RuntimeConfig,
} from './config.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type RuntimeLogger,
  type LogEntry,
} from './logger.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  StateError,
  ActionNotFoundError,
  AuthorizationError,
  DefinitionError,
  ActionExecutionError,
  EntityNotFoundError,
  type ValidationErrorOptions,
} from './errors.js';

// Entities
export * from './entities/index.js';

// Accessor synthesis
export * from './accessors/index.js';

// Lifecycle
export * from './lifecycle/index.js';

// Actions
export * from './actions/index.js';

// Caches
export * from './cache/index.js';
