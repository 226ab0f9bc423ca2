// Runtime configuration
//
// One explicit config object per runtime. Values come from defaults, an
// optional partial override, and optionally the environment (read from a
// record the caller passes in, never from process.env directly).

import { z } from 'zod';
import type { AccessorPolicy } from '@tessera/protocol';
import { ValidationError } from './errors.js';

const ACCESSOR_POLICIES = ['direct', 'delegated', 'mixed', 'auto'] as const;

export const runtimeConfigSchema = z
  .object({
    /** Default storage policy for classes that don't pick one */
    accessorPolicy: z.enum(ACCESSOR_POLICIES),
    /** AUTO picks delegated storage for classes with more fields than this */
    autoFieldThreshold: z.number().int().nonnegative(),
    /** AUTO picks delegated storage once this many AUTO instances exist */
    autoInstanceThreshold: z.number().int().nonnegative(),
    enableValidation: z.boolean(),
    enableEntityCache: z.boolean(),
    enableSchemaCache: z.boolean(),
    enableQueryCache: z.boolean(),
    entityCacheSize: z.number().int().positive(),
    schemaCacheSize: z.number().int().positive(),
    maxQueryCacheSize: z.number().int().positive(),
    /** Entries kept by the default in-memory audit log */
    auditLogSize: z.number().int().positive(),
  })
  .strict();

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export const DEFAULT_CONFIG: Readonly<RuntimeConfig> = Object.freeze({
  accessorPolicy: 'direct',
  autoFieldThreshold: 10,
  autoInstanceThreshold: 1000,
  enableValidation: true,
  enableEntityCache: true,
  enableSchemaCache: true,
  enableQueryCache: true,
  entityCacheSize: 1024,
  schemaCacheSize: 100,
  maxQueryCacheSize: 1000,
  auditLogSize: 10000,
});

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws ValidationError naming the first bad key
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ accessorPolicy: 'mixed' });
 * ```
 */
export function resolveConfig(overrides: Partial<RuntimeConfig> = {}): Readonly<RuntimeConfig> {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = runtimeConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const first = issues[0];
    throw new ValidationError(`Invalid runtime config: ${first.path || 'config'}: ${first.message}`, {
      field: first.path || undefined,
      details: { issues },
    });
  }

  return Object.freeze(result.data);
}

// --- Environment ---

/**
 * Environment variables read by configFromEnv.
 */
export const CONFIG_ENV_VARS = {
  accessorPolicy: 'TESSERA_ACCESSOR_POLICY',
  enableValidation: 'TESSERA_VALIDATION',
  autoFieldThreshold: 'TESSERA_AUTO_FIELD_THRESHOLD',
  autoInstanceThreshold: 'TESSERA_AUTO_INSTANCE_THRESHOLD',
  entityCacheSize: 'TESSERA_ENTITY_CACHE_SIZE',
  schemaCacheSize: 'TESSERA_SCHEMA_CACHE_SIZE',
  auditLogSize: 'TESSERA_AUDIT_LOG_SIZE',
} as const;

type IntegerKey =
  | 'autoFieldThreshold'
  | 'autoInstanceThreshold'
  | 'entityCacheSize'
  | 'schemaCacheSize'
  | 'auditLogSize';

const INTEGER_KEYS: readonly IntegerKey[] = [
  'autoFieldThreshold',
  'autoInstanceThreshold',
  'entityCacheSize',
  'schemaCacheSize',
  'auditLogSize',
];

const POLICY_NAMES: ReadonlySet<string> = new Set<string>(ACCESSOR_POLICIES);

function isAccessorPolicy(value: string): value is AccessorPolicy {
  return POLICY_NAMES.has(value);
}

function parseBoolean(variable: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  throw new ValidationError(`${variable} must be a boolean, got "${raw}"`, {
    field: variable,
    value: raw,
  });
}

function parseInteger(variable: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(`${variable} must be a non-negative integer, got "${raw}"`, {
      field: variable,
      value: raw,
    });
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Read config overrides from an environment record.
 * Unset or empty variables are skipped; the result feeds resolveConfig.
 *
 * @example
 * ```typescript
 * const config = resolveConfig(configFromEnv(process.env));
 * ```
 */
export function configFromEnv(env: Record<string, string | undefined>): Partial<RuntimeConfig> {
  const overrides: Partial<RuntimeConfig> = {};

  const policy = env[CONFIG_ENV_VARS.accessorPolicy]?.trim().toLowerCase();
  if (policy) {
    if (!isAccessorPolicy(policy)) {
      throw new ValidationError(
        `${CONFIG_ENV_VARS.accessorPolicy} must be one of ${ACCESSOR_POLICIES.join(', ')}, got "${policy}"`,
        { field: CONFIG_ENV_VARS.accessorPolicy, value: policy }
      );
    }
    overrides.accessorPolicy = policy;
  }

  const validation = env[CONFIG_ENV_VARS.enableValidation];
  if (validation) {
    overrides.enableValidation = parseBoolean(CONFIG_ENV_VARS.enableValidation, validation);
  }

  for (const key of INTEGER_KEYS) {
    const variable = CONFIG_ENV_VARS[key];
    const raw = env[variable];
    if (raw) {
      overrides[key] = parseInteger(variable, raw);
    }
  }

  return overrides;
}
