// Tests for runtime configuration

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, configFromEnv, resolveConfig } from './config.js';
import { ValidationError } from './errors.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('resolveConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.accessorPolicy).toBe('direct');
    expect(DEFAULT_CONFIG.entityCacheSize).toBe(1024);
    expect(DEFAULT_CONFIG.schemaCacheSize).toBe(100);
    expect(DEFAULT_CONFIG.maxQueryCacheSize).toBe(1000);
    expect(DEFAULT_CONFIG.auditLogSize).toBe(10000);
  });

  it('merges overrides onto the defaults', () => {
    const config = resolveConfig({ accessorPolicy: 'mixed', entityCacheSize: 8 });

    expect(config.accessorPolicy).toBe('mixed');
    expect(config.entityCacheSize).toBe(8);
    expect(config.autoFieldThreshold).toBe(10);
  });

  it('ignores overrides left undefined', () => {
    expect(resolveConfig({ enableValidation: undefined }).enableValidation).toBe(true);
  });

  it('rejects invalid values with a ValidationError naming the key', () => {
    const error = captureError(() => resolveConfig({ entityCacheSize: 0 }));

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.field).toBe('entityCacheSize');
      expect(error.message).toMatch(/^Invalid runtime config: entityCacheSize: /);
    }
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(resolveConfig())).toBe(true);
  });
});

describe('configFromEnv', () => {
  it('reads the known variables', () => {
    const overrides = configFromEnv({
      TESSERA_ACCESSOR_POLICY: 'MIXED',
      TESSERA_VALIDATION: 'false',
      TESSERA_AUTO_FIELD_THRESHOLD: '5',
      TESSERA_AUTO_INSTANCE_THRESHOLD: '50',
      TESSERA_ENTITY_CACHE_SIZE: '64',
      TESSERA_SCHEMA_CACHE_SIZE: '16',
      TESSERA_AUDIT_LOG_SIZE: '500',
      UNRELATED: 'ignored',
    });

    expect(overrides).toEqual({
      accessorPolicy: 'mixed',
      enableValidation: false,
      autoFieldThreshold: 5,
      autoInstanceThreshold: 50,
      entityCacheSize: 64,
      schemaCacheSize: 16,
      auditLogSize: 500,
    });
  });

  it('skips unset and empty variables', () => {
    expect(configFromEnv({})).toEqual({});
    expect(configFromEnv({ TESSERA_VALIDATION: '' })).toEqual({});
  });

  it('accepts yes/no style booleans', () => {
    expect(configFromEnv({ TESSERA_VALIDATION: 'yes' })).toEqual({ enableValidation: true });
    expect(configFromEnv({ TESSERA_VALIDATION: '0' })).toEqual({ enableValidation: false });
  });

  it('feeds resolveConfig', () => {
    const config = resolveConfig(configFromEnv({ TESSERA_ACCESSOR_POLICY: 'auto' }));
    expect(config.accessorPolicy).toBe('auto');
  });

  it('rejects an unknown policy', () => {
    expect(() => configFromEnv({ TESSERA_ACCESSOR_POLICY: 'fast' })).toThrow(
      'TESSERA_ACCESSOR_POLICY must be one of direct, delegated, mixed, auto, got "fast"'
    );
  });

  it('rejects malformed numbers and booleans', () => {
    expect(() => configFromEnv({ TESSERA_SCHEMA_CACHE_SIZE: 'ten' })).toThrow(
      'TESSERA_SCHEMA_CACHE_SIZE must be a non-negative integer, got "ten"'
    );
    expect(() => configFromEnv({ TESSERA_VALIDATION: 'maybe' })).toThrow(ValidationError);
  });
});
