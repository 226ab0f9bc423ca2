// Tests for constraint evaluation

import { describe, it, expect } from 'vitest';
import type { ConstraintSet, FieldSpec } from '../types/fields.js';
import {
  checkConstraintSet,
  compileConstraints,
  evaluate,
  evaluateAll,
  evaluateField,
  evaluateFields,
} from './constraints.js';

// --- Test Fixtures ---

function createField(
  name: string,
  constraints: ConstraintSet,
  overrides: Partial<FieldSpec> = {}
): FieldSpec {
  return {
    name,
    constraints,
    defaultValue: null,
    required: false,
    ...overrides,
  };
}

const usernameField = createField(
  'username',
  { type: 'string', minLength: 3, maxLength: 20 },
  { defaultValue: undefined, required: true }
);
const ageField = createField('age', { type: 'integer', min: 0, max: 150 });

// --- Tests ---

describe('evaluate', () => {
  describe('strings', () => {
    const constraints: ConstraintSet = { type: 'string', minLength: 3, maxLength: 5, pattern: '^[a-z]+$' };

    it('accepts a value inside every bound', () => {
      expect(evaluate('abcd', constraints)).toEqual({ ok: true });
    });

    it('reports the length lower bound', () => {
      expect(evaluate('ab', constraints)).toEqual({ ok: false, detail: 'length must be at least 3' });
    });

    it('reports the length upper bound', () => {
      expect(evaluate('abcdef', constraints)).toEqual({ ok: false, detail: 'length must be at most 5' });
    });

    it('reports a pattern mismatch', () => {
      expect(evaluate('ABC', constraints)).toEqual({ ok: false, detail: 'must match pattern ^[a-z]+$' });
    });

    it('rejects non-strings', () => {
      expect(evaluate(42, constraints)).toEqual({ ok: false, detail: 'expected a string' });
    });
  });

  describe('numbers', () => {
    it('checks inclusive bounds', () => {
      const constraints: ConstraintSet = { type: 'number', min: 0, max: 150 };
      expect(evaluate(0, constraints).ok).toBe(true);
      expect(evaluate(150, constraints).ok).toBe(true);
      expect(evaluate(-1, constraints)).toEqual({ ok: false, detail: 'must be at least 0' });
      expect(evaluate(151, constraints)).toEqual({ ok: false, detail: 'must be at most 150' });
    });

    it('checks exclusive bounds', () => {
      const constraints: ConstraintSet = { type: 'number', exclusiveMin: 0, exclusiveMax: 1 };
      expect(evaluate(0.5, constraints).ok).toBe(true);
      expect(evaluate(0, constraints)).toEqual({ ok: false, detail: 'must be greater than 0' });
      expect(evaluate(1, constraints)).toEqual({ ok: false, detail: 'must be less than 1' });
    });

    it('checks integers and multiples', () => {
      expect(evaluate(2.5, { type: 'integer' })).toEqual({ ok: false, detail: 'expected an integer' });
      expect(evaluate(10, { type: 'integer', multipleOf: 5 }).ok).toBe(true);
      expect(evaluate(12, { type: 'integer', multipleOf: 5 })).toEqual({
        ok: false,
        detail: 'must be a multiple of 5',
      });
    });
  });

  describe('arrays', () => {
    it('checks item counts and uniqueness', () => {
      const constraints: ConstraintSet = { type: 'array', minItems: 1, maxItems: 3, uniqueItems: true };
      expect(evaluate(['a', 'b'], constraints).ok).toBe(true);
      expect(evaluate([], constraints)).toEqual({ ok: false, detail: 'must contain at least 1 items' });
      expect(evaluate(['a', 'b', 'c', 'd'], constraints)).toEqual({
        ok: false,
        detail: 'must contain at most 3 items',
      });
      expect(evaluate(['a', 'a'], constraints)).toEqual({ ok: false, detail: 'items must be unique' });
    });
  });

  describe('enum and nullable', () => {
    it('accepts only listed values', () => {
      const constraints: ConstraintSet = { enum: ['user', 'admin'] };
      expect(evaluate('admin', constraints).ok).toBe(true);
      expect(evaluate('root', constraints)).toEqual({
        ok: false,
        detail: 'must be one of: "user", "admin"',
      });
    });

    it('lets null through only when nullable', () => {
      expect(evaluate(null, { type: 'string' }).ok).toBe(false);
      expect(evaluate(null, { type: 'string', nullable: true }).ok).toBe(true);
    });
  });

  describe('untyped constraint sets', () => {
    const constraints: ConstraintSet = { minLength: 2, min: 10 };

    it('applies string checks to strings', () => {
      expect(evaluate('a', constraints)).toEqual({ ok: false, detail: 'length must be at least 2' });
    });

    it('applies numeric checks to numbers', () => {
      expect(evaluate(5, constraints)).toEqual({ ok: false, detail: 'must be at least 10' });
      expect(evaluate(10, constraints).ok).toBe(true);
    });

    it('accepts values no check applies to', () => {
      expect(evaluate(true, constraints).ok).toBe(true);
    });
  });

  it('caches compiled schemas per constraint set', () => {
    const constraints: ConstraintSet = { type: 'string' };
    expect(compileConstraints(constraints)).toBe(compileConstraints(constraints));
  });
});

describe('checkConstraintSet', () => {
  it('accepts a well-formed set', () => {
    expect(checkConstraintSet({ type: 'string', minLength: 1, maxLength: 4 })).toEqual([]);
  });

  it('rejects inverted bounds', () => {
    expect(checkConstraintSet({ min: 5, max: 1 })).toEqual(['min must not exceed max']);
    expect(checkConstraintSet({ minLength: 5, maxLength: 1 })).toEqual([
      'minLength must not exceed maxLength',
    ]);
  });

  it('rejects invalid regular expressions', () => {
    expect(checkConstraintSet({ pattern: '([' })).toEqual([
      'pattern: not a valid regular expression: ([',
    ]);
  });

  it('rejects an empty enum', () => {
    expect(checkConstraintSet({ enum: [] })).toEqual(['enum must list at least one value']);
  });

  it('rejects unknown keys and wrong types', () => {
    expect(checkConstraintSet({ minimum: 3 })).toHaveLength(1);
    expect(checkConstraintSet({ minLength: -1 })[0]).toMatch(/^minLength: /);
  });
});

describe('evaluateField', () => {
  it('fails a missing required value', () => {
    expect(evaluateField(usernameField, undefined)).toEqual({
      field: 'username',
      value: undefined,
      detail: 'value is required',
      required: true,
    });
  });

  it('skips a missing optional value', () => {
    expect(evaluateField(ageField, null)).toBeNull();
  });

  it('reports a constraint failure', () => {
    expect(evaluateField(ageField, 200)).toEqual({
      field: 'age',
      value: 200,
      detail: 'must be at most 150',
      required: false,
    });
  });
});

describe('evaluateFields / evaluateAll', () => {
  const table = [usernameField, ageField];

  it('passes when every field passes', () => {
    expect(evaluateAll({ username: 'abc', age: 30 }, table)).toBe(true);
  });

  it('lists failures in declaration order', () => {
    const issues = evaluateFields({ username: 'ab', age: 200 }, table);
    expect(issues.map((issue) => issue.field)).toEqual(['username', 'age']);
    expect(evaluateAll({ username: 'ab', age: 200 }, table)).toBe(false);
  });
});
