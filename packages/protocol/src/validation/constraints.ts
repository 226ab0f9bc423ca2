// Constraint evaluation
//
// Compiles ConstraintSets into zod schemas and evaluates values against them.
// Compiled schemas are cached per constraint-set object, so a class's field
// table is compiled once no matter how many instances validate against it.

import { z } from 'zod';
import type {
  ConstraintSet,
  ConstraintType,
  FieldIssue,
  FieldSpec,
} from '../types/fields.js';

/**
 * Result of evaluating one value.
 */
export type EvaluationResult = {
  ok: boolean;
  detail?: string;
};

const CONSTRAINT_TYPES: readonly ConstraintType[] = [
  'string',
  'number',
  'integer',
  'boolean',
  'object',
  'array',
  'any',
];

/**
 * Shape of a well-formed constraint set.
 */
export const constraintSetSchema = z
  .object({
    type: z.enum(['string', 'number', 'integer', 'boolean', 'object', 'array', 'any']).optional(),
    minLength: z.number().int().nonnegative().optional(),
    maxLength: z.number().int().nonnegative().optional(),
    pattern: z.string().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    exclusiveMin: z.number().optional(),
    exclusiveMax: z.number().optional(),
    multipleOf: z.number().positive().optional(),
    enum: z.array(z.unknown()).readonly().optional(),
    minItems: z.number().int().nonnegative().optional(),
    maxItems: z.number().int().nonnegative().optional(),
    uniqueItems: z.boolean().optional(),
    nullable: z.boolean().optional(),
    required: z.boolean().optional(),
    description: z.string().optional(),
  })
  .strict();

const CONSTRAINT_TYPE_NAMES: ReadonlySet<string> = new Set<string>(CONSTRAINT_TYPES);

const compiled = new WeakMap<ConstraintSet, z.ZodTypeAny>();

/**
 * Check that a constraint set is well-formed.
 *
 * @returns A list of problems; empty when the set can be compiled.
 */
export function checkConstraintSet(constraints: unknown): string[] {
  const problems: string[] = [];
  const parsed = constraintSetSchema.safeParse(constraints);

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'constraints';
      problems.push(`${where}: ${issue.message}`);
    }
    return problems;
  }

  const set = parsed.data;

  if (set.pattern !== undefined) {
    try {
      new RegExp(set.pattern);
    } catch {
      problems.push(`pattern: not a valid regular expression: ${set.pattern}`);
    }
  }

  if (set.minLength !== undefined && set.maxLength !== undefined && set.minLength > set.maxLength) {
    problems.push('minLength must not exceed maxLength');
  }

  if (set.min !== undefined && set.max !== undefined && set.min > set.max) {
    problems.push('min must not exceed max');
  }

  if (set.minItems !== undefined && set.maxItems !== undefined && set.minItems > set.maxItems) {
    problems.push('minItems must not exceed maxItems');
  }

  if (set.enum !== undefined && set.enum.length === 0) {
    problems.push('enum must list at least one value');
  }

  return problems;
}

/**
 * Whether a string names a known constraint type.
 */
export function isConstraintType(value: string): value is ConstraintType {
  return CONSTRAINT_TYPE_NAMES.has(value);
}

// --- Schema builders ---

function stringSchema(c: ConstraintSet): z.ZodString {
  let schema = z.string({ invalid_type_error: 'expected a string' });
  if (c.minLength !== undefined) {
    schema = schema.min(c.minLength, { message: `length must be at least ${c.minLength}` });
  }
  if (c.maxLength !== undefined) {
    schema = schema.max(c.maxLength, { message: `length must be at most ${c.maxLength}` });
  }
  if (c.pattern !== undefined) {
    schema = schema.regex(new RegExp(c.pattern), {
      message: `must match pattern ${c.pattern}`,
    });
  }
  return schema;
}

function numberSchema(c: ConstraintSet, integer: boolean): z.ZodNumber {
  let schema = z.number({ invalid_type_error: integer ? 'expected an integer' : 'expected a number' });
  if (integer) {
    schema = schema.int({ message: 'expected an integer' });
  }
  if (c.min !== undefined) {
    schema = schema.gte(c.min, { message: `must be at least ${c.min}` });
  }
  if (c.max !== undefined) {
    schema = schema.lte(c.max, { message: `must be at most ${c.max}` });
  }
  if (c.exclusiveMin !== undefined) {
    schema = schema.gt(c.exclusiveMin, { message: `must be greater than ${c.exclusiveMin}` });
  }
  if (c.exclusiveMax !== undefined) {
    schema = schema.lt(c.exclusiveMax, { message: `must be less than ${c.exclusiveMax}` });
  }
  if (c.multipleOf !== undefined) {
    schema = schema.multipleOf(c.multipleOf, { message: `must be a multiple of ${c.multipleOf}` });
  }
  return schema;
}

function arraySchema(c: ConstraintSet): z.ZodTypeAny {
  let schema = z.array(z.unknown(), { invalid_type_error: 'expected an array' });
  if (c.minItems !== undefined) {
    schema = schema.min(c.minItems, { message: `must contain at least ${c.minItems} items` });
  }
  if (c.maxItems !== undefined) {
    schema = schema.max(c.maxItems, { message: `must contain at most ${c.maxItems} items` });
  }
  if (c.uniqueItems) {
    return schema.refine(
      (items) => new Set(items.map((item) => JSON.stringify(item))).size === items.length,
      { message: 'items must be unique' }
    );
  }
  return schema;
}

/**
 * Untyped constraint sets apply whichever checks fit the runtime value.
 */
function untypedSchema(c: ConstraintSet): z.ZodTypeAny {
  return z.unknown().superRefine((value, ctx) => {
    let typed: z.ZodTypeAny | null = null;
    if (typeof value === 'string') typed = stringSchema(c);
    else if (typeof value === 'number') typed = numberSchema(c, false);
    else if (Array.isArray(value)) typed = arraySchema(c);

    if (!typed) return;

    const result = typed.safeParse(value);
    if (!result.success) {
      for (const issue of result.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message });
      }
    }
  });
}

function baseSchema(c: ConstraintSet): z.ZodTypeAny {
  switch (c.type) {
    case 'string':
      return stringSchema(c);
    case 'number':
      return numberSchema(c, false);
    case 'integer':
      return numberSchema(c, true);
    case 'boolean':
      return z.boolean({ invalid_type_error: 'expected a boolean' });
    case 'object':
      return z.record(z.unknown(), { invalid_type_error: 'expected an object' });
    case 'array':
      return arraySchema(c);
    case 'any':
    case undefined:
      return untypedSchema(c);
  }
}

/**
 * Compile a constraint set into a zod schema.
 * The result is cached for the lifetime of the constraint-set object.
 */
export function compileConstraints(constraints: ConstraintSet): z.ZodTypeAny {
  const cached = compiled.get(constraints);
  if (cached) return cached;

  let schema = baseSchema(constraints);

  const allowed = constraints.enum;
  if (allowed !== undefined) {
    schema = schema.refine((value) => allowed.some((candidate) => candidate === value), {
      message: `must be one of: ${allowed.map((v) => JSON.stringify(v)).join(', ')}`,
    });
  }

  if (constraints.nullable) {
    schema = schema.nullable();
  }

  compiled.set(constraints, schema);
  return schema;
}

// --- Evaluator ---

/**
 * Evaluate a single value against a constraint set.
 *
 * @example
 * ```typescript
 * evaluate('ab', { type: 'string', minLength: 3 });
 * // => { ok: false, detail: 'length must be at least 3' }
 * ```
 */
export function evaluate(value: unknown, constraints: ConstraintSet): EvaluationResult {
  const result = compileConstraints(constraints).safeParse(value);
  if (result.success) {
    return { ok: true };
  }
  return { ok: false, detail: result.error.issues[0]?.message ?? 'invalid value' };
}

/**
 * Evaluate one field's current value.
 *
 * Missing values (undefined or null) fail only when the field is required;
 * present values are checked against the field's constraints.
 */
export function evaluateField(field: FieldSpec, value: unknown): FieldIssue | null {
  if (value === undefined || value === null) {
    if (field.required) {
      return { field: field.name, value, detail: 'value is required', required: true };
    }
    return null;
  }

  const result = evaluate(value, field.constraints);
  if (result.ok) return null;

  return {
    field: field.name,
    value,
    detail: result.detail ?? 'invalid value',
    required: false,
  };
}

/**
 * Evaluate every field of a table, in declaration order.
 *
 * @returns All failing fields; empty when every field passes.
 */
export function evaluateFields(
  valuesByField: Record<string, unknown>,
  fieldTable: readonly FieldSpec[]
): FieldIssue[] {
  const issues: FieldIssue[] = [];
  for (const field of fieldTable) {
    const issue = evaluateField(field, valuesByField[field.name]);
    if (issue) issues.push(issue);
  }
  return issues;
}

/**
 * Whether every field of a table passes.
 */
export function evaluateAll(
  valuesByField: Record<string, unknown>,
  fieldTable: readonly FieldSpec[]
): boolean {
  return evaluateFields(valuesByField, fieldTable).length === 0;
}
