// Field types - declared fields, their constraint sets and storage

/**
 * Primitive shapes a constraint set can require.
 * `any` (or omitting `type`) applies only the checks that fit the value it sees.
 */
export type ConstraintType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'object'
  | 'array'
  | 'any';

/**
 * A ConstraintSet is the rule vocabulary understood by the schema evaluator.
 * It is plain data so it can be exported with a schema descriptor and
 * loaded back without code.
 */
export type ConstraintSet = {
  type?: ConstraintType;

  /** String length bounds (inclusive) */
  minLength?: number;
  maxLength?: number;

  /** Regular expression source a string must match */
  pattern?: string;

  /** Numeric bounds (inclusive) */
  min?: number;
  max?: number;

  /** Numeric bounds (exclusive) */
  exclusiveMin?: number;
  exclusiveMax?: number;

  multipleOf?: number;

  /** Allowed literal values */
  enum?: readonly unknown[];

  /** Array length bounds and uniqueness */
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;

  /** Whether null passes */
  nullable?: boolean;

  /**
   * Whether the value must be supplied.
   * Used for action inputs; field requiredness comes from the absence of a default.
   */
  required?: boolean;

  description?: string;
};

/**
 * How a field's value is stored on an instance.
 * - direct: a private slot on the instance
 * - delegated: the instance's field store, under the field name
 */
export type StorageKind = 'direct' | 'delegated';

/**
 * Class-level policy for choosing field storage.
 * - direct / delegated: every field uses that strategy
 * - mixed: identity-like fields are direct, the rest delegated
 * - auto: resolved once per class from field count and instance volume
 */
export type AccessorPolicy = 'direct' | 'delegated' | 'mixed' | 'auto';

/**
 * What a class author writes for each field.
 */
export type FieldDeclaration = {
  name: string;
  constraints?: ConstraintSet;

  /**
   * Value returned while the field is unset.
   * A field without a default is required.
   */
  default?: unknown;

  /** Pins this field's storage regardless of the class policy */
  storage?: StorageKind;

  description?: string;
};

/**
 * A FieldSpec is the immutable, normalized form of a FieldDeclaration.
 * Collected in declaration order into a class's field table.
 */
export type FieldSpec = {
  readonly name: string;
  readonly constraints: ConstraintSet;
  readonly defaultValue: unknown;
  readonly required: boolean;
  readonly storage?: StorageKind;
  readonly description?: string;
};

/**
 * A failed check for one field.
 */
export type FieldIssue = {
  field: string;
  value: unknown;
  detail: string;

  /** True when the failure is a missing required value */
  required: boolean;
};
