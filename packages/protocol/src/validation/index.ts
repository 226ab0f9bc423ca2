// Validation utilities

export {
  constraintSetSchema,
  checkConstraintSet,
  isConstraintType,
  compileConstraints,
  evaluate,
  evaluateField,
  evaluateFields,
  evaluateAll,
  type EvaluationResult,
} from './constraints.js';

export {
  parseEntitySnapshot,
  parseCollectionBundle,
  validateSnapshot,
  validateCollectionBundle,
  type ParseResult,
  type SnapshotValidationResult,
  type SnapshotValidationError,
  type SnapshotValidationErrorCode,
} from './snapshots.js';
