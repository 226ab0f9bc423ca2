export {
  HOT_FIELD_NAMES,
  StrategyResolver,
  isHotField,
  storageKindFor,
} from './policy.js';
export type { AutoThresholds, FieldStrategy, ResolvedPolicy } from './policy.js';
export { fieldValidationError, synthesize } from './synthesizer.js';
export type { AccessorSet, FieldAccessor, FieldBacking, SynthesizeOptions } from './synthesizer.js';
