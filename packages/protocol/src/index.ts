// @tessera/protocol
// Entity, field, action and snapshot types, and the constraint evaluator.

export * from './types/index.js';
export * from './validation/index.js';
