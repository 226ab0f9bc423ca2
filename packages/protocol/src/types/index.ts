// Re-export all protocol types

export * from './common.js';
export * from './fields.js';
export * from './actions.js';
export * from './entities.js';
export * from './snapshots.js';
