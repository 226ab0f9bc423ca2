export { Entity } from './entity.js';
export type { EntityParts, InitialData, PerformanceStats, SnapshotOptions } from './entity.js';
export { EntityClass, defineEntityClass } from './entity-class.js';
export type { CreateOptions, EntityClassDefinition } from './entity-class.js';
export { readCollectionBundle, readEntitySnapshot } from './serialization.js';
export { loadCollection, loadEntity, saveCollection, saveEntity } from './persistence.js';
export type { LoadOptions, SaveOptions } from './persistence.js';
