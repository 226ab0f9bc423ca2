// @tessera/store
// Storage backing for entity data.
//
// - FieldStore: path-addressable key/value contract used by delegated fields
// - NestedFieldStore: the in-memory implementation, plus a read-only view
// - Codecs and bundle reader/writer for moving snapshots in and out of files

export * from './interfaces/index.js';
export * from './paths.js';
export { NestedFieldStore, createFieldStore, readonlyView } from './in-memory/index.js';
export * from './bundle/index.js';
