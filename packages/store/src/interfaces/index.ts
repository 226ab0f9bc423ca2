export type { FieldStore, ReadonlyFieldStore } from './field-store.js';
