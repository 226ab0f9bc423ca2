export { EntityLifecycle, LIFECYCLE_TRANSITIONS, systemClock } from './state-machine.js';
export type { Clock, LifecycleInit } from './state-machine.js';
