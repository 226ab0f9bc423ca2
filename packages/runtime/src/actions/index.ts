export { ActionTable, isAuthorized } from './registry.js';
export type { ActionContext, ActionDeclaration, ActionHandler, ActionSpec } from './registry.js';
export { checkInputs, dispatch } from './dispatcher.js';
export type { DispatchRequest, DispatchSubject } from './dispatcher.js';
export { createInMemoryActionAuditLog } from './audit.js';
export type { ActionAuditEntry, ActionAuditFilter, ActionAuditLog, InMemoryAuditLogOptions } from './audit.js';
export { createTaskQueue } from './tasks.js';
export type { TaskHandle, TaskJob, TaskOutcome, TaskQueue, TaskQueueOptions } from './tasks.js';
