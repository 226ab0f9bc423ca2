// Action audit log
//
// Every COMMAND dispatch, successful or not, leaves one entry here.
// The in-memory log is the default; a persistent one can implement the
// same interface.

import type { ActionProfile, Id, Timestamp } from '@tessera/protocol';

export type ActionAuditEntry = {
  id: Id;
  entityId: Id;
  entityType: string;
  action: string;
  profile: ActionProfile;
  actorId: string | null;
  roles: string[];
  success: boolean;
  /** Error message if the body failed */
  error?: string;
  versionBefore: number;
  versionAfter: number;
  timestamp: Timestamp;
};

export type ActionAuditFilter = {
  entityId?: Id;
  action?: string;
  actorId?: string;
  success?: boolean;
  /** Maximum entries to return */
  limit?: number;
};

export interface ActionAuditLog {
  append(entry: ActionAuditEntry): void;

  /**
   * Entries matching the filter, most recent first.
   */
  query(filter?: ActionAuditFilter): ActionAuditEntry[];

  readonly size: number;

  clear(): void;
}

export type InMemoryAuditLogOptions = {
  /** Oldest entries are dropped past this many; unbounded when absent */
  maxEntries?: number;
};

/**
 * Create an in-memory audit log for testing and development.
 */
export function createInMemoryActionAuditLog(options: InMemoryAuditLogOptions = {}): ActionAuditLog {
  const { maxEntries } = options;
  const entries: ActionAuditEntry[] = [];

  return {
    append(entry: ActionAuditEntry): void {
      entries.push(entry);
      if (maxEntries !== undefined && entries.length > maxEntries) {
        entries.splice(0, entries.length - maxEntries);
      }
    },

    query(filter?: ActionAuditFilter): ActionAuditEntry[] {
      let result = [...entries].reverse();

      if (filter?.entityId) {
        result = result.filter((e) => e.entityId === filter.entityId);
      }

      if (filter?.action) {
        result = result.filter((e) => e.action === filter.action);
      }

      if (filter?.actorId) {
        result = result.filter((e) => e.actorId === filter.actorId);
      }

      if (filter?.success !== undefined) {
        result = result.filter((e) => e.success === filter.success);
      }

      if (filter?.limit) {
        result = result.slice(0, filter.limit);
      }

      return result;
    },

    get size() {
      return entries.length;
    },

    clear(): void {
      entries.length = 0;
    },
  };
}
