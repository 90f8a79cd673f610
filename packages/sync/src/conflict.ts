import type { OperationKind, SyncEntity } from '@tablesync/core';
import type { QueueResolution } from './operations-queue.js';

/**
 * Conflict resolution strategies.
 *
 * `manual` leaves conflicts queued for the application to settle through
 * `SyncEngine.resolveConflict()`.
 */
export type ConflictStrategy = 'manual' | 'server-wins' | 'client-wins' | 'merge';

/**
 * A pending operation the table service refused with 409 or 412
 */
export interface SyncConflict {
  collection: string;
  entityId: string;
  operation: OperationKind;
  /** Snapshot the client tried to send */
  local: SyncEntity;
  /** Current server entity, when the service returned one */
  server: SyncEntity | null;
}

/**
 * Custom merge function type
 */
export type MergeFunction = (local: SyncEntity, server: SyncEntity) => SyncEntity;

/**
 * Turns conflicts into queue resolutions according to a strategy
 */
export class ConflictResolver {
  private readonly strategy: ConflictStrategy;
  private readonly customMerge?: MergeFunction;

  constructor(strategy: ConflictStrategy = 'manual', customMerge?: MergeFunction) {
    this.strategy = strategy;
    this.customMerge = customMerge;
  }

  get isAutomatic(): boolean {
    return this.strategy !== 'manual';
  }

  /**
   * Resolution for a conflict, or null when it is left to the caller
   */
  resolve(conflict: SyncConflict): QueueResolution | null {
    const { local, server } = conflict;

    switch (this.strategy) {
      case 'server-wins':
        return { kind: 'server', entity: server };

      case 'client-wins':
        return { kind: 'client', serverVersion: server?.version ?? null };

      case 'merge':
        if (!server || conflict.operation === 'delete') {
          return { kind: 'client', serverVersion: server?.version ?? null };
        }
        return {
          kind: 'merged',
          entity: this.customMerge ? this.customMerge(local, server) : defaultMerge(local, server),
          serverVersion: server.version ?? null,
        };

      default:
        return null;
    }
  }
}

/**
 * Field-level merge: local fields overwrite server fields, fields only the
 * server has are kept, metadata always comes from the server.
 */
export function defaultMerge(local: SyncEntity, server: SyncEntity): SyncEntity {
  return {
    ...server,
    ...local,
    id: server.id,
    updatedAt: server.updatedAt,
    version: server.version,
    deleted: server.deleted,
  };
}
