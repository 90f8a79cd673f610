import type { OperationKind, SyncEntity } from './entity.js';

/**
 * Entity table for a single collection in the local store
 */
export interface EntityStore<T extends SyncEntity> {
  /** Collection name */
  readonly name: string;

  get(id: string): Promise<T | null>;

  getAll(): Promise<T[]>;

  /**
   * Insert or replace an entity
   */
  put(entity: T): Promise<T>;

  /**
   * Physically remove an entity. Resolves false when it was not present.
   */
  delete(id: string): Promise<boolean>;

  clear(): Promise<void>;
}

/**
 * State of a pending operation. `failed` operations stay queued and are
 * retried by the next push.
 */
export type PendingOperationState = 'pending' | 'failed';

/**
 * A local mutation waiting to be sent to the table service
 */
export interface PendingOperation {
  /** Operation id */
  id: string;
  collection: string;
  entityId: string;
  kind: OperationKind;
  state: PendingOperationState;
  /** Entity snapshot at queue time */
  item: SyncEntity;
  /** Version the local change was based on, sent as the precondition */
  version: string | null;
  /** Global FIFO position */
  sequence: number;
  /** Bumped every time the operation is coalesced or re-queued */
  revision: number;
  /** Time of the last push attempt (Unix ms) */
  lastAttempt: number | null;
  /** HTTP status of the last push attempt */
  lastStatus: number | null;
}

/**
 * Incremental pull high-water-mark. Ties on `lastSeenUpdatedAt` are broken
 * by `lastSeenId` in code-unit order.
 */
export interface PullCursor {
  /** Milliseconds since the Unix epoch */
  lastSeenUpdatedAt: number;
  /** Id of the last applied entity at that timestamp */
  lastSeenId: string;
}

export const ZERO_CURSOR: Readonly<PullCursor> = Object.freeze({
  lastSeenUpdatedAt: 0,
  lastSeenId: '',
});

/**
 * Order two cursors by (updatedAt, id). Negative when `a` comes first.
 */
export function compareCursor(a: PullCursor, b: PullCursor): number {
  if (a.lastSeenUpdatedAt !== b.lastSeenUpdatedAt) {
    return a.lastSeenUpdatedAt < b.lastSeenUpdatedAt ? -1 : 1;
  }
  if (a.lastSeenId === b.lastSeenId) return 0;
  return a.lastSeenId < b.lastSeenId ? -1 : 1;
}

/**
 * Local storage contract of the synchronization engine. Any storage engine
 * that implements it can back an offline database.
 */
export interface LocalStore {
  /** Store name for identification */
  readonly name: string;

  /**
   * Get or create the entity table of a collection
   */
  getStore<T extends SyncEntity>(collection: string): EntityStore<T>;

  /**
   * Pending operations in sequence order, optionally for one collection
   */
  enumeratePending(collection?: string): Promise<PendingOperation[]>;

  getPending(collection: string, entityId: string): Promise<PendingOperation | null>;

  /**
   * Insert or replace a pending operation (keyed by collection and entity id)
   */
  putPending(operation: PendingOperation): Promise<void>;

  removePending(operationId: string): Promise<boolean>;

  /**
   * Allocate the next operation sequence number
   */
  nextSequence(): Promise<number>;

  getCursor(key: string): Promise<PullCursor | null>;

  setCursor(key: string, cursor: PullCursor): Promise<void>;

  deleteCursor(key: string): Promise<void>;

  close(): Promise<void>;
}
