import type { OperationKind, PullCursor } from '@tablesync/core';
import type {
  CollectionFailure,
  PullResult,
  PushResult,
  SyncFailure,
  SyncFailureKind,
  SynchronizationResult,
} from './results.js';

/**
 * Progress events of the push and pull operation managers
 */
export type SyncEvent =
  | { type: 'sync-started' }
  | { type: 'sync-ended'; result: SynchronizationResult }
  | { type: 'push-started'; pending: number }
  | {
      type: 'item-pushed';
      collection: string;
      entityId: string;
      operation: OperationKind;
      outcome: 'completed' | SyncFailureKind;
    }
  | { type: 'push-ended'; result: PushResult }
  | { type: 'pull-started'; collection: string; queryId: string }
  | {
      type: 'items-fetched';
      collection: string;
      queryId: string;
      count: number;
      totalCount: number | null;
    }
  | { type: 'items-committed'; collection: string; queryId: string; count: number; cursor: PullCursor }
  | {
      type: 'pull-ended';
      collection: string;
      queryId: string;
      failure: CollectionFailure | null;
    }
  | { type: 'pull-completed'; result: PullResult }
  | { type: 'local-exception'; failure: SyncFailure }
  | { type: 'conflict-resolved'; collection: string; entityId: string; resolution: string };

export type SyncEventType = SyncEvent['type'];
