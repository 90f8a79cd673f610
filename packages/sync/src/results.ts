import type { OperationKind, PullCursor, SyncEntity } from '@tablesync/core';

/**
 * Why a single entity failed to synchronize.
 *
 * - `conflict`: 409 or 412; `serverEntity` holds the server's current
 *   state and the pending operation stays queued
 * - `retryable`: timeout, connection failure or a transient status
 *   (408, 429, 5xx); the operation stays queued
 * - `rejected`: any other refusal; the operation stays queued until the
 *   application changes or discards it
 * - `local`: the local store failed while applying the entity
 * - `resolution`: an automatic conflict strategy failed; the conflicting
 *   operation stays queued as it was and `error` holds the cause
 */
export type SyncFailureKind = 'conflict' | 'retryable' | 'rejected' | 'local' | 'resolution';

export interface SyncFailure {
  kind: SyncFailureKind;
  collection: string;
  entityId: string;
  /** Pending operation kind, for push failures */
  operation: OperationKind | null;
  /** HTTP status, when a response was received */
  status: number | null;
  serverEntity: SyncEntity | null;
  error: Error | null;
  message: string;
}

/**
 * Why the pull of a collection stopped early.
 *
 * - `fetch`: the page request failed or the page was malformed
 * - `local`: the local store failed while applying a page
 * - `no-progress`: a page did not move past the cursor
 */
export type CollectionFailureKind = 'fetch' | 'local' | 'no-progress';

export interface CollectionFailure {
  kind: CollectionFailureKind;
  collection: string;
  queryId: string;
  status: number | null;
  error: Error | null;
  message: string;
  /** Cursor the collection stopped at */
  cursor: PullCursor;
}

/**
 * Key of an entity in the failure maps. Collection names never contain
 * `:`, so the first one separates the two parts.
 */
export function failureKey(collection: string, entityId: string): string {
  return `${collection}:${entityId}`;
}

export interface PushResult {
  /** True when every operation completed and nothing stopped the phase */
  readonly isSuccessful: boolean;
  /** Operations the table service accepted */
  readonly completedCount: number;
  /** Failures keyed by {@link failureKey} */
  readonly failedOperations: ReadonlyMap<string, SyncFailure>;
  /** A local storage failure that stopped the phase early */
  readonly error: Error | null;
  readonly cancelled: boolean;
}

export interface PullResult {
  readonly isSuccessful: boolean;
  readonly additions: number;
  readonly replacements: number;
  readonly deletions: number;
  /** Items received and applied, including skipped deletions */
  readonly itemCount: number;
  /** Failures keyed by query id */
  readonly failedCollections: ReadonlyMap<string, CollectionFailure>;
  /** Entities the local store failed to apply, keyed by {@link failureKey} */
  readonly localFailures: ReadonlyMap<string, SyncFailure>;
  readonly cancelled: boolean;
}

/**
 * Outcome of one synchronization cycle. Built fresh per cycle and frozen
 * before it is returned. The maps are copies owned by the result and typed
 * read-only; `Object.freeze` does not reach into them.
 */
export interface SynchronizationResult {
  /** True only when both phases finished without any failure */
  readonly isSuccessful: boolean;
  /** Pushed operations plus pulled items */
  readonly completedCount: number;
  /**
   * Push failures and local pull failures, keyed by {@link failureKey}.
   * When both phases fail for the same entity the push failure is kept
   * here, since its operation is still queued; the pull failure stays in
   * `pull.localFailures`.
   */
  readonly failedOperations: ReadonlyMap<string, SyncFailure>;
  readonly failedCollections: ReadonlyMap<string, CollectionFailure>;
  readonly cancelled: boolean;
  readonly push: PushResult;
  /** Null when the pull phase did not run */
  readonly pull: PullResult | null;
}

export function createSynchronizationResult(
  push: PushResult,
  pull: PullResult | null,
  cancelled: boolean
): SynchronizationResult {
  const failedOperations = new Map<string, SyncFailure>(push.failedOperations);
  for (const [key, failure] of pull?.localFailures ?? []) {
    if (!failedOperations.has(key)) {
      failedOperations.set(key, failure);
    }
  }
  const failedCollections = new Map<string, CollectionFailure>(pull?.failedCollections ?? []);
  const wasCancelled = cancelled || push.cancelled || (pull?.cancelled ?? false);

  return Object.freeze({
    isSuccessful:
      !wasCancelled &&
      push.error === null &&
      pull !== null &&
      failedOperations.size === 0 &&
      failedCollections.size === 0,
    completedCount: push.completedCount + (pull?.itemCount ?? 0),
    failedOperations,
    failedCollections,
    cancelled: wasCancelled,
    push,
    pull,
  });
}
