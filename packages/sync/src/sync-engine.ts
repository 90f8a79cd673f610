import {
  SyncCancelledError,
  resolveLogger,
  toError,
  type Logger,
  type PendingOperation,
} from '@tablesync/core';
import { BehaviorSubject, Subject, merge, takeUntil, type Observable } from 'rxjs';
import { parseSyncOptions, type CollectionSyncOptions, type SyncConfig, type SyncOptions } from './config.js';
import { ConflictResolver } from './conflict.js';
import type { SyncEvent } from './events.js';
import type { LockHandle } from './lock-manager.js';
import type { OfflineDatabase } from './offline-database.js';
import type { QueueResolution } from './operations-queue.js';
import { PullOperationManager, type PullRequest } from './pull-manager.js';
import { PushOperationManager, defaultEndpoint } from './push-manager.js';
import {
  createSynchronizationResult,
  failureKey,
  type PullResult,
  type PushResult,
  type SyncFailure,
  type SynchronizationResult,
} from './results.js';
import { createHttpTransport } from './transport/http.js';
import type { RemoteTransport } from './transport/types.js';

/**
 * Sync status
 */
export type SyncStatus = 'idle' | 'pushing' | 'pulling' | 'error';

/**
 * Sync statistics
 */
export interface SyncStats {
  pushCount: number;
  pullCount: number;
  conflictCount: number;
  failureCount: number;
  lastSyncAt: number | null;
  lastError: Error | null;
}

/**
 * Options of a standalone push or pull
 */
export interface PhaseOptions {
  /** Restrict to these collections (default: every configured one) */
  collections?: string[];
  signal?: AbortSignal;
}

/**
 * Main sync engine.
 *
 * `synchronize()` runs one cycle under the sync lock: every pending
 * operation is pushed (or fails explicitly) before the first pull page
 * is requested. Per-entity failures never throw; they are collected in
 * the returned {@link SynchronizationResult}. Only invalid configuration
 * throws, synchronously, from the constructor.
 *
 * @example
 * ```typescript
 * const db = new OfflineDatabase(createMemoryStore(), { collections: ['todos'] });
 * const engine = new SyncEngine(db, {
 *   baseUrl: 'https://api.example.com/',
 *   authToken: 'user-token',
 * });
 *
 * const result = await engine.synchronize();
 * if (!result.isSuccessful) {
 *   for (const failure of result.failedOperations.values()) {
 *     console.log(failure.collection, failure.entityId, failure.kind, failure.serverEntity);
 *   }
 * }
 * ```
 */
export class SyncEngine {
  private readonly database: OfflineDatabase;
  private readonly options: SyncOptions;
  private readonly transport: RemoteTransport;
  private readonly collectionOptions: Map<string, CollectionSyncOptions>;
  private readonly conflictResolver: ConflictResolver;
  private readonly pushManager: PushOperationManager;
  private readonly pullManager: PullOperationManager;
  private readonly logger: Logger;

  /** Pull requests, built on first use */
  private readonly pullRequests = new Map<string, PullRequest>();

  private readonly status$ = new BehaviorSubject<SyncStatus>('idle');
  private readonly stats$ = new BehaviorSubject<SyncStats>({
    pushCount: 0,
    pullCount: 0,
    conflictCount: 0,
    failureCount: 0,
    lastSyncAt: null,
    lastError: null,
  });
  private readonly engineEvents = new Subject<SyncEvent>();
  private readonly destroy$ = new Subject<void>();

  /** Observable of engine, push and pull events */
  readonly events$: Observable<SyncEvent>;

  constructor(database: OfflineDatabase, config: SyncConfig) {
    this.database = database;
    this.options = parseSyncOptions(config);
    this.logger = resolveLogger(config.logger, 'SyncEngine');

    this.collectionOptions = new Map();
    const configured = config.collections ?? database.collections;
    for (const entry of configured) {
      const options = typeof entry === 'string' ? { name: entry } : entry;
      database.assertCollection(options.name);
      this.collectionOptions.set(options.name, options);
    }

    this.transport =
      config.transport ??
      createHttpTransport({
        baseUrl: this.options.baseUrl ?? '',
        authToken: this.options.authToken,
        timeout: this.options.timeout,
        logger: config.logger,
      });

    this.conflictResolver = new ConflictResolver(
      this.options.conflictStrategy,
      config.mergeFunction
    );

    const endpointFor = (collection: string): string =>
      this.collectionOptions.get(collection)?.endpoint ?? defaultEndpoint(collection);

    this.pushManager = new PushOperationManager(database, this.transport, {
      endpointFor,
      logger: config.logger,
    });
    this.pullManager = new PullOperationManager(database, this.transport, {
      logger: config.logger,
    });

    this.events$ = merge(
      this.engineEvents.asObservable(),
      this.pushManager.events$,
      this.pullManager.events$
    ).pipe(takeUntil(this.destroy$));

    this.logger.debug('SyncEngine initialized', {
      collections: [...this.collectionOptions.keys()],
      pageSize: this.options.pageSize,
      parallelOperations: this.options.parallelOperations,
      conflictStrategy: this.options.conflictStrategy,
    });
  }

  /**
   * Run one push-then-pull cycle. Cancelling through `signal` stops new
   * work; everything already applied stays and the result reports
   * `cancelled`.
   */
  async synchronize(signal?: AbortSignal): Promise<SynchronizationResult> {
    let lock: LockHandle;
    try {
      lock = await this.database.locks.acquireSyncLock(signal);
    } catch (error) {
      if (error instanceof SyncCancelledError) {
        this.logger.info('Synchronization cancelled before it started');
        return createSynchronizationResult(emptyPushResult(true), null, true);
      }
      throw error;
    }

    this.logger.info('Starting synchronization');
    this.engineEvents.next({ type: 'sync-started' });

    try {
      const collections = [...this.collectionOptions.keys()];
      const push = await this.runPush(collections, signal);

      let pull: PullResult | null = null;
      if (push.error) {
        this.logger.warn('Skipping pull after a local storage failure');
      } else if (!signal?.aborted) {
        pull = await this.runPull(collections, signal);
      }

      const result = createSynchronizationResult(push, pull, signal?.aborted ?? false);
      this.updateStats({
        lastSyncAt: Date.now(),
        lastError: push.error,
        failureCount:
          this.stats$.getValue().failureCount +
          result.failedOperations.size +
          result.failedCollections.size,
      });

      this.logger.info('Synchronization completed', {
        isSuccessful: result.isSuccessful,
        completedCount: result.completedCount,
        failedOperations: result.failedOperations.size,
        failedCollections: result.failedCollections.size,
        cancelled: result.cancelled,
      });
      this.engineEvents.next({ type: 'sync-ended', result });
      return result;
    } catch (error) {
      const err = toError(error);
      this.logger.error('Synchronization failed', err);
      this.updateStats({ lastError: err });
      this.status$.next('error');
      throw error;
    } finally {
      lock.release();
      if (this.status$.getValue() !== 'error') {
        this.status$.next('idle');
      }
    }
  }

  /**
   * Push pending operations without pulling
   */
  async push(options: PhaseOptions = {}): Promise<PushResult> {
    const result = await this.runPush(this.selectCollections(options.collections), options.signal);
    this.status$.next('idle');
    return result;
  }

  /**
   * Pull remote changes without pushing
   */
  async pull(options: PhaseOptions = {}): Promise<PullResult> {
    const result = await this.runPull(this.selectCollections(options.collections), options.signal);
    this.status$.next('idle');
    return result;
  }

  /**
   * Settle a conflicting pending operation under its entity lock
   */
  async resolveConflict(
    collection: string,
    entityId: string,
    resolution: QueueResolution
  ): Promise<PendingOperation | null> {
    this.database.assertCollection(collection);
    const operation = await this.database.locks.withEntityLock(collection, entityId, () =>
      this.database.queue.resolve(collection, entityId, resolution)
    );
    this.engineEvents.next({
      type: 'conflict-resolved',
      collection,
      entityId,
      resolution: resolution.kind,
    });
    return operation;
  }

  /**
   * Forget the pull progress of a collection; the next pull starts over
   */
  async resetCursor(collection: string): Promise<void> {
    const request = this.getPullRequest(collection);
    await this.database.locks.withCollectionLock(collection, () =>
      this.pullManager.cursorStore.resetCursor(request.queryId)
    );
    this.logger.info('Pull cursor reset', { collection, queryId: request.queryId });
  }

  pendingCount(collection?: string): Promise<number> {
    return this.database.queue.count(collection);
  }

  /**
   * Get sync status observable
   */
  getStatus(): Observable<SyncStatus> {
    return this.status$.asObservable().pipe(takeUntil(this.destroy$));
  }

  /**
   * Get sync stats observable
   */
  getStats(): Observable<SyncStats> {
    return this.stats$.asObservable().pipe(takeUntil(this.destroy$));
  }

  /**
   * Destroy the sync engine
   */
  destroy(): void {
    this.destroy$.next();
    this.destroy$.complete();
    this.pushManager.destroy();
    this.pullManager.destroy();
    this.engineEvents.complete();
    this.status$.complete();
    this.stats$.complete();
  }

  private async runPush(collections: string[], signal?: AbortSignal): Promise<PushResult> {
    this.status$.next('pushing');
    const result = await this.pushManager.execute(
      collections,
      {
        parallelOperations: this.options.parallelOperations,
        tombstones: this.options.tombstones,
      },
      signal
    );

    const conflicts = [...result.failedOperations.values()].filter((f) => f.kind === 'conflict');
    this.updateStats({
      pushCount: this.stats$.getValue().pushCount + result.completedCount,
      conflictCount: this.stats$.getValue().conflictCount + conflicts.length,
    });

    if (this.conflictResolver.isAutomatic && conflicts.length > 0) {
      return this.applyConflictStrategy(result, conflicts);
    }
    return result;
  }

  private async runPull(collections: string[], signal?: AbortSignal): Promise<PullResult> {
    this.status$.next('pulling');
    const requests = collections.map((name) => this.getPullRequest(name));
    const result = await this.pullManager.execute(
      requests,
      {
        pageSize: this.options.pageSize,
        parallelOperations: this.options.parallelOperations,
        tombstones: this.options.tombstones,
      },
      signal
    );
    this.updateStats({ pullCount: this.stats$.getValue().pullCount + result.itemCount });
    return result;
  }

  /**
   * Re-queue conflicts according to the configured strategy. The result
   * still reports them; the re-queued operations go out with the next
   * push. A conflict whose strategy throws is reported as a `resolution`
   * failure and its operation stays queued as it was.
   */
  private async applyConflictStrategy(
    result: PushResult,
    conflicts: SyncFailure[]
  ): Promise<PushResult> {
    const unresolved = new Map<string, SyncFailure>();

    for (const failure of conflicts) {
      try {
        const pending = await this.database.queue.get(failure.collection, failure.entityId);
        if (!pending) continue;

        const resolution = this.conflictResolver.resolve({
          collection: failure.collection,
          entityId: failure.entityId,
          operation: pending.kind,
          local: pending.item,
          server: failure.serverEntity,
        });
        if (resolution) {
          await this.resolveConflict(failure.collection, failure.entityId, resolution);
        }
      } catch (error) {
        const cause = toError(error);
        this.logger.error('Conflict resolution failed', cause, {
          collection: failure.collection,
          entityId: failure.entityId,
        });
        unresolved.set(failureKey(failure.collection, failure.entityId), {
          ...failure,
          kind: 'resolution',
          error: cause,
          message: `Resolving the conflict failed: ${cause.message}`,
        });
      }
    }

    if (unresolved.size === 0) {
      return result;
    }
    return Object.freeze({
      ...result,
      isSuccessful: false,
      failedOperations: new Map([...result.failedOperations, ...unresolved]),
    });
  }

  private selectCollections(collections?: string[]): string[] {
    if (!collections) {
      return [...this.collectionOptions.keys()];
    }
    for (const name of collections) {
      this.getPullRequest(name);
    }
    return collections;
  }

  private getPullRequest(collection: string): PullRequest {
    let request = this.pullRequests.get(collection);
    if (!request) {
      const options = this.collectionOptions.get(collection);
      if (!options) {
        this.database.assertCollection(collection);
      }
      request = {
        collection,
        queryId: options?.queryId ?? collection,
        endpoint: options?.endpoint ?? defaultEndpoint(collection),
        filter: options?.filter,
      };
      this.pullRequests.set(collection, request);
    }
    return request;
  }

  private updateStats(update: Partial<SyncStats>): void {
    this.stats$.next({ ...this.stats$.getValue(), ...update });
  }
}

function emptyPushResult(cancelled: boolean): PushResult {
  return Object.freeze({
    isSuccessful: false,
    completedCount: 0,
    failedOperations: new Map<string, SyncFailure>(),
    error: null,
    cancelled,
  });
}

/**
 * Create a sync engine for an offline database
 */
export function createSyncEngine(database: OfflineDatabase, config: SyncConfig): SyncEngine {
  return new SyncEngine(database, config);
}
