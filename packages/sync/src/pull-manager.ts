import {
  LocalStorageError,
  SyncCancelledError,
  ZERO_CURSOR,
  compareCursor,
  parseTimestamp,
  resolveLogger,
  toError,
  type EntityStore,
  type Logger,
  type LoggerSetting,
  type PullCursor,
  type SyncEntity,
} from '@tablesync/core';
import { Subject, type Observable } from 'rxjs';
import { DeltaCursorStore } from './cursor-store.js';
import type { SyncEvent } from './events.js';
import type { LockHandle } from './lock-manager.js';
import type { OfflineDatabase } from './offline-database.js';
import { buildPullQuery } from './pull-query.js';
import { QueueHandler } from './queue-handler.js';
import {
  failureKey,
  type CollectionFailure,
  type CollectionFailureKind,
  type PullResult,
  type SyncFailure,
} from './results.js';
import type { Page, RemoteTransport, ServiceResponse } from './transport/types.js';

/**
 * One incremental query against the table service
 */
export interface PullRequest {
  collection: string;
  /** Key of the pull cursor */
  queryId: string;
  endpoint: string;
  /** Extra `$filter` predicate */
  filter?: string;
}

export interface PullOptions {
  pageSize: number;
  parallelOperations: number;
  tombstones: boolean;
}

export interface PullOperationManagerOptions {
  logger?: LoggerSetting;
}

interface PullRun {
  additions: number;
  replacements: number;
  deletions: number;
  itemCount: number;
  failedCollections: Map<string, CollectionFailure>;
  localFailures: Map<string, SyncFailure>;
  cancelled: boolean;
}

/**
 * Cursor position of an entity, or null when it carries no timestamp
 */
function positionOf(entity: SyncEntity): PullCursor | null {
  const updatedAt = parseTimestamp(entity.updatedAt);
  return updatedAt === null ? null : { lastSeenUpdatedAt: updatedAt, lastSeenId: entity.id };
}

/**
 * Furthest position in a page. Pages arrive in (updatedAt, id) order so
 * this is the last item; taking the maximum keeps the cursor correct for
 * a service that reorders a page.
 */
function pageBoundary(items: SyncEntity[]): PullCursor | null {
  let boundary: PullCursor | null = null;
  for (const item of items) {
    const position = positionOf(item);
    if (!position) return null;
    if (!boundary || compareCursor(position, boundary) > 0) {
      boundary = position;
    }
  }
  return boundary;
}

/**
 * Brings the local store up to date with the table service.
 *
 * Each request is pulled under its collection lock, page by page:
 *
 * 1. ask for items after the cursor, ordered by (updatedAt, id), deleted
 *    items included
 * 2. write every item locally; remote state always wins
 * 3. advance the cursor to the last item of the page
 * 4. continue while the page carried a `nextLink` or was full
 *
 * A failed request stops only its own collection and leaves its cursor
 * at the last applied page. A page that does not move past the cursor
 * stops the collection with a `no-progress` failure, so a service that
 * ignores the filter cannot loop the client forever.
 */
export class PullOperationManager {
  private readonly database: OfflineDatabase;
  private readonly transport: RemoteTransport;
  private readonly cursors: DeltaCursorStore;
  private readonly logger: Logger;
  private readonly eventsSubject = new Subject<SyncEvent>();

  /** Observable of pull progress events */
  readonly events$: Observable<SyncEvent>;

  constructor(
    database: OfflineDatabase,
    transport: RemoteTransport,
    options: PullOperationManagerOptions = {}
  ) {
    this.database = database;
    this.transport = transport;
    this.cursors = new DeltaCursorStore(database.store);
    this.logger = resolveLogger(options.logger, 'PullOperationManager');
    this.events$ = this.eventsSubject.asObservable();
  }

  get cursorStore(): DeltaCursorStore {
    return this.cursors;
  }

  async execute(
    requests: PullRequest[],
    options: PullOptions,
    signal?: AbortSignal
  ): Promise<PullResult> {
    const run: PullRun = {
      additions: 0,
      replacements: 0,
      deletions: 0,
      itemCount: 0,
      failedCollections: new Map(),
      localFailures: new Map(),
      cancelled: false,
    };

    const handler = new QueueHandler<PullRequest>(options.parallelOperations, (request) =>
      this.pullCollection(request, options, run, signal)
    );
    handler.enqueueRange(requests);
    await handler.whenComplete();

    const result: PullResult = Object.freeze({
      isSuccessful:
        !run.cancelled && run.failedCollections.size === 0 && run.localFailures.size === 0,
      additions: run.additions,
      replacements: run.replacements,
      deletions: run.deletions,
      itemCount: run.itemCount,
      failedCollections: run.failedCollections,
      localFailures: run.localFailures,
      cancelled: run.cancelled,
    });

    this.logger.info('Pull completed', {
      collections: requests.length,
      additions: result.additions,
      replacements: result.replacements,
      deletions: result.deletions,
      failed: result.failedCollections.size,
      cancelled: result.cancelled,
    });
    this.eventsSubject.next({ type: 'pull-completed', result });
    return result;
  }

  destroy(): void {
    this.eventsSubject.complete();
  }

  private async pullCollection(
    request: PullRequest,
    options: PullOptions,
    run: PullRun,
    signal?: AbortSignal
  ): Promise<void> {
    let lock: LockHandle;
    try {
      lock = await this.database.locks.acquireCollectionLock(request.collection, signal);
    } catch (error) {
      if (error instanceof SyncCancelledError) {
        run.cancelled = true;
        return;
      }
      throw error;
    }

    this.eventsSubject.next({
      type: 'pull-started',
      collection: request.collection,
      queryId: request.queryId,
    });

    let failure: CollectionFailure | null;
    try {
      failure = await this.pullPages(request, options, run, signal);
    } finally {
      lock.release();
    }

    if (failure) {
      run.failedCollections.set(request.queryId, failure);
      this.logger.warn('Pull stopped', {
        collection: request.collection,
        queryId: request.queryId,
        kind: failure.kind,
        status: failure.status,
        message: failure.message,
      });
    }

    this.eventsSubject.next({
      type: 'pull-ended',
      collection: request.collection,
      queryId: request.queryId,
      failure,
    });
  }

  /**
   * Page loop of one request. Resolves with the failure that stopped it,
   * or null when the collection is exhausted or the signal aborted.
   */
  private async pullPages(
    request: PullRequest,
    options: PullOptions,
    run: PullRun,
    signal?: AbortSignal
  ): Promise<CollectionFailure | null> {
    const entities = this.database.store.getStore<SyncEntity>(request.collection);

    let cursor: PullCursor;
    try {
      cursor = await this.cursors.getCursor(request.queryId);
    } catch (error) {
      return this.failure('local', request, ZERO_CURSOR, {
        error: toError(error),
        message: 'Reading the pull cursor failed',
      });
    }

    for (;;) {
      if (signal?.aborted) {
        run.cancelled = true;
        return null;
      }

      const query = buildPullQuery(cursor, { pageSize: options.pageSize, filter: request.filter });
      let response: ServiceResponse<Page>;
      try {
        response = await this.transport.getPage(request.endpoint, query, signal);
      } catch (error) {
        if (error instanceof SyncCancelledError) {
          run.cancelled = true;
          return null;
        }
        const cause = toError(error);
        return this.failure('fetch', request, cursor, { error: cause, message: cause.message });
      }

      if (!response.isSuccessful || !response.content) {
        return this.failure('fetch', request, cursor, {
          status: response.status,
          message: `Page request failed with status ${response.status}`,
        });
      }

      const page = response.content;
      this.eventsSubject.next({
        type: 'items-fetched',
        collection: request.collection,
        queryId: request.queryId,
        count: page.items.length,
        totalCount: page.count ?? null,
      });

      if (page.items.length === 0) {
        return null;
      }

      const boundary = pageBoundary(page.items);
      if (!boundary) {
        return this.failure('fetch', request, cursor, {
          status: response.status,
          message: 'Page contains an item without a valid updatedAt',
        });
      }
      if (compareCursor(boundary, cursor) <= 0) {
        return this.failure('no-progress', request, cursor, {
          status: response.status,
          message: 'Page did not advance past the cursor',
        });
      }

      for (const item of page.items) {
        if (signal?.aborted) {
          // Applied items stay; the cursor only covers whole pages
          run.cancelled = true;
          return null;
        }
        try {
          await this.applyItem(entities, item, options.tombstones, run);
        } catch (error) {
          const cause = new LocalStorageError(
            'TS_S300',
            { collection: request.collection, entityId: item.id },
            toError(error)
          );
          const localFailure: SyncFailure = {
            kind: 'local',
            collection: request.collection,
            entityId: item.id,
            operation: null,
            status: null,
            serverEntity: item,
            error: cause,
            message: cause.message,
          };
          run.localFailures.set(failureKey(request.collection, item.id), localFailure);
          this.eventsSubject.next({ type: 'local-exception', failure: localFailure });
          return this.failure('local', request, cursor, {
            error: cause,
            message: `Applying "${item.id}" failed: ${cause.message}`,
          });
        }
      }

      try {
        await this.cursors.advanceCursor(request.queryId, boundary);
      } catch (error) {
        const cause = new LocalStorageError(
          'TS_S300',
          { queryId: request.queryId },
          toError(error)
        );
        return this.failure('local', request, cursor, {
          error: cause,
          message: `Saving the pull cursor failed: ${cause.message}`,
        });
      }
      cursor = boundary;

      this.eventsSubject.next({
        type: 'items-committed',
        collection: request.collection,
        queryId: request.queryId,
        count: page.items.length,
        cursor,
      });
      this.logger.debug('Page applied', {
        collection: request.collection,
        items: page.items.length,
        lastSeenUpdatedAt: cursor.lastSeenUpdatedAt,
        lastSeenId: cursor.lastSeenId,
      });

      const hasMore = Boolean(page.nextLink) || page.items.length >= options.pageSize;
      if (!hasMore) {
        return null;
      }
    }
  }

  private async applyItem(
    entities: EntityStore<SyncEntity>,
    item: SyncEntity,
    tombstones: boolean,
    run: PullRun
  ): Promise<void> {
    const existing = await entities.get(item.id);

    if (item.deleted) {
      if (existing) {
        if (tombstones) {
          await entities.put(item);
        } else {
          await entities.delete(item.id);
        }
        run.deletions += 1;
      }
    } else {
      await entities.put(item);
      if (existing) {
        run.replacements += 1;
      } else {
        run.additions += 1;
      }
    }

    run.itemCount += 1;
  }

  private failure(
    kind: CollectionFailureKind,
    request: PullRequest,
    cursor: PullCursor,
    detail: { status?: number; error?: Error; message: string }
  ): CollectionFailure {
    return {
      kind,
      collection: request.collection,
      queryId: request.queryId,
      status: detail.status ?? null,
      error: detail.error ?? null,
      message: detail.message,
      cursor: { ...cursor },
    };
  }
}
