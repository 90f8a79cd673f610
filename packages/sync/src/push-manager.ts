import {
  LocalStorageError,
  SyncCancelledError,
  TransportError,
  resolveLogger,
  toError,
  type Logger,
  type LoggerSetting,
  type PendingOperation,
  type SyncEntity,
} from '@tablesync/core';
import { Subject, type Observable } from 'rxjs';
import type { SyncEvent } from './events.js';
import type { LockHandle } from './lock-manager.js';
import type { OfflineDatabase } from './offline-database.js';
import { QueueHandler } from './queue-handler.js';
import { failureKey, type PushResult, type SyncFailure, type SyncFailureKind } from './results.js';
import type { RemoteTransport, ServiceResponse } from './transport/types.js';

export interface PushOptions {
  parallelOperations: number;
  tombstones: boolean;
}

export interface PushOperationManagerOptions {
  /** Endpoint of a collection (default: `tables/<name>`) */
  endpointFor?: (collection: string) => string;
  logger?: LoggerSetting;
}

interface PushRun {
  completedCount: number;
  failedOperations: Map<string, SyncFailure>;
  /** Local storage failure; no new submission starts once set */
  fatal: Error | null;
  cancelled: boolean;
}

type Outcome =
  | { kind: 'completed' }
  | {
      kind: SyncFailureKind;
      status: number | null;
      serverEntity: SyncEntity | null;
      message: string;
      error?: Error;
    };

/**
 * Statuses worth repeating later without any change on the client
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function defaultEndpoint(collection: string): string {
  return `tables/${collection.toLowerCase()}`;
}

/**
 * Sends pending operations to the table service.
 *
 * Operations are taken in sequence order and submitted with bounded
 * parallelism. Each submission holds the entity lock, so local writes to
 * the same entity queue behind it and one entity is never in flight
 * twice. The operation is read again once the lock is held since it may
 * have been coalesced or resolved while waiting.
 *
 * | Operation | Success            | Cleared as well | Conflict |
 * |-----------|--------------------|-----------------|----------|
 * | create    | 2xx                |                 | 409, 412 |
 * | update    | 2xx                |                 | 409, 412 |
 * | delete    | 2xx                | 404, 410        | 409, 412 |
 *
 * Conflicts keep the operation queued and report the server entity.
 * Transport failures, 408, 429 and 5xx are `retryable`; other statuses
 * are `rejected`. Both keep the operation queued. A local storage failure
 * stops the phase: nothing new is submitted, finished work stays.
 */
export class PushOperationManager {
  private readonly database: OfflineDatabase;
  private readonly transport: RemoteTransport;
  private readonly endpointFor: (collection: string) => string;
  private readonly logger: Logger;
  private readonly eventsSubject = new Subject<SyncEvent>();

  /** Observable of push progress events */
  readonly events$: Observable<SyncEvent>;

  constructor(
    database: OfflineDatabase,
    transport: RemoteTransport,
    options: PushOperationManagerOptions = {}
  ) {
    this.database = database;
    this.transport = transport;
    this.endpointFor = options.endpointFor ?? defaultEndpoint;
    this.logger = resolveLogger(options.logger, 'PushOperationManager');
    this.events$ = this.eventsSubject.asObservable();
  }

  async execute(
    collections: string[],
    options: PushOptions,
    signal?: AbortSignal
  ): Promise<PushResult> {
    const run: PushRun = {
      completedCount: 0,
      failedOperations: new Map(),
      fatal: null,
      cancelled: false,
    };

    let operations: PendingOperation[] = [];
    try {
      const wanted = new Set(collections);
      operations = (await this.database.queue.getPending()).filter((op) =>
        wanted.has(op.collection)
      );
    } catch (error) {
      run.fatal = new LocalStorageError('TS_S300', { collections }, toError(error));
      this.logger.error('Reading pending operations failed', run.fatal);
    }

    this.eventsSubject.next({ type: 'push-started', pending: operations.length });

    const handler: QueueHandler<PendingOperation> = new QueueHandler<PendingOperation>(options.parallelOperations, (op) =>
      this.pushOperation(op, options, run, handler, signal)
    );
    handler.enqueueRange(operations);
    await handler.whenComplete();

    const result: PushResult = Object.freeze({
      isSuccessful: !run.cancelled && run.fatal === null && run.failedOperations.size === 0,
      completedCount: run.completedCount,
      failedOperations: run.failedOperations,
      error: run.fatal,
      cancelled: run.cancelled,
    });

    this.logger.info('Push completed', {
      pending: operations.length,
      completed: result.completedCount,
      failed: result.failedOperations.size,
      cancelled: result.cancelled,
    });
    this.eventsSubject.next({ type: 'push-ended', result });
    return result;
  }

  destroy(): void {
    this.eventsSubject.complete();
  }

  private async pushOperation(
    queued: PendingOperation,
    options: PushOptions,
    run: PushRun,
    handler: QueueHandler<PendingOperation>,
    signal?: AbortSignal
  ): Promise<void> {
    if (run.fatal) return;
    if (signal?.aborted) {
      run.cancelled = true;
      return;
    }

    let lock: LockHandle;
    try {
      lock = await this.database.locks.acquireEntityLock(
        queued.collection,
        queued.entityId,
        signal
      );
    } catch (error) {
      if (error instanceof SyncCancelledError) {
        run.cancelled = true;
        return;
      }
      throw error;
    }

    try {
      if (run.fatal) return;
      if (signal?.aborted) {
        run.cancelled = true;
        return;
      }

      const operation = await this.database.queue.get(queued.collection, queued.entityId);
      if (!operation) return;

      let response: ServiceResponse<SyncEntity>;
      try {
        response = await this.submit(operation, signal);
      } catch (error) {
        if (error instanceof SyncCancelledError) {
          run.cancelled = true;
          return;
        }
        const cause = toError(error);
        const kind = error instanceof TransportError && !error.retryable ? 'rejected' : 'retryable';
        await this.database.queue.markFailed(operation, null);
        this.recordFailure(run, operation, {
          kind,
          status: null,
          serverEntity: null,
          message: cause.message,
          error: cause,
        });
        return;
      }

      const outcome = await this.handleResponse(operation, response, options);
      if (outcome.kind === 'completed') {
        run.completedCount += 1;
        this.emitItemPushed(operation, 'completed');
      } else {
        await this.database.queue.markFailed(operation, outcome.status);
        this.recordFailure(run, operation, outcome);
      }
    } catch (error) {
      // Only the local store can fail here
      const cause = new LocalStorageError(
        'TS_S300',
        { collection: queued.collection, entityId: queued.entityId },
        toError(error)
      );
      run.fatal ??= cause;
      const dropped = handler.cancel();
      this.recordFailure(run, queued, {
        kind: 'local',
        status: null,
        serverEntity: null,
        message: cause.message,
        error: cause,
      });
      this.logger.error('Local storage failed, push stopped', cause, {
        collection: queued.collection,
        entityId: queued.entityId,
        dropped,
      });
    } finally {
      lock.release();
    }
  }

  private submit(
    operation: PendingOperation,
    signal?: AbortSignal
  ): Promise<ServiceResponse<SyncEntity>> {
    const endpoint = this.endpointFor(operation.collection);
    switch (operation.kind) {
      case 'create':
        return this.transport.create(endpoint, operation.item, signal);
      case 'update':
        return this.transport.replace(endpoint, operation.item, operation.version, signal);
      case 'delete':
        return this.transport.delete(endpoint, operation.entityId, operation.version, signal);
    }
  }

  private async handleResponse(
    operation: PendingOperation,
    response: ServiceResponse<SyncEntity>,
    options: PushOptions
  ): Promise<Outcome> {
    const entities = this.database.store.getStore<SyncEntity>(operation.collection);
    const { status } = response;

    if (operation.kind === 'delete') {
      if (response.isSuccessful || status === 404 || status === 410) {
        if (status === 410 && options.tombstones && response.content) {
          await entities.put(response.content);
        } else {
          await entities.delete(operation.entityId);
        }
        await this.database.queue.complete(operation);
        return { kind: 'completed' };
      }
    } else if (response.isSuccessful) {
      const stored = response.content;
      if (stored) {
        if (stored.id !== operation.entityId) {
          await entities.delete(operation.entityId);
        }
        await entities.put(stored);
      }
      await this.database.queue.complete(operation);
      return { kind: 'completed' };
    }

    if (status === 409 || status === 412) {
      return {
        kind: 'conflict',
        status,
        serverEntity: response.content,
        message: `The table service reported a conflict (${status})`,
      };
    }

    return {
      kind: isTransientStatus(status) ? 'retryable' : 'rejected',
      status,
      serverEntity: response.content,
      message: `The table service answered ${status}`,
    };
  }

  private recordFailure(
    run: PushRun,
    operation: PendingOperation,
    outcome: Exclude<Outcome, { kind: 'completed' }>
  ): void {
    run.failedOperations.set(failureKey(operation.collection, operation.entityId), {
      kind: outcome.kind,
      collection: operation.collection,
      entityId: operation.entityId,
      operation: operation.kind,
      status: outcome.status,
      serverEntity: outcome.serverEntity,
      error: outcome.error ?? null,
      message: outcome.message,
    });
    this.emitItemPushed(operation, outcome.kind);
    if (outcome.kind === 'local') {
      this.eventsSubject.next({
        type: 'local-exception',
        failure: {
          kind: 'local',
          collection: operation.collection,
          entityId: operation.entityId,
          operation: operation.kind,
          status: null,
          serverEntity: null,
          error: outcome.error ?? null,
          message: outcome.message,
        },
      });
    } else {
      this.logger.warn('Push failed', {
        collection: operation.collection,
        entityId: operation.entityId,
        operation: operation.kind,
        kind: outcome.kind,
        status: outcome.status,
      });
    }
  }

  private emitItemPushed(operation: PendingOperation, outcome: 'completed' | SyncFailureKind): void {
    this.eventsSubject.next({
      type: 'item-pushed',
      collection: operation.collection,
      entityId: operation.entityId,
      operation: operation.kind,
      outcome,
    });
  }
}
