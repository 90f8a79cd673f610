import { randomUUID } from 'node:crypto';
import {
  OperationsQueueError,
  resolveLogger,
  type LocalStore,
  type Logger,
  type LoggerSetting,
  type OperationKind,
  type PendingOperation,
  type SyncEntity,
} from '@tablesync/core';

/**
 * How the caller settles a conflicting pending operation.
 *
 * - `client`: keep the local change and send it again against the
 *   server's current version
 * - `server`: adopt the server entity locally and drop the local change
 *   (a null or deleted server entity removes the local record)
 * - `merged`: send `entity` against the server's current version
 */
export type QueueResolution =
  | { kind: 'client'; serverVersion: string | null }
  | { kind: 'server'; entity: SyncEntity | null }
  | { kind: 'merged'; entity: SyncEntity; serverVersion: string | null };

export interface OperationsQueueOptions {
  logger?: LoggerSetting;
}

/**
 * Result of combining a new local change with the one already queued
 * for the same entity. `null` means the two cancel out.
 */
function coalesce(existing: OperationKind, incoming: OperationKind): OperationKind | null | 'invalid' {
  switch (`${existing}+${incoming}`) {
    case 'create+delete':
      return null;
    case 'create+update':
      return 'create';
    case 'delete+create':
      return 'update';
    case 'update+delete':
      return 'delete';
    case 'update+update':
      return 'update';
    default:
      return 'invalid';
  }
}

/**
 * Persistent FIFO of local mutations, at most one per entity.
 *
 * A new change for an entity that already has a pending operation is
 * folded into it; the operation keeps its place in the queue:
 *
 * | queued | new    | result                  |
 * |--------|--------|-------------------------|
 * | create | update | create with new snapshot |
 * | create | delete | operation removed       |
 * | update | update | update with new snapshot |
 * | update | delete | delete                  |
 * | delete | create | update with new snapshot |
 *
 * Any other pair is rejected with `TS_Q400`.
 */
export class OperationsQueue {
  private readonly store: LocalStore;
  private readonly logger: Logger;

  constructor(store: LocalStore, options: OperationsQueueOptions = {}) {
    this.store = store;
    this.logger = resolveLogger(options.logger, 'OperationsQueue');
  }

  /**
   * Record a local change. `version` is the version the change was based
   * on; it is ignored when coalescing since the queued operation already
   * carries the version of the first change.
   */
  async enqueue(
    collection: string,
    kind: OperationKind,
    entity: SyncEntity,
    version: string | null
  ): Promise<PendingOperation | null> {
    const existing = await this.store.getPending(collection, entity.id);

    if (!existing) {
      const operation: PendingOperation = {
        id: randomUUID(),
        collection,
        entityId: entity.id,
        kind,
        state: 'pending',
        item: structuredClone(entity),
        version: kind === 'create' ? null : version,
        sequence: await this.store.nextSequence(),
        revision: 0,
        lastAttempt: null,
        lastStatus: null,
      };
      await this.store.putPending(operation);
      this.logger.debug('Operation queued', {
        collection,
        entityId: entity.id,
        kind,
        sequence: operation.sequence,
      });
      return operation;
    }

    const merged = coalesce(existing.kind, kind);
    if (merged === 'invalid') {
      throw new OperationsQueueError(
        'TS_Q400',
        `Cannot queue ${kind} for "${entity.id}" behind a pending ${existing.kind}`,
        { collection, entityId: entity.id, queued: existing.kind, incoming: kind }
      );
    }

    if (merged === null) {
      await this.store.removePending(existing.id);
      this.logger.debug('Operations cancelled out', { collection, entityId: entity.id });
      return null;
    }

    const operation: PendingOperation = {
      ...existing,
      kind: merged,
      state: 'pending',
      item: structuredClone(entity),
      revision: existing.revision + 1,
    };
    await this.store.putPending(operation);
    this.logger.debug('Operation coalesced', {
      collection,
      entityId: entity.id,
      from: existing.kind,
      to: merged,
    });
    return operation;
  }

  /**
   * Pending operations in FIFO order
   */
  getPending(collection?: string): Promise<PendingOperation[]> {
    return this.store.enumeratePending(collection);
  }

  get(collection: string, entityId: string): Promise<PendingOperation | null> {
    return this.store.getPending(collection, entityId);
  }

  async count(collection?: string): Promise<number> {
    return (await this.store.enumeratePending(collection)).length;
  }

  /**
   * Drop an operation after the table service accepted it
   */
  async complete(operation: PendingOperation): Promise<void> {
    await this.store.removePending(operation.id);
  }

  /**
   * Keep the operation queued and record the failed attempt
   */
  async markFailed(operation: PendingOperation, status: number | null): Promise<PendingOperation> {
    const failed: PendingOperation = {
      ...operation,
      state: 'failed',
      lastAttempt: Date.now(),
      lastStatus: status,
    };
    await this.store.putPending(failed);
    return failed;
  }

  /**
   * Settle the pending operation of an entity. Returns the re-queued
   * operation, or null when the operation was dropped.
   */
  async resolve(
    collection: string,
    entityId: string,
    resolution: QueueResolution
  ): Promise<PendingOperation | null> {
    const existing = await this.store.getPending(collection, entityId);
    if (!existing) {
      throw new OperationsQueueError('TS_Q401', `No pending operation for "${entityId}"`, {
        collection,
        entityId,
      });
    }

    const entities = this.store.getStore<SyncEntity>(collection);

    if (resolution.kind === 'server') {
      await this.store.removePending(existing.id);
      if (resolution.entity && !resolution.entity.deleted) {
        await entities.put(resolution.entity);
      } else {
        await entities.delete(entityId);
      }
      this.logger.info('Conflict resolved with server state', { collection, entityId });
      return null;
    }

    const base = resolution.kind === 'merged' ? resolution.entity : existing.item;
    const item: SyncEntity = { ...base, id: entityId, version: resolution.serverVersion };
    const operation: PendingOperation = {
      ...existing,
      // A create that hit an existing entity becomes an update of it
      kind: existing.kind === 'create' ? 'update' : existing.kind,
      state: 'pending',
      item,
      version: resolution.serverVersion,
      revision: existing.revision + 1,
    };

    await this.store.putPending(operation);
    if (operation.kind !== 'delete') {
      await entities.put(item);
    }
    this.logger.info('Conflict resolved with local state', {
      collection,
      entityId,
      resolution: resolution.kind,
    });
    return operation;
  }
}
