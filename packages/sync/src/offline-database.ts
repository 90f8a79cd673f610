import { randomUUID } from 'node:crypto';
import {
  ConfigurationError,
  LocalStorageError,
  TableSyncError,
  isValidEntityId,
  type EntityStore,
  type LocalStore,
  type LoggerSetting,
  type PendingOperation,
  type SyncEntity,
} from '@tablesync/core';
import { LockManager } from './lock-manager.js';
import { OperationsQueue } from './operations-queue.js';

const COLLECTION_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_-]{0,63}$/;

export function isValidCollectionName(name: string): boolean {
  return COLLECTION_NAME_PATTERN.test(name);
}

export interface OfflineDatabaseOptions {
  /** Names of the synchronized collections */
  collections: string[];
  /** Share locks with another component; one is created otherwise */
  lockManager?: LockManager;
  logger?: LoggerSetting;
}

export interface ListOptions {
  /** Include local tombstones (default: false) */
  includeDeleted?: boolean;
}

/**
 * Application-facing view of one synchronized collection. Every write
 * lands in the local store and queues a pending operation for the next
 * push; writes to an entity wait while that entity is being pushed.
 */
export class OfflineCollection<T extends SyncEntity> {
  readonly name: string;

  private readonly entities: EntityStore<T>;
  private readonly queue: OperationsQueue;
  private readonly locks: LockManager;

  constructor(name: string, entities: EntityStore<T>, queue: OperationsQueue, locks: LockManager) {
    this.name = name;
    this.entities = entities;
    this.queue = queue;
    this.locks = locks;
  }

  get(id: string): Promise<T | null> {
    return this.entities.get(id);
  }

  async list(options: ListOptions = {}): Promise<T[]> {
    const all = await this.entities.getAll();
    return options.includeDeleted ? all : all.filter((entity) => !entity.deleted);
  }

  /**
   * Insert a new entity. An empty id is replaced with a random UUID.
   * Server-owned metadata on the input is discarded.
   */
  async insert(entity: T): Promise<T> {
    const id = entity.id || randomUUID();
    assertEntityId(id);

    return this.locks.withEntityLock(this.name, id, async () => {
      const existing = await this.entities.get(id);
      if (existing && !existing.deleted) {
        throw new LocalStorageError('TS_S302', { collection: this.name, id });
      }

      const record = { ...entity, id, updatedAt: null, version: null, deleted: false };
      await this.queue.enqueue(this.name, 'create', record, null);
      return this.entities.put(record);
    });
  }

  /**
   * Replace an existing entity. The change is pushed with the version the
   * local record carried, so a concurrent remote edit surfaces as a
   * conflict.
   */
  async replace(entity: T): Promise<T> {
    assertEntityId(entity.id);

    return this.locks.withEntityLock(this.name, entity.id, async () => {
      const existing = await this.requireExisting(entity.id);
      const record = {
        ...entity,
        updatedAt: existing.updatedAt ?? null,
        version: existing.version ?? null,
        deleted: false,
      };
      await this.queue.enqueue(this.name, 'update', record, existing.version ?? null);
      return this.entities.put(record);
    });
  }

  /**
   * Remove an entity locally and queue its deletion
   */
  async remove(id: string): Promise<void> {
    assertEntityId(id);

    await this.locks.withEntityLock(this.name, id, async () => {
      const existing = await this.requireExisting(id);
      await this.queue.enqueue(this.name, 'delete', existing, existing.version ?? null);
      await this.entities.delete(id);
    });
  }

  /**
   * Pending operation for an entity, if any
   */
  pendingOperation(id: string): Promise<PendingOperation | null> {
    return this.queue.get(this.name, id);
  }

  private async requireExisting(id: string): Promise<T> {
    const existing = await this.entities.get(id);
    if (!existing || existing.deleted) {
      throw new LocalStorageError('TS_S301', { collection: this.name, id });
    }
    return existing;
  }
}

/**
 * Local database of synchronized collections: the local store, the queue
 * of pending operations and the locks shared with the sync engine.
 *
 * @example
 * ```typescript
 * const db = new OfflineDatabase(createMemoryStore(), { collections: ['todos'] });
 * const todos = db.collection<Todo>('todos');
 * await todos.insert({ id: '', title: 'Buy milk', completed: false });
 * ```
 */
export class OfflineDatabase {
  readonly store: LocalStore;
  readonly locks: LockManager;
  readonly queue: OperationsQueue;

  private readonly collectionNames: ReadonlySet<string>;

  constructor(store: LocalStore, options: OfflineDatabaseOptions) {
    const invalid = options.collections.filter((name) => !isValidCollectionName(name));
    if (options.collections.length === 0 || invalid.length > 0) {
      throw new ConfigurationError(
        options.collections.length === 0
          ? [{ path: 'collections', message: 'At least one collection is required' }]
          : invalid.map((name) => ({
              path: 'collections',
              message: `"${name}" is not a valid collection name`,
            }))
      );
    }

    this.store = store;
    this.locks = options.lockManager ?? new LockManager();
    this.queue = new OperationsQueue(store, { logger: options.logger });
    this.collectionNames = new Set(options.collections);
  }

  get collections(): string[] {
    return [...this.collectionNames];
  }

  hasCollection(name: string): boolean {
    return this.collectionNames.has(name);
  }

  collection<T extends SyncEntity>(name: string): OfflineCollection<T> {
    this.assertCollection(name);
    return new OfflineCollection<T>(name, this.store.getStore<T>(name), this.queue, this.locks);
  }

  assertCollection(name: string): void {
    if (!this.collectionNames.has(name)) {
      throw new ConfigurationError(
        [{ path: 'collection', message: `"${name}" is not a registered collection` }],
        'TS_C102',
        { collection: name }
      );
    }
  }

  close(): Promise<void> {
    return this.store.close();
  }
}

function assertEntityId(id: string): void {
  if (!isValidEntityId(id)) {
    throw new TableSyncError({ code: 'TS_C103', context: { id } });
  }
}
