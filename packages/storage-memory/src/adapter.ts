import type {
  EntityStore,
  LocalStore,
  PendingOperation,
  PullCursor,
  SyncEntity,
} from '@tablesync/core';

/**
 * In-memory entity table
 */
class MemoryEntityStore<T extends SyncEntity> implements EntityStore<T> {
  readonly name: string;

  private entities = new Map<string, T>();

  constructor(name: string) {
    this.name = name;
  }

  async get(id: string): Promise<T | null> {
    const entity = this.entities.get(id);
    return entity ? structuredClone(entity) : null;
  }

  async getAll(): Promise<T[]> {
    return Array.from(this.entities.values(), (entity) => structuredClone(entity));
  }

  async put(entity: T): Promise<T> {
    // Clone to prevent external mutations
    const stored = structuredClone(entity);
    this.entities.set(entity.id, stored);
    return structuredClone(stored);
  }

  async delete(id: string): Promise<boolean> {
    return this.entities.delete(id);
  }

  async clear(): Promise<void> {
    this.entities.clear();
  }
}

function pendingKey(collection: string, entityId: string): string {
  return `${collection}\u0000${entityId}`;
}

/**
 * Local store that keeps entities, pending operations and pull cursors in
 * memory. Nothing survives the process.
 */
export class MemoryLocalStore implements LocalStore {
  readonly name = 'memory';

  private stores = new Map<string, MemoryEntityStore<SyncEntity>>();
  private pending = new Map<string, PendingOperation>();
  private cursors = new Map<string, PullCursor>();
  private sequence = 0;

  getStore<T extends SyncEntity>(collection: string): EntityStore<T> {
    let store = this.stores.get(collection);

    if (!store) {
      store = new MemoryEntityStore(collection);
      this.stores.set(collection, store);
    }

    return store as unknown as EntityStore<T>;
  }

  hasStore(collection: string): boolean {
    return this.stores.has(collection);
  }

  async enumeratePending(collection?: string): Promise<PendingOperation[]> {
    const operations: PendingOperation[] = [];
    for (const operation of this.pending.values()) {
      if (collection === undefined || operation.collection === collection) {
        operations.push(structuredClone(operation));
      }
    }
    return operations.sort((a, b) => a.sequence - b.sequence);
  }

  async getPending(collection: string, entityId: string): Promise<PendingOperation | null> {
    const operation = this.pending.get(pendingKey(collection, entityId));
    return operation ? structuredClone(operation) : null;
  }

  async putPending(operation: PendingOperation): Promise<void> {
    this.pending.set(pendingKey(operation.collection, operation.entityId), structuredClone(operation));
  }

  async removePending(operationId: string): Promise<boolean> {
    for (const [key, operation] of this.pending) {
      if (operation.id === operationId) {
        this.pending.delete(key);
        return true;
      }
    }
    return false;
  }

  async nextSequence(): Promise<number> {
    this.sequence += 1;
    return this.sequence;
  }

  async getCursor(key: string): Promise<PullCursor | null> {
    const cursor = this.cursors.get(key);
    return cursor ? { ...cursor } : null;
  }

  async setCursor(key: string, cursor: PullCursor): Promise<void> {
    this.cursors.set(key, { ...cursor });
  }

  async deleteCursor(key: string): Promise<void> {
    this.cursors.delete(key);
  }

  async close(): Promise<void> {
    this.stores.clear();
    this.pending.clear();
    this.cursors.clear();
  }
}

/**
 * Create a memory local store
 */
export function createMemoryStore(): MemoryLocalStore {
  return new MemoryLocalStore();
}
