import { SyncCancelledError } from '@tablesync/core';

/**
 * Scoped ownership of a keyed lock. `release()` may be called more than
 * once; only the first call has an effect.
 */
export interface LockHandle {
  readonly key: string;
  release(): void;
}

interface Waiter {
  grant: () => void;
  detach: () => void;
}

interface LockEntry {
  held: boolean;
  waiters: Waiter[];
  /** Holder plus waiters. The entry is dropped when this reaches zero. */
  references: number;
}

/**
 * Map of keyed asynchronous mutexes. Waiters for a key are served in FIFO
 * order; entries exist only while someone holds or waits for the key.
 *
 * @example
 * ```typescript
 * const locks = new AsyncLockDictionary();
 * await locks.withLock('todos', async () => {
 *   // exclusive for 'todos'
 * });
 * ```
 */
export class AsyncLockDictionary {
  private readonly entries = new Map<string, LockEntry>();

  /**
   * Wait for the lock on `key`. If `signal` aborts before the lock is
   * granted the waiter leaves the queue and the call rejects with
   * {@link SyncCancelledError}; no lock is held in that case.
   */
  async acquire(key: string, signal?: AbortSignal): Promise<LockHandle> {
    if (signal?.aborted) {
      throw new SyncCancelledError(`Lock acquisition for "${key}" cancelled`);
    }

    const entry = this.reference(key);
    if (!entry.held) {
      entry.held = true;
      return this.createHandle(key, entry);
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = entry.waiters.indexOf(waiter);
        if (index === -1) return;
        entry.waiters.splice(index, 1);
        this.dereference(key, entry);
        reject(new SyncCancelledError(`Lock acquisition for "${key}" cancelled`));
      };
      const waiter: Waiter = {
        grant: resolve,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      entry.waiters.push(waiter);
    });

    return this.createHandle(key, entry);
  }

  /**
   * Run `fn` while holding the lock on `key`
   */
  async withLock<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const handle = await this.acquire(key, signal);
    try {
      return await fn();
    } finally {
      handle.release();
    }
  }

  isLocked(key: string): boolean {
    return this.entries.get(key)?.held ?? false;
  }

  /**
   * Number of keys currently held or waited for
   */
  get size(): number {
    return this.entries.size;
  }

  private reference(key: string): LockEntry {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { held: false, waiters: [], references: 0 };
      this.entries.set(key, entry);
    }
    entry.references += 1;
    return entry;
  }

  private dereference(key: string, entry: LockEntry): void {
    entry.references -= 1;
    if (entry.references === 0 && this.entries.get(key) === entry) {
      this.entries.delete(key);
    }
  }

  private createHandle(key: string, entry: LockEntry): LockHandle {
    let released = false;
    return {
      key,
      release: () => {
        if (released) return;
        released = true;

        const next = entry.waiters.shift();
        if (next) {
          // Ownership passes straight to the next waiter
          next.detach();
          next.grant();
        } else {
          entry.held = false;
        }
        this.dereference(key, entry);
      },
    };
  }
}

/**
 * Lock key that serializes whole synchronization cycles
 */
export const SYNC_LOCK_KEY = 'synclock';

export function collectionLockKey(collection: string): string {
  return `collection:${collection}`;
}

export function entityLockKey(collection: string, entityId: string): string {
  return `entity:${collection}:${entityId}`;
}

/**
 * Names the locks of one offline database.
 *
 * - the sync lock is held for a whole push-then-pull cycle
 * - a collection lock is held while that collection is pulled
 * - an entity lock is held while the entity is pushed and by every local
 *   write to it
 *
 * When more than one is needed they are taken in the order entity, then
 * collection. Pulls never take entity locks.
 */
export class LockManager {
  private readonly locks = new AsyncLockDictionary();

  acquireSyncLock(signal?: AbortSignal): Promise<LockHandle> {
    return this.locks.acquire(SYNC_LOCK_KEY, signal);
  }

  acquireCollectionLock(collection: string, signal?: AbortSignal): Promise<LockHandle> {
    return this.locks.acquire(collectionLockKey(collection), signal);
  }

  acquireEntityLock(collection: string, entityId: string, signal?: AbortSignal): Promise<LockHandle> {
    return this.locks.acquire(entityLockKey(collection, entityId), signal);
  }

  withCollectionLock<T>(collection: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.locks.withLock(collectionLockKey(collection), fn, signal);
  }

  withEntityLock<T>(
    collection: string,
    entityId: string,
    fn: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    return this.locks.withLock(entityLockKey(collection, entityId), fn, signal);
  }

  isSyncLocked(): boolean {
    return this.locks.isLocked(SYNC_LOCK_KEY);
  }

  isLocked(key: string): boolean {
    return this.locks.isLocked(key);
  }

  /**
   * Number of keys currently held or waited for
   */
  get activeKeys(): number {
    return this.locks.size;
  }
}
