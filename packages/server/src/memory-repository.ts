import { randomBytes, randomUUID } from 'node:crypto';
import { decodeVersion, encodeVersion, formatTimestamp, versionBytesEqual } from '@tablesync/core';
import { HttpError } from './http-error.js';
import type { Repository, TableData } from './repository.js';

export interface InMemoryRepositoryOptions<T extends TableData> {
  /** Initial entities. Each gets fresh metadata; missing ids are generated. */
  entities?: T[];
  /** Time source in ms (default: Date.now) */
  clock?: () => number;
}

/**
 * Repository holding its entities in a Map.
 *
 * Every write stamps the entity with a new 16-byte version and an
 * `updatedAt` strictly later than the previous write, so delta queries
 * ordered by (updatedAt, id) never miss a change made in the same
 * millisecond.
 *
 * @example
 * ```typescript
 * const repository = new InMemoryRepository<Todo>({
 *   entities: [{ id: 't1', title: 'Milk', updatedAt: null, version: null, deleted: false }],
 * });
 * ```
 */
export class InMemoryRepository<T extends TableData> implements Repository<T> {
  private readonly entities = new Map<string, T>();
  private readonly clock: () => number;
  private lastUpdatedAt = 0;
  private failure: Error | null = null;

  constructor(options: InMemoryRepositoryOptions<T> = {}) {
    this.clock = options.clock ?? Date.now;
    for (const entity of options.entities ?? []) {
      this.store({ ...entity, id: entity.id || randomUUID() });
    }
  }

  async query(): Promise<T[]> {
    this.throwIfFailing();
    return [...this.entities.values()].map((entity) => structuredClone(entity));
  }

  async read(id: string): Promise<T> {
    this.throwIfFailing();
    return structuredClone(this.getStored(id));
  }

  async create(entity: T): Promise<T> {
    this.throwIfFailing();
    const id = entity.id || randomUUID();

    const existing = this.entities.get(id);
    if (existing) {
      throw new HttpError(409, `Entity "${id}" already exists`, structuredClone(existing));
    }

    return this.store({ ...entity, id });
  }

  async replace(entity: T, version?: Uint8Array): Promise<T> {
    this.throwIfFailing();
    const stored = this.getStored(entity.id);
    this.checkVersion(stored, version);
    return this.store(entity);
  }

  async delete(id: string, version?: Uint8Array): Promise<void> {
    this.throwIfFailing();
    const stored = this.getStored(id);
    this.checkVersion(stored, version);
    this.entities.delete(id);
  }

  /**
   * Make every following call reject with `error`; null restores normal
   * operation
   */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  /** Stored copy of an entity, bypassing failures */
  getEntity(id: string): T | null {
    const stored = this.entities.get(id);
    return stored ? structuredClone(stored) : null;
  }

  getEntities(): T[] {
    return [...this.entities.values()].map((entity) => structuredClone(entity));
  }

  get size(): number {
    return this.entities.size;
  }

  clear(): void {
    this.entities.clear();
  }

  private store(entity: T): T {
    const now = Math.max(this.clock(), this.lastUpdatedAt + 1);
    this.lastUpdatedAt = now;

    const stored: T = {
      ...structuredClone(entity),
      updatedAt: formatTimestamp(now),
      version: encodeVersion(randomBytes(16)),
    };
    this.entities.set(stored.id, stored);
    return structuredClone(stored);
  }

  private getStored(id: string): T {
    if (!id) {
      throw new HttpError(400, 'Entity id is required');
    }
    const stored = this.entities.get(id);
    if (!stored) {
      throw new HttpError(404, `Entity "${id}" not found`);
    }
    return stored;
  }

  private checkVersion(stored: T, version: Uint8Array | undefined): void {
    if (!version || version.length === 0) {
      return;
    }
    const current = stored.version ? decodeVersion(stored.version) : null;
    if (!current || !versionBytesEqual(current, version)) {
      throw new HttpError(412, 'Version mismatch', structuredClone(stored));
    }
  }

  private throwIfFailing(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}
