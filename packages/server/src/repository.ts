import { z } from 'zod';

/**
 * A row of a synchronized table as the service stores it. The service owns
 * `updatedAt` and `version` and rewrites both on every change.
 */
export interface TableData {
  id: string;
  /** ISO-8601 with milliseconds */
  updatedAt: string | null;
  /** Base64 of the opaque concurrency token */
  version: string | null;
  deleted: boolean;
  [field: string]: unknown;
}

/**
 * Operations a table controller performs
 */
export type TableOperation = 'query' | 'read' | 'create' | 'update' | 'delete';

/**
 * Schema of a request body. Metadata the client omits is filled with the
 * empty values the repository replaces; unknown fields pass through.
 *
 * @example
 * ```typescript
 * const todoSchema = tableDataSchema.extend({
 *   title: z.string().min(1),
 *   done: z.boolean().default(false),
 * });
 * ```
 */
export const tableDataSchema = z
  .object({
    id: z.string().default(''),
    updatedAt: z
      .string()
      .nullish()
      .transform((value) => value ?? null),
    version: z
      .string()
      .nullish()
      .transform((value) => value ?? null),
    deleted: z.boolean().default(false),
  })
  .passthrough();

/**
 * Storage behind a table controller.
 *
 * Implementations signal failures with `HttpError`: 400 for an empty id,
 * 404 for a missing entity, 409 when creating an id that exists and 412
 * when `version` does not match the stored one. 409 and 412 carry the
 * stored entity as payload. Every method returns copies; callers never
 * hold a reference into the store.
 */
export interface Repository<T extends TableData> {
  /** Every stored entity, deleted ones included */
  query(): Promise<T[]>;

  read(id: string): Promise<T>;

  /** Store a new entity. An empty id is replaced by a fresh UUID. */
  create(entity: T): Promise<T>;

  /**
   * Replace a stored entity. A non-empty `version` must match the stored
   * version.
   */
  replace(entity: T, version?: Uint8Array): Promise<T>;

  delete(id: string, version?: Uint8Array): Promise<void>;
}

/**
 * Per-request authorization and data shaping of a table. Every member is
 * optional; a controller without a provider allows everything.
 */
export interface AccessControlProvider<T extends TableData> {
  /**
   * Whether the caller may perform `operation`. `entity` is null for
   * queries.
   */
  isAuthorized?(operation: TableOperation, entity: T | null): boolean | Promise<boolean>;

  /**
   * Predicate limiting the entities the caller can see. Entities outside
   * the view are reported as missing.
   */
  getDataView?(): ((entity: T) => boolean) | null;

  /** Adjust an entity before it is written */
  preCommitHook?(operation: TableOperation, entity: T): T | Promise<T>;

  /** Observe an entity after it was written */
  postCommitHook?(operation: TableOperation, entity: T): void | Promise<void>;
}

/**
 * Raised by a table controller after a successful write
 */
export interface RepositoryUpdatedEvent<T extends TableData = TableData> {
  operation: TableOperation;
  entityName: string;
  entity: T;
  timestamp: number;
}
