import type { LoggerSetting, SyncEntity } from '@tablesync/core';
import { z } from 'zod';

/**
 * Entity as received from the table service. Unknown fields pass through.
 */
export const remoteEntitySchema = z
  .object({
    id: z.string().min(1),
    updatedAt: z.string().nullish(),
    version: z.string().nullish(),
    deleted: z.boolean().optional(),
  })
  .passthrough();

/**
 * One page of a table query
 */
export const pageSchema = z.object({
  items: z.array(remoteEntitySchema),
  count: z.number().int().nonnegative().optional(),
  nextLink: z.string().nullish(),
});

export interface Page {
  items: SyncEntity[];
  /** Total matching items, when the service was asked to count */
  count?: number;
  /** Continuation link; its presence means more items remain */
  nextLink?: string | null;
}

/**
 * Query string parameters of a page request
 */
export interface PageQuery {
  /** `$filter` expression */
  filter?: string;
  /** `$orderby` clause */
  orderBy: string;
  /** `$top` */
  top: number;
  /** `__includedeleted` */
  includeDeleted: boolean;
  /** `$count` */
  count: boolean;
}

/**
 * HTTP outcome of a table service call. Non-2xx statuses are returned,
 * not thrown; `content` carries the parsed body when it has the expected
 * shape (for 409 and 412 that is the server's current entity).
 */
export interface ServiceResponse<T> {
  status: number;
  isSuccessful: boolean;
  content: T | null;
  /** Raw ETag header */
  etag: string | null;
}

/**
 * Remote table service.
 *
 * Implementations throw `TransportError` when no HTTP response was
 * received (connection failure, timeout) and `SyncCancelledError` when
 * the caller's signal aborted the request.
 */
export interface RemoteTransport {
  getPage(endpoint: string, query: PageQuery, signal?: AbortSignal): Promise<ServiceResponse<Page>>;

  create(
    endpoint: string,
    entity: SyncEntity,
    signal?: AbortSignal
  ): Promise<ServiceResponse<SyncEntity>>;

  /**
   * Replace with an `If-Match` precondition on `version`, when given
   */
  replace(
    endpoint: string,
    entity: SyncEntity,
    version: string | null,
    signal?: AbortSignal
  ): Promise<ServiceResponse<SyncEntity>>;

  delete(
    endpoint: string,
    id: string,
    version: string | null,
    signal?: AbortSignal
  ): Promise<ServiceResponse<SyncEntity>>;
}

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Configuration for {@link HttpTransport}
 */
export interface TransportConfig {
  /** Base URL the collection endpoints are resolved against */
  baseUrl: string;
  /** Bearer token sent in the Authorization header */
  authToken?: string;
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** Fetch implementation (default: global fetch) */
  fetch?: FetchFunction;
  logger?: LoggerSetting;
}
