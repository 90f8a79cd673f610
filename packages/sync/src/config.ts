import {
  ConfigurationError,
  type ConfigurationIssue,
  type LoggerSetting,
} from '@tablesync/core';
import { z } from 'zod';
import type { ConflictStrategy, MergeFunction } from './conflict.js';
import { MAX_PARALLELISM, MIN_PARALLELISM } from './queue-handler.js';
import type { RemoteTransport } from './transport/types.js';

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 1000;

/**
 * Per-collection synchronization settings
 */
export interface CollectionSyncOptions {
  /** Collection name in the offline database */
  name: string;
  /** Endpoint relative to the transport base URL (default: `tables/<name>`) */
  endpoint?: string;
  /** Key of the pull cursor (default: the collection name) */
  queryId?: string;
  /** Extra `$filter` predicate for pulls */
  filter?: string;
}

/**
 * Sync engine configuration
 */
export interface SyncConfig {
  /** Remote table service. Either this or `baseUrl` is required. */
  transport?: RemoteTransport;
  /** Base URL of the table service, used to build an HTTP transport */
  baseUrl?: string;
  /** Bearer token for the HTTP transport */
  authToken?: string;
  /** HTTP request timeout in ms (default: 30000) */
  timeout?: number;
  /** Collections to synchronize (default: every collection of the database) */
  collections?: (string | CollectionSyncOptions)[];
  /** Items requested per pull page, 1-1000 (default: 100) */
  pageSize?: number;
  /** Concurrent pushes or collection pulls, 1-8 (default: 1) */
  parallelOperations?: number;
  /** Keep soft-deleted entities as local tombstones (default: false) */
  tombstones?: boolean;
  /** How push conflicts are settled (default: 'manual') */
  conflictStrategy?: ConflictStrategy;
  /** Merge function for the 'merge' strategy */
  mergeFunction?: MergeFunction;
  /** Logger options for structured logging */
  logger?: LoggerSetting;
}

export const collectionSyncOptionsSchema = z.object({
  name: z.string().min(1),
  endpoint: z.string().min(1).optional(),
  queryId: z
    .string()
    .regex(/^[a-zA-Z0-9][a-zA-Z0-9_.|:-]{0,127}$/, 'must be a valid query id')
    .optional(),
  filter: z.string().min(1).optional(),
});

export const syncOptionsSchema = z.object({
  baseUrl: z.string().url().optional(),
  authToken: z.string().optional(),
  timeout: z.number().int().positive().optional(),
  collections: z.array(z.union([z.string().min(1), collectionSyncOptionsSchema])).optional(),
  pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  parallelOperations: z
    .number()
    .int()
    .min(MIN_PARALLELISM)
    .max(MAX_PARALLELISM)
    .default(MIN_PARALLELISM),
  tombstones: z.boolean().default(false),
  conflictStrategy: z.enum(['manual', 'server-wins', 'client-wins', 'merge']).default('manual'),
});

export type SyncOptions = z.output<typeof syncOptionsSchema>;

export function toConfigurationIssues(error: z.ZodError): ConfigurationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validate the data options of a sync configuration and fill defaults.
 * Throws {@link ConfigurationError} synchronously.
 */
export function parseSyncOptions(config: SyncConfig): SyncOptions {
  const result = syncOptionsSchema.safeParse({
    baseUrl: config.baseUrl,
    authToken: config.authToken,
    timeout: config.timeout,
    collections: config.collections,
    pageSize: config.pageSize,
    parallelOperations: config.parallelOperations,
    tombstones: config.tombstones,
    conflictStrategy: config.conflictStrategy,
  });

  if (!result.success) {
    throw new ConfigurationError(toConfigurationIssues(result.error));
  }

  if (!config.transport && !result.data.baseUrl) {
    throw new ConfigurationError(
      [{ path: 'transport', message: 'Either transport or baseUrl is required' }],
      'TS_C101'
    );
  }

  if (config.mergeFunction !== undefined && result.data.conflictStrategy !== 'merge') {
    throw new ConfigurationError([
      { path: 'mergeFunction', message: "is only used with conflictStrategy 'merge'" },
    ]);
  }

  return result.data;
}
