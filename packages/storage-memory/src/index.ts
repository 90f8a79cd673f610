/**
 * @packageDocumentation
 *
 * In-memory local store for tablesync.
 *
 * Keeps entities, pending operations and pull cursors in process memory.
 * Meant for tests, prototypes and server-side use where nothing needs to
 * survive a restart.
 *
 * ```typescript
 * import { OfflineDatabase, SyncEngine } from '@tablesync/sync';
 * import { createMemoryStore } from '@tablesync/storage-memory';
 *
 * const db = new OfflineDatabase(createMemoryStore(), { collections: ['todos'] });
 * ```
 *
 * @module @tablesync/storage-memory
 */
export * from './adapter.js';
