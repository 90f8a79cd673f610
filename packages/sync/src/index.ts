/**
 * @tablesync/sync - Offline synchronization for table services
 *
 * Keeps collections in a local store usable while offline and reconciles
 * them with a remote table service.
 *
 * ## Architecture
 *
 * ```
 * ┌─────────────────────────────────────────────────────────────┐
 * │                     Client Application                      │
 * └──────────────────────────────┬──────────────────────────────┘
 *                                │ insert / replace / remove
 *                                ▼
 * ┌─────────────────────────────────────────────────────────────┐
 * │  OfflineDatabase                                            │
 * │  ┌──────────────┐  ┌──────────────────┐  ┌──────────────┐   │
 * │  │ LocalStore   │  │ OperationsQueue  │  │ LockManager  │   │
 * │  └──────────────┘  └──────────────────┘  └──────────────┘   │
 * └──────────────────────────────┬──────────────────────────────┘
 *                                │
 *                                ▼
 * ┌─────────────────────────────────────────────────────────────┐
 * │  SyncEngine.synchronize()                                   │
 * │  1. PushOperationManager  (pending operations, FIFO)        │
 * │  2. PullOperationManager  (pages after the delta cursor)    │
 * └──────────────────────────────┬──────────────────────────────┘
 *                                │ RemoteTransport (HTTP)
 *                                ▼
 * ┌─────────────────────────────────────────────────────────────┐
 * │                 Table service (@tablesync/server)           │
 * └─────────────────────────────────────────────────────────────┘
 * ```
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createMemoryStore } from '@tablesync/storage-memory';
 * import { OfflineDatabase, createSyncEngine } from '@tablesync/sync';
 *
 * const db = new OfflineDatabase(createMemoryStore(), { collections: ['todos'] });
 * await db.collection<Todo>('todos').insert({ id: '', title: 'Write report' });
 *
 * const sync = createSyncEngine(db, {
 *   baseUrl: 'https://api.example.com/',
 *   authToken: userToken,
 *   conflictStrategy: 'server-wins',
 * });
 *
 * const result = await sync.synchronize();
 * ```
 *
 * @packageDocumentation
 * @module @tablesync/sync
 *
 * @see {@link SyncEngine} for the orchestrator
 * @see {@link OfflineDatabase} for local reads and writes
 */

export * from './cancellation.js';
export * from './config.js';
export * from './conflict.js';
export * from './cursor-store.js';
export * from './events.js';
export * from './lock-manager.js';
export * from './offline-database.js';
export * from './operations-queue.js';
export * from './pull-manager.js';
export * from './pull-query.js';
export * from './push-manager.js';
export * from './queue-handler.js';
export * from './results.js';
export * from './sync-engine.js';
export * from './transport/index.js';
