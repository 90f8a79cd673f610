/**
 * @packageDocumentation
 *
 * Table service for tablesync clients.
 *
 * Each table is a {@link TableController} over a {@link Repository}. The
 * controller implements the REST contract the sync engine speaks: delta
 * queries with `$filter`, `$orderby`, `$top`, `$skip` and `$count`,
 * optimistic concurrency through ETags, and soft delete. A
 * {@link TableServer} routes requests to the controllers, either in
 * process through `fetch()` or over node:http.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { z } from 'zod';
 * import {
 *   InMemoryRepository,
 *   TableController,
 *   createTableServer,
 *   tableDataSchema,
 * } from '@tablesync/server';
 *
 * const todoSchema = tableDataSchema.extend({ title: z.string() });
 * type Todo = z.output<typeof todoSchema>;
 *
 * const server = createTableServer({
 *   port: 8080,
 *   tables: {
 *     todos: new TableController(new InMemoryRepository<Todo>(), {
 *       schema: todoSchema,
 *       enableSoftDelete: true,
 *     }),
 *   },
 * });
 *
 * await server.start();
 * ```
 *
 * ## Architecture
 *
 * ```
 * ┌─────────────────────────────────────┐
 * │            TableServer              │
 * │  ├── node:http / fetch(Request)     │
 * │  ├── Bearer token check             │
 * │  └── TableController (per table)    │
 * │      ├── AccessControlProvider      │
 * │      ├── $filter / $orderby parser  │
 * │      ├── Conditional requests       │
 * │      └── Repository                 │
 * │          └── InMemoryRepository     │
 * └─────────────────────────────────────┘
 * ```
 *
 * @module @tablesync/server
 */
export * from './filter.js';
export * from './http-error.js';
export * from './memory-repository.js';
export * from './repository.js';
export * from './table-controller.js';
export * from './table-server.js';
