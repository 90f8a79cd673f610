import type { SyncEntity } from '@tablesync/core';
import {
  InMemoryRepository,
  TableController,
  TableServer,
  tableDataSchema,
  type TableControllerOptions,
  type TableServerEvent,
} from '@tablesync/server';
import { MemoryLocalStore } from '@tablesync/storage-memory';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import type { SyncConfig } from '../config.js';
import { OfflineDatabase, type OfflineCollection } from '../offline-database.js';
import { SyncEngine } from '../sync-engine.js';
import { createHttpTransport } from '../transport/http.js';

const todoSchema = tableDataSchema.extend({ title: z.string() });
type ServerTodo = z.output<typeof todoSchema>;

interface Todo extends SyncEntity {
  title: string;
}

interface Client {
  db: OfflineDatabase;
  todos: OfflineCollection<Todo>;
  engine: SyncEngine;
}

const base = Date.parse('2024-05-01T10:00:00.000Z');

function seed(id: string, title: string): ServerTodo {
  return { id, title, updatedAt: null, version: null, deleted: false };
}

describe('Sync flow against an in-process table service', () => {
  let repository: InMemoryRepository<ServerTodo>;
  let server: TableServer;
  let serverEvents: TableServerEvent[];
  let clients: Client[];

  function startServer(
    entities: ServerTodo[] = [],
    options: Pick<TableControllerOptions<ServerTodo>, 'enableSoftDelete'> = {}
  ): void {
    repository = new InMemoryRepository<ServerTodo>({ entities, clock: () => base });
    server = new TableServer({
      tables: {
        todos: new TableController(repository, { schema: todoSchema, logger: false, ...options }),
      },
      authenticate: (token) => token === 'test-token',
      logger: false,
    });
    server.events.subscribe((event) => serverEvents.push(event));
  }

  function createClient(config: Partial<SyncConfig> = {}, authToken = 'test-token'): Client {
    const db = new OfflineDatabase(new MemoryLocalStore(), { collections: ['todos'], logger: false });
    const transport = createHttpTransport({
      baseUrl: 'http://localhost/',
      authToken,
      fetch: (input, init) => server.fetch(new Request(input, init)),
      logger: false,
    });
    const engine = new SyncEngine(db, { transport, logger: false, ...config });
    const client = { db, todos: db.collection<Todo>('todos'), engine };
    clients.push(client);
    return client;
  }

  function pageRequests(): number {
    return serverEvents.filter((e) => e.type === 'request' && e.method === 'GET').length;
  }

  beforeEach(() => {
    serverEvents = [];
    clients = [];
  });

  afterEach(async () => {
    for (const client of clients) {
      client.engine.destroy();
    }
    await server.destroy();
  });

  it('should carry local inserts to another client', async () => {
    startServer();
    const a = createClient();
    const b = createClient();
    await a.todos.insert({ id: 't1', title: 'Milk' });
    await a.todos.insert({ id: 't2', title: 'Bread' });

    const pushed = await a.engine.synchronize();
    const pulled = await b.engine.synchronize();

    expect(pushed.isSuccessful).toBe(true);
    expect(pushed.push.completedCount).toBe(2);
    expect(repository.getEntities().map((t) => t.title)).toEqual(['Milk', 'Bread']);
    expect(pulled.pull?.additions).toBe(2);
    expect(await b.todos.get('t1')).toEqual(repository.getEntity('t1'));
    expect(await a.todos.get('t2')).toEqual(repository.getEntity('t2'));
  });

  it('should pull only what changed since the last cycle', async () => {
    startServer([seed('t1', 'Milk'), seed('t2', 'Bread')]);
    const a = createClient();
    const b = createClient();
    await a.engine.synchronize();
    await b.engine.synchronize();

    await b.todos.replace({ id: 't2', title: 'Rye bread' });
    await b.engine.synchronize();
    const result = await a.engine.synchronize();

    expect(result.pull).toMatchObject({ additions: 0, replacements: 1, itemCount: 1 });
    expect((await a.todos.get('t2'))?.title).toBe('Rye bread');
    expect(await a.todos.get('t1')).toEqual(repository.getEntity('t1'));
  });

  it('should walk a collection page by page', async () => {
    startServer(['a', 'b', 'c', 'd', 'e'].map((id) => seed(id, `Item ${id}`)));
    const client = createClient({ pageSize: 2 });

    const first = await client.engine.synchronize();

    expect(first.pull?.additions).toBe(5);
    expect(pageRequests()).toBe(3);
    expect((await client.todos.list()).map((t) => t.id).sort()).toEqual(['a', 'b', 'c', 'd', 'e']);

    const second = await client.engine.synchronize();

    expect(second.pull?.itemCount).toBe(0);
    expect(pageRequests()).toBe(4);
  });

  it('should report a concurrent edit and send the local change once settled', async () => {
    startServer([seed('t1', 'Milk')]);
    const a = createClient();
    const b = createClient();
    await a.engine.synchronize();
    await b.engine.synchronize();
    await a.todos.replace({ id: 't1', title: 'Oat milk' });
    await b.todos.replace({ id: 't1', title: 'Soy milk' });
    await b.engine.synchronize();

    const conflicted = await a.engine.synchronize();

    const failure = conflicted.failedOperations.get('todos:t1');
    expect(conflicted.isSuccessful).toBe(false);
    expect(failure).toMatchObject({ kind: 'conflict', status: 412, operation: 'update' });
    expect(failure?.serverEntity).toEqual(repository.getEntity('t1'));
    expect(await a.engine.pendingCount()).toBe(1);

    await a.engine.resolveConflict('todos', 't1', {
      kind: 'client',
      serverVersion: failure?.serverEntity?.version ?? null,
    });
    const settled = await a.engine.synchronize();

    expect(settled.isSuccessful).toBe(true);
    expect(repository.getEntity('t1')?.title).toBe('Oat milk');
    expect(await a.todos.get('t1')).toEqual(repository.getEntity('t1'));
  });

  it('should adopt the server state with server-wins', async () => {
    startServer([seed('t1', 'Milk')]);
    const a = createClient({ conflictStrategy: 'server-wins' });
    const b = createClient();
    await a.engine.synchronize();
    await b.engine.synchronize();
    await a.todos.replace({ id: 't1', title: 'Oat milk' });
    await b.todos.replace({ id: 't1', title: 'Soy milk' });
    await b.engine.synchronize();

    await a.engine.synchronize();

    expect(await a.engine.pendingCount()).toBe(0);
    expect(await a.todos.get('t1')).toEqual(repository.getEntity('t1'));
    expect(repository.getEntity('t1')?.title).toBe('Soy milk');
  });

  it('should report a create that collides with an existing id', async () => {
    startServer([seed('t1', 'Milk')]);
    const client = createClient();
    await client.todos.insert({ id: 't1', title: 'Other milk' });

    const result = await client.engine.synchronize();

    expect(result.failedOperations.get('todos:t1')).toMatchObject({
      kind: 'conflict',
      status: 409,
      operation: 'create',
      serverEntity: { id: 't1', title: 'Milk' },
    });
  });

  it('should remove deleted entities from the service', async () => {
    startServer([seed('t1', 'Milk')]);
    const client = createClient();
    await client.engine.synchronize();

    await client.todos.remove('t1');
    const result = await client.engine.synchronize();

    expect(result.isSuccessful).toBe(true);
    expect(repository.getEntity('t1')).toBeNull();
    expect(await client.todos.get('t1')).toBeNull();
  });

  describe('with soft delete', () => {
    beforeEach(() => {
      startServer([seed('t1', 'Milk'), seed('t2', 'Bread')], { enableSoftDelete: true });
    });

    it('should propagate a deletion to other clients', async () => {
      const a = createClient();
      const b = createClient();
      await a.engine.synchronize();
      await b.engine.synchronize();

      await a.todos.remove('t1');
      await a.engine.synchronize();
      const result = await b.engine.synchronize();

      expect(repository.getEntity('t1')?.deleted).toBe(true);
      expect(result.pull?.deletions).toBe(1);
      expect(await b.todos.get('t1')).toBeNull();
    });

    it('should keep tombstones when asked to', async () => {
      const a = createClient();
      const b = createClient({ tombstones: true });
      await a.engine.synchronize();
      await b.engine.synchronize();

      await a.todos.remove('t1');
      await a.engine.synchronize();
      await b.engine.synchronize();

      expect(await b.todos.get('t1')).toMatchObject({ id: 't1', deleted: true });
      expect((await b.todos.list()).map((t) => t.id)).toEqual(['t2']);
    });
  });

  it('should fail both phases with a token the service refuses', async () => {
    startServer([seed('t1', 'Milk')]);
    const client = createClient({}, 'wrong-token');
    await client.todos.insert({ id: 't2', title: 'Bread' });

    const result = await client.engine.synchronize();

    expect(result.isSuccessful).toBe(false);
    expect(result.failedOperations.get('todos:t2')).toMatchObject({ kind: 'rejected', status: 401 });
    expect(result.failedCollections.get('todos')).toMatchObject({ kind: 'fetch', status: 401 });
    expect(await client.engine.pendingCount()).toBe(1);
    expect(repository.size).toBe(1);
  });
});
