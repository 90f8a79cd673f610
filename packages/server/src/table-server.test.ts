import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { InMemoryRepository } from './memory-repository.js';
import { tableDataSchema } from './repository.js';
import { TableController } from './table-controller.js';
import { TableServer, type TableServerConfig, type TableServerEvent } from './table-server.js';

const todoSchema = tableDataSchema.extend({ title: z.string() });
type Todo = z.output<typeof todoSchema>;

const ORIGIN = 'http://localhost';

function todo(id: string, title: string): Todo {
  return { id, title, updatedAt: null, version: null, deleted: false };
}

describe('TableServer', () => {
  let repository: InMemoryRepository<Todo>;
  let server: TableServer;
  let events: TableServerEvent[];

  function createServer(config: Partial<TableServerConfig> = {}): TableServer {
    const created = new TableServer({
      tables: {
        todos: new TableController(repository, { schema: todoSchema, logger: false }),
      },
      logger: false,
      ...config,
    });
    created.events.subscribe((event) => events.push(event));
    return created;
  }

  beforeEach(() => {
    events = [];
    repository = new InMemoryRepository<Todo>({ entities: [todo('t1', 'Milk')] });
    server = createServer();
  });

  afterEach(async () => {
    await server.destroy();
  });

  describe('fetch', () => {
    it('should route a query', async () => {
      const response = await server.fetch(new Request(`${ORIGIN}/tables/todos`));

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('application/json');
      expect(await response.json()).toMatchObject({ items: [{ id: 't1', title: 'Milk' }] });
    });

    it('should match table names case-insensitively', async () => {
      const response = await server.fetch(new Request(`${ORIGIN}/tables/TODOS/t1`));

      expect(response.status).toBe(200);
      expect(response.headers.get('etag')).toBe(`"${repository.getEntity('t1')?.version ?? ''}"`);
    });

    it('should create through POST', async () => {
      const response = await server.fetch(
        new Request(`${ORIGIN}/tables/todos`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ id: 't2', title: 'Bread' }),
        })
      );

      expect(response.status).toBe(201);
      expect(response.headers.get('location')).toBe(`${ORIGIN}/tables/todos/t2`);
      expect(repository.getEntity('t2')?.title).toBe('Bread');
    });

    it('should answer 204 without a body for a delete', async () => {
      const response = await server.fetch(
        new Request(`${ORIGIN}/tables/todos/t1`, { method: 'DELETE' })
      );

      expect(response.status).toBe(204);
      expect(await response.text()).toBe('');
    });

    it('should send the conflict payload as the body', async () => {
      const response = await server.fetch(
        new Request(`${ORIGIN}/tables/todos/t1`, {
          method: 'PUT',
          headers: {
            'Content-Type': 'application/json',
            'If-Match': '"AAAAAAAAAAAAAAAAAAAAAA=="',
          },
          body: JSON.stringify({ id: 't1', title: 'Oat milk' }),
        })
      );

      expect(response.status).toBe(412);
      expect(await response.json()).toEqual(repository.getEntity('t1'));
    });

    it('should send 304 without a body', async () => {
      const etag = `"${repository.getEntity('t1')?.version ?? ''}"`;

      const response = await server.fetch(
        new Request(`${ORIGIN}/tables/todos/t1`, { headers: { 'If-None-Match': etag } })
      );

      expect(response.status).toBe(304);
      expect(await response.text()).toBe('');
    });

    it('should describe other HTTP errors', async () => {
      const response = await server.fetch(new Request(`${ORIGIN}/tables/todos/zz`));

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Entity "zz" not found' });
    });

    it.each([
      ['GET', '/other', 404, { error: 'Not found' }],
      ['GET', '/tables/users', 404, { error: 'Unknown table "users"' }],
      ['PATCH', '/tables/todos/t1', 405, { error: 'Method not allowed' }],
      ['DELETE', '/tables/todos', 405, { error: 'Method not allowed' }],
      ['GET', '/tables/todos/%E0%A4%A', 400, { error: 'Malformed path' }],
    ])('should answer %s %s with %i', async (method, path, status, body) => {
      const response = await server.fetch(new Request(`${ORIGIN}${path}`, { method }));

      expect(response.status).toBe(status);
      expect(await response.json()).toEqual(body);
    });

    it('should answer 500 when the repository fails', async () => {
      repository.failWith(new Error('disk full'));

      const response = await server.fetch(new Request(`${ORIGIN}/tables/todos`));

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({ error: 'disk full' });
      expect(events).toContainEqual({ type: 'error', message: 'disk full' });
    });

    it('should report each request', async () => {
      await server.fetch(new Request(`${ORIGIN}/tables/todos/zz`));

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        type: 'request',
        method: 'GET',
        path: '/tables/todos/zz',
        status: 404,
      });
    });

    it('should serve under a custom base path', async () => {
      const custom = createServer({ basePath: 'api/' });

      const response = await custom.fetch(new Request(`${ORIGIN}/api/todos`));

      expect(response.status).toBe(200);
      await custom.destroy();
    });
  });

  describe('authentication', () => {
    beforeEach(() => {
      server = createServer({ authenticate: (token) => token === 'test-token' });
    });

    it('should refuse a request without a valid token', async () => {
      const missing = await server.fetch(new Request(`${ORIGIN}/tables/todos`));
      const wrong = await server.fetch(
        new Request(`${ORIGIN}/tables/todos`, { headers: { Authorization: 'Bearer other' } })
      );

      expect(missing.status).toBe(401);
      expect(wrong.status).toBe(401);
      expect(await missing.json()).toEqual({ error: 'Unauthorized' });
    });

    it('should accept a valid bearer token', async () => {
      const response = await server.fetch(
        new Request(`${ORIGIN}/tables/todos`, { headers: { Authorization: 'Bearer test-token' } })
      );

      expect(response.status).toBe(200);
    });
  });

  describe('node:http', () => {
    it('should serve the same routes over a socket', async () => {
      server = createServer({ port: 0, host: '127.0.0.1' });
      await server.start();
      expect(server.isRunning).toBe(true);
      const origin = `http://127.0.0.1:${server.port ?? 0}`;

      const created = await fetch(`${origin}/tables/todos`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ id: 't2', title: 'Bread' }),
      });
      const read = await fetch(`${origin}/tables/todos/t2`);

      expect(created.status).toBe(201);
      expect(read.status).toBe(200);
      expect(await read.json()).toMatchObject({ id: 't2', title: 'Bread' });

      await server.stop();
      expect(server.isRunning).toBe(false);
      expect(events.map((e) => e.type)).toEqual([
        'server:started',
        'request',
        'request',
        'server:stopped',
      ]);
    });
  });
});
