import { ConfigurationError } from '@tablesync/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { HttpError } from './http-error.js';
import { InMemoryRepository } from './memory-repository.js';
import { tableDataSchema, type AccessControlProvider, type RepositoryUpdatedEvent } from './repository.js';
import {
  TableController,
  createNextLink,
  type TableControllerOptions,
  type TableResult,
} from './table-controller.js';

const todoSchema = tableDataSchema.extend({
  title: z.string(),
  done: z.boolean().default(false),
});
type Todo = z.output<typeof todoSchema>;

const ENDPOINT = 'http://localhost/tables/todos';
const STALE_ETAG = '"AAAAAAAAAAAAAAAAAAAAAA=="';
const base = Date.parse('2024-05-01T10:00:00.000Z');

function todo(id: string, title: string, extra: Partial<Todo> = {}): Todo {
  return { id, title, done: false, updatedAt: null, version: null, deleted: false, ...extra };
}

function get(path = '', headers: Record<string, string> = {}): Request {
  return new Request(`${ENDPOINT}${path}`, { headers });
}

function query(params: Record<string, string>): Request {
  return get(`?${new URLSearchParams(params).toString()}`);
}

function send(
  method: string,
  path: string,
  body: unknown,
  headers: Record<string, string> = {}
): Request {
  return new Request(`${ENDPOINT}${path}`, {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

async function failure(action: Promise<TableResult>): Promise<HttpError> {
  try {
    await action;
  } catch (error) {
    if (error instanceof HttpError) return error;
    throw error;
  }
  throw new Error('Expected the action to fail');
}

function ids(result: TableResult): string[] {
  const body = z.object({ items: z.array(z.object({ id: z.string() })) }).parse(result.body);
  return body.items.map((item) => item.id);
}

describe('TableController', () => {
  let repository: InMemoryRepository<Todo>;

  function controller(options: Partial<TableControllerOptions<Todo>> = {}): TableController<Todo> {
    return new TableController(repository, {
      schema: todoSchema,
      entityName: 'Todo',
      logger: false,
      ...options,
    });
  }

  function etagOf(id: string): string {
    return `"${repository.getEntity(id)?.version ?? ''}"`;
  }

  beforeEach(() => {
    repository = new InMemoryRepository<Todo>({
      clock: () => base,
      entities: [
        todo('t1', 'Milk'),
        todo('t2', 'Bread', { done: true }),
        todo('t3', 'Eggs'),
        todo('t4', 'Apples', { done: true }),
        todo('t5', 'Cheese'),
      ],
    });
  });

  it('should reject invalid options', () => {
    expect(() => controller({ pageSize: 0 })).toThrow(ConfigurationError);
    expect(() => controller({ unauthorizedStatusCode: 200 })).toThrow(ConfigurationError);
  });

  it('should default its options', () => {
    expect(controller().options).toEqual({
      pageSize: 100,
      maxTop: 128000,
      enableSoftDelete: false,
      unauthorizedStatusCode: 401,
    });
  });

  describe('query', () => {
    it('should page by the server page size', async () => {
      const result = await controller({ pageSize: 2 }).query(get());

      expect(result.status).toBe(200);
      expect(ids(result)).toEqual(['t1', 't2']);
      expect(result.body).toMatchObject({ nextLink: '$skip=2' });
      expect(result.body).not.toHaveProperty('count');
    });

    it('should continue a $top request in its next link', async () => {
      const result = await controller({ pageSize: 2 }).query(get('?$top=3&$skip=1&$count=true'));

      expect(ids(result)).toEqual(['t2', 't3']);
      expect(result.body).toMatchObject({ count: 5, nextLink: '$count=true&$skip=3&$top=1' });
    });

    it('should end when $top is reached', async () => {
      const result = await controller().query(get('?$top=2'));

      expect(ids(result)).toEqual(['t1', 't2']);
      expect(result.body).toMatchObject({ nextLink: null });
    });

    it('should end on the last page', async () => {
      const result = await controller().query(get('?$skip=4'));

      expect(ids(result)).toEqual(['t5']);
      expect(result.body).toMatchObject({ nextLink: null });
    });

    it('should filter and order', async () => {
      const result = await controller().query(
        query({ $filter: 'done eq false', $orderby: 'title desc', $count: 'true' })
      );

      expect(ids(result)).toEqual(['t1', 't3', 't5']);
      expect(result.body).toMatchObject({ count: 3 });
    });

    it('should answer a delta query in (updatedAt, id) order', async () => {
      const result = await controller().query(
        query({
          $filter:
            "(updatedAt gt 2024-05-01T10:00:00.001Z) or (updatedAt eq 2024-05-01T10:00:00.001Z and id gt 't2')",
          $orderby: 'updatedAt,id',
        })
      );

      expect(ids(result)).toEqual(['t3', 't4', 't5']);
    });

    it.each([
      ['$filter', 'title eq'],
      ['$orderby', 'title sideways'],
      ['$top', 'ten'],
      ['$skip', '-1'],
      ['$count', 'yes'],
    ])('should reject %s=%j', async (name, value) => {
      const error = await failure(controller().query(query({ [name]: value })));

      expect(error).toMatchObject({ status: 400, code: 'TS_H601' });
    });

    it('should reject a $top above maxTop', async () => {
      const error = await failure(controller({ maxTop: 10 }).query(get('?$top=11')));

      expect(error.status).toBe(400);
      expect(error.message).toBe('The limit of 10 for $top has been exceeded');
    });

    it('should hide soft-deleted entities unless asked for them', async () => {
      const deletedRepository = new InMemoryRepository<Todo>({
        entities: [todo('t1', 'Milk'), todo('t2', 'Bread', { deleted: true })],
      });
      const tables = new TableController(deletedRepository, {
        schema: todoSchema,
        enableSoftDelete: true,
        logger: false,
      });

      expect(ids(await tables.query(get()))).toEqual(['t1']);
      expect(ids(await tables.query(get('?__includedeleted=true')))).toEqual(['t1', 't2']);
    });

    it('should apply the data view before counting', async () => {
      const accessControl: AccessControlProvider<Todo> = {
        getDataView: () => (entity) => !entity.done,
      };

      const result = await controller({ accessControl }).query(get('?$count=true'));

      expect(ids(result)).toEqual(['t1', 't3', 't5']);
      expect(result.body).toMatchObject({ count: 3 });
    });

    it('should answer a refused query with the configured status', async () => {
      const accessControl: AccessControlProvider<Todo> = { isAuthorized: () => false };

      expect((await failure(controller({ accessControl }).query(get()))).status).toBe(401);
      expect(
        (
          await failure(
            controller({ accessControl, unauthorizedStatusCode: 403 }).query(get())
          )
        ).status
      ).toBe(403);
    });
  });

  describe('read', () => {
    it('should return the entity with its ETag and Last-Modified', async () => {
      const result = await controller().read(get('/t1'), 't1');

      expect(result.status).toBe(200);
      expect(result.body).toMatchObject({ id: 't1', title: 'Milk' });
      expect(result.headers).toEqual({
        ETag: etagOf('t1'),
        'Last-Modified': 'Wed, 01 May 2024 10:00:00 GMT',
      });
    });

    it('should answer 304 when If-None-Match matches', async () => {
      const error = await failure(
        controller().read(get('/t1', { 'If-None-Match': etagOf('t1') }), 't1')
      );

      expect(error.status).toBe(304);
    });

    it('should answer 412 with the entity when If-Match does not match', async () => {
      const error = await failure(controller().read(get('/t1', { 'If-Match': STALE_ETAG }), 't1'));

      expect(error.status).toBe(412);
      expect(error.payload).toEqual(repository.getEntity('t1'));
    });

    it('should honour If-Modified-Since', async () => {
      const notModified = await failure(
        controller().read(get('/t1', { 'If-Modified-Since': 'Wed, 01 May 2024 10:00:00 GMT' }), 't1')
      );
      const modified = await controller().read(
        get('/t1', { 'If-Modified-Since': 'Wed, 01 May 2024 09:00:00 GMT' }),
        't1'
      );

      expect(notModified.status).toBe(304);
      expect(modified.status).toBe(200);
    });

    it('should reject a malformed precondition', async () => {
      const error = await failure(controller().read(get('/t1', { 'If-Match': 'abc' }), 't1'));

      expect(error.status).toBe(400);
    });

    it('should answer 404 outside the data view', async () => {
      const accessControl: AccessControlProvider<Todo> = {
        getDataView: () => (entity) => !entity.done,
      };

      const error = await failure(controller({ accessControl }).read(get('/t2'), 't2'));

      expect(error.status).toBe(404);
    });

    it('should answer 410 for a soft-deleted entity', async () => {
      await repository.replace(todo('t1', 'Milk', { deleted: true }));
      const tables = controller({ enableSoftDelete: true });

      expect((await failure(tables.read(get('/t1'), 't1'))).status).toBe(410);
      expect((await tables.read(get('/t1?__includedeleted=true'), 't1')).status).toBe(200);
    });
  });

  describe('create', () => {
    it('should store the entity and answer 201 with its location', async () => {
      const tables = controller();
      const events: RepositoryUpdatedEvent<Todo>[] = [];
      tables.repositoryUpdated$.subscribe((event) => events.push(event));

      const result = await tables.create(send('POST', '', { id: 'n1', title: 'Rice' }));

      expect(result.status).toBe(201);
      expect(result.headers.Location).toBe('http://localhost/tables/todos/n1');
      expect(result.headers.ETag).toBe(etagOf('n1'));
      expect(result.body).toEqual(repository.getEntity('n1'));
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ operation: 'create', entityName: 'Todo' });
    });

    it('should generate an id when none is sent', async () => {
      const result = await controller().create(send('POST', '', { title: 'Rice' }));

      expect(result.headers.Location).toMatch(/^http:\/\/localhost\/tables\/todos\/[0-9a-f-]{36}$/);
    });

    it('should answer 409 with the stored entity', async () => {
      const error = await failure(controller().create(send('POST', '', { id: 't1', title: 'Rice' })));

      expect(error.status).toBe(409);
      expect(error.payload).toEqual(repository.getEntity('t1'));
    });

    it('should answer 415 for a body that is not JSON', async () => {
      const request = new Request(ENDPOINT, {
        method: 'POST',
        headers: { 'Content-Type': 'text/plain' },
        body: 'Rice',
      });

      expect((await failure(controller().create(request))).status).toBe(415);
    });

    it('should answer 400 for malformed JSON', async () => {
      const error = await failure(controller().create(send('POST', '', '{"id":')));

      expect(error.status).toBe(400);
      expect(error.message).toBe('Invalid JSON content');
    });

    it('should answer 400 with the validation errors', async () => {
      const error = await failure(controller().create(send('POST', '', { id: 'n1' })));

      expect(error.status).toBe(400);
      expect(error.payload).toEqual({ errors: [{ path: 'title', message: 'Required' }] });
    });

    it('should run the commit hooks around the write', async () => {
      const postCommitHook = vi.fn();
      const accessControl: AccessControlProvider<Todo> = {
        preCommitHook: (_operation, entity) => ({ ...entity, title: entity.title.toUpperCase() }),
        postCommitHook,
      };

      await controller({ accessControl }).create(send('POST', '', { id: 'n1', title: 'Rice' }));

      expect(repository.getEntity('n1')?.title).toBe('RICE');
      expect(postCommitHook).toHaveBeenCalledWith('create', repository.getEntity('n1'));
    });
  });

  describe('replace', () => {
    it('should replace when If-Match holds', async () => {
      const before = repository.getEntity('t1');

      const result = await controller().replace(
        send('PUT', '/t1', { id: 't1', title: 'Oat milk' }, { 'If-Match': etagOf('t1') }),
        't1'
      );

      expect(result.status).toBe(200);
      expect(result.body).toMatchObject({ id: 't1', title: 'Oat milk' });
      expect(repository.getEntity('t1')?.version).not.toBe(before?.version);
    });

    it('should answer 400 when the body id differs from the path', async () => {
      const error = await failure(
        controller().replace(send('PUT', '/t1', { id: 't2', title: 'Oat milk' }), 't1')
      );

      expect(error.status).toBe(400);
    });

    it('should answer 412 with the stored entity on a stale version', async () => {
      const error = await failure(
        controller().replace(
          send('PUT', '/t1', { id: 't1', title: 'Oat milk' }, { 'If-Match': STALE_ETAG }),
          't1'
        )
      );

      expect(error.status).toBe(412);
      expect(error.payload).toEqual(repository.getEntity('t1'));
      expect(repository.getEntity('t1')?.title).toBe('Milk');
    });

    it('should answer 404 for a missing entity', async () => {
      const error = await failure(
        controller().replace(send('PUT', '/zz', { id: 'zz', title: 'Ghost' }), 'zz')
      );

      expect(error.status).toBe(404);
    });

    it('should answer 410 for a soft-deleted entity', async () => {
      await repository.replace(todo('t1', 'Milk', { deleted: true }));

      const error = await failure(
        controller({ enableSoftDelete: true }).replace(
          send('PUT', '/t1', { id: 't1', title: 'Oat milk' }),
          't1'
        )
      );

      expect(error.status).toBe(410);
    });
  });

  describe('delete', () => {
    it('should remove the entity', async () => {
      const result = await controller().delete(
        new Request(`${ENDPOINT}/t1`, { method: 'DELETE', headers: { 'If-Match': etagOf('t1') } }),
        't1'
      );

      expect(result).toEqual({ status: 204, headers: {} });
      expect(repository.getEntity('t1')).toBeNull();
    });

    it('should keep the entity on a stale version', async () => {
      const error = await failure(
        controller().delete(
          new Request(`${ENDPOINT}/t1`, { method: 'DELETE', headers: { 'If-Match': STALE_ETAG } }),
          't1'
        )
      );

      expect(error.status).toBe(412);
      expect(repository.getEntity('t1')).not.toBeNull();
    });

    it('should mark the entity deleted with soft delete', async () => {
      const tables = controller({ enableSoftDelete: true });
      const events: RepositoryUpdatedEvent<Todo>[] = [];
      tables.repositoryUpdated$.subscribe((event) => events.push(event));
      const request = (): Request => new Request(`${ENDPOINT}/t1`, { method: 'DELETE' });

      await tables.delete(request(), 't1');

      expect(repository.getEntity('t1')).toMatchObject({ id: 't1', deleted: true });
      expect(events[0]).toMatchObject({ operation: 'delete', entity: { deleted: true } });
      expect((await failure(tables.delete(request(), 't1'))).status).toBe(410);
    });
  });

  it('should build next links from the request query', () => {
    expect(createNextLink(new URL(`${ENDPOINT}?%24filter=a&%24top=10&%24skip=5`), 15, 5)).toBe(
      '%24filter=a&$skip=15&$top=5'
    );
    expect(createNextLink(new URL(ENDPOINT), 0, 0)).toBe('');
  });
});
