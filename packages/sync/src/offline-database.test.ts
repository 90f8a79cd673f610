import { ConfigurationError, type SyncEntity } from '@tablesync/core';
import { MemoryLocalStore } from '@tablesync/storage-memory';
import { beforeEach, describe, expect, it } from 'vitest';
import { OfflineDatabase, isValidCollectionName } from './offline-database.js';

interface Todo extends SyncEntity {
  title: string;
  done?: boolean;
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('OfflineDatabase', () => {
  let store: MemoryLocalStore;
  let db: OfflineDatabase;

  beforeEach(() => {
    store = new MemoryLocalStore();
    db = new OfflineDatabase(store, { collections: ['todos', 'notes'], logger: false });
  });

  describe('constructor', () => {
    it('should require at least one collection', () => {
      expect(() => new OfflineDatabase(store, { collections: [] })).toThrow(ConfigurationError);
    });

    it('should reject invalid collection names', () => {
      expect(() => new OfflineDatabase(store, { collections: ['todos', '9lives'] })).toThrow(
        'Invalid configuration: collections: "9lives" is not a valid collection name'
      );
    });
  });

  it('should validate collection names', () => {
    expect(isValidCollectionName('todo_items')).toBe(true);
    expect(isValidCollectionName('')).toBe(false);
    expect(isValidCollectionName('has space')).toBe(false);
  });

  it('should list its collections', () => {
    expect(db.collections).toEqual(['todos', 'notes']);
    expect(db.hasCollection('notes')).toBe(true);
    expect(db.hasCollection('users')).toBe(false);
  });

  it('should reject an unknown collection', () => {
    let error: unknown;
    try {
      db.collection('users');
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: 'TS_C102' });
  });

  describe('OfflineCollection', () => {
    it('should assign a UUID to an entity inserted without an id', async () => {
      const todos = db.collection<Todo>('todos');

      const stored = await todos.insert({ id: '', title: 'Milk' });

      expect(stored.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(await todos.get(stored.id)).toEqual(stored);
    });

    it('should discard server metadata on insert and queue a create', async () => {
      const todos = db.collection<Todo>('todos');

      const stored = await todos.insert({
        id: 't1',
        title: 'Milk',
        updatedAt: '2024-05-01T10:00:00.000Z',
        version: 'djE=',
      });

      expect(stored).toEqual({
        id: 't1',
        title: 'Milk',
        updatedAt: null,
        version: null,
        deleted: false,
      });
      expect(await todos.pendingOperation('t1')).toMatchObject({ kind: 'create', version: null });
    });

    it('should refuse to insert an existing entity', async () => {
      const todos = db.collection<Todo>('todos');
      await todos.insert({ id: 't1', title: 'Milk' });

      await expect(todos.insert({ id: 't1', title: 'Bread' })).rejects.toMatchObject({
        name: 'LocalStorageError',
        code: 'TS_S302',
      });
    });

    it('should refuse an invalid id', async () => {
      await expect(
        db.collection<Todo>('todos').insert({ id: 'not valid', title: 'Milk' })
      ).rejects.toMatchObject({ code: 'TS_C103' });
    });

    it('should replace with the version of the stored record', async () => {
      await store.getStore<Todo>('todos').put({
        id: 't1',
        title: 'Milk',
        updatedAt: '2024-05-01T10:00:00.000Z',
        version: 'djE=',
        deleted: false,
      });
      const todos = db.collection<Todo>('todos');

      const stored = await todos.replace({ id: 't1', title: 'Oat milk' });

      expect(stored).toEqual({
        id: 't1',
        title: 'Oat milk',
        updatedAt: '2024-05-01T10:00:00.000Z',
        version: 'djE=',
        deleted: false,
      });
      expect(await todos.pendingOperation('t1')).toMatchObject({ kind: 'update', version: 'djE=' });
    });

    it('should refuse to replace a missing entity', async () => {
      await expect(
        db.collection<Todo>('todos').replace({ id: 'ghost', title: 'Boo' })
      ).rejects.toMatchObject({ code: 'TS_S301' });
    });

    it('should remove the local record and queue a delete', async () => {
      await store.getStore<Todo>('todos').put({ id: 't1', title: 'Milk', version: 'djE=' });
      const todos = db.collection<Todo>('todos');

      await todos.remove('t1');

      expect(await todos.get('t1')).toBeNull();
      expect(await todos.pendingOperation('t1')).toMatchObject({ kind: 'delete', version: 'djE=' });
    });

    it('should leave nothing queued when an unsynchronized entity is removed', async () => {
      const todos = db.collection<Todo>('todos');
      await todos.insert({ id: 't1', title: 'Milk' });

      await todos.remove('t1');

      expect(await db.queue.count()).toBe(0);
    });

    it('should hide tombstones unless asked for them', async () => {
      const entities = store.getStore<Todo>('todos');
      await entities.put({ id: 'a', title: 'Alive' });
      await entities.put({ id: 'b', title: 'Gone', deleted: true });
      const todos = db.collection<Todo>('todos');

      expect((await todos.list()).map((t) => t.id)).toEqual(['a']);
      expect((await todos.list({ includeDeleted: true })).map((t) => t.id)).toEqual(['a', 'b']);
    });

    it('should wait for the entity lock before writing', async () => {
      const todos = db.collection<Todo>('todos');
      const lock = await db.locks.acquireEntityLock('todos', 't1');

      const insert = todos.insert({ id: 't1', title: 'Milk' });
      await delay(5);
      expect(await todos.get('t1')).toBeNull();

      lock.release();
      await insert;
      expect(await todos.get('t1')).toMatchObject({ title: 'Milk' });
    });
  });
});
