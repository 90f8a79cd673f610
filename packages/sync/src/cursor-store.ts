import {
  ConfigurationError,
  ZERO_CURSOR,
  compareCursor,
  isValidEntityId,
  type LocalStore,
  type PullCursor,
} from '@tablesync/core';

/**
 * Durable pull progress per query.
 *
 * A cursor only moves forward in (updatedAt, id) order. Advancing to a
 * position at or behind the stored one is ignored and reported by a
 * `false` return; `resetCursor` is the only way back.
 *
 * Callers advance the cursor after the page it describes has been written
 * to the local store, never before.
 *
 * @example
 * ```typescript
 * const cursors = new DeltaCursorStore(store);
 * const cursor = await cursors.getCursor('todos'); // zero cursor at first
 * await cursors.advanceCursor('todos', { lastSeenUpdatedAt: 107, lastSeenId: 'c' });
 * ```
 */
export class DeltaCursorStore {
  private readonly store: LocalStore;

  constructor(store: LocalStore) {
    this.store = store;
  }

  async getCursor(key: string): Promise<PullCursor> {
    assertCursorKey(key);
    return (await this.store.getCursor(key)) ?? { ...ZERO_CURSOR };
  }

  async advanceCursor(key: string, cursor: PullCursor): Promise<boolean> {
    const current = await this.getCursor(key);
    if (compareCursor(cursor, current) <= 0) {
      return false;
    }
    await this.store.setCursor(key, { ...cursor });
    return true;
  }

  async resetCursor(key: string): Promise<void> {
    assertCursorKey(key);
    await this.store.deleteCursor(key);
  }
}

function assertCursorKey(key: string): void {
  if (!isValidEntityId(key)) {
    throw new ConfigurationError(
      [{ path: 'queryId', message: `"${key}" is not a valid query id` }],
      'TS_C103'
    );
  }
}
