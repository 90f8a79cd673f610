import { describe, expect, it } from 'vitest';
import {
  getEntityMetadata,
  isSameEntityVersion,
  isValidEntityId,
  parseTimestamp,
} from './entity.js';
import { ZERO_CURSOR, compareCursor } from './storage.js';

describe('entity metadata', () => {
  it('should read metadata in comparable form', () => {
    expect(
      getEntityMetadata({
        id: 't1',
        updatedAt: '2024-05-01T10:00:00.123Z',
        version: 'AQID',
        deleted: true,
      })
    ).toEqual({
      id: 't1',
      updatedAt: Date.UTC(2024, 4, 1, 10, 0, 0, 123),
      version: 'AQID',
      deleted: true,
    });
  });

  it('should default missing metadata', () => {
    expect(getEntityMetadata({ id: 't1' })).toEqual({
      id: 't1',
      updatedAt: null,
      version: null,
      deleted: false,
    });
    expect(parseTimestamp('yesterday')).toBeNull();
  });

  it('should treat the same id and version as the same revision', () => {
    expect(isSameEntityVersion({ id: 'a', version: 'AQID' }, { id: 'a', version: 'AQID' })).toBe(
      true
    );
    expect(isSameEntityVersion({ id: 'a', version: 'AQID' }, { id: 'a', version: 'AQIE' })).toBe(
      false
    );
    expect(isSameEntityVersion({ id: 'a', version: 'AQID' }, { id: 'b', version: 'AQID' })).toBe(
      false
    );
    expect(isSameEntityVersion({ id: 'a' }, { id: 'a' })).toBe(false);
  });

  it('should compare version bytes rather than their text', () => {
    // Trailing bits past the last byte do not change the decoded bytes
    expect(isSameEntityVersion({ id: 'a', version: 'AQI=' }, { id: 'a', version: 'AQJ=' })).toBe(
      true
    );
    expect(isSameEntityVersion({ id: 'a', version: 'v1' }, { id: 'a', version: 'v1' })).toBe(true);
    expect(isSameEntityVersion({ id: 'a', version: 'v1' }, { id: 'a', version: 'v2' })).toBe(
      false
    );
  });

  it('should validate entity ids', () => {
    expect(isValidEntityId('t1')).toBe(true);
    expect(isValidEntityId('3f1c-9a|x:y.z_w')).toBe(true);
    expect(isValidEntityId('')).toBe(false);
    expect(isValidEntityId('-leading')).toBe(false);
    expect(isValidEntityId('has space')).toBe(false);
    expect(isValidEntityId('a'.repeat(129))).toBe(false);
    expect(isValidEntityId(42)).toBe(false);
  });
});

describe('compareCursor', () => {
  it('should order by timestamp then id', () => {
    expect(compareCursor(ZERO_CURSOR, { lastSeenUpdatedAt: 1, lastSeenId: '' })).toBe(-1);
    expect(
      compareCursor({ lastSeenUpdatedAt: 5, lastSeenId: 'b' }, { lastSeenUpdatedAt: 5, lastSeenId: 'a' })
    ).toBe(1);
    expect(
      compareCursor({ lastSeenUpdatedAt: 5, lastSeenId: 'a' }, { lastSeenUpdatedAt: 5, lastSeenId: 'a' })
    ).toBe(0);
    expect(
      compareCursor({ lastSeenUpdatedAt: 9, lastSeenId: 'a' }, { lastSeenUpdatedAt: 10, lastSeenId: '' })
    ).toBe(-1);
  });
});
