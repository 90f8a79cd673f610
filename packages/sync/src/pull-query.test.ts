import { ZERO_CURSOR } from '@tablesync/core';
import { describe, expect, it } from 'vitest';
import { DELTA_ORDER_BY, buildDeltaFilter, buildPullQuery, quoteLiteral } from './pull-query.js';

const cursor = {
  lastSeenUpdatedAt: Date.parse('2024-05-01T10:00:00.107Z'),
  lastSeenId: 'c',
};

describe('pull query', () => {
  it('should double single quotes in literals', () => {
    expect(quoteLiteral("o'brien")).toBe("'o''brien'");
  });

  it('should select everything from the zero cursor', () => {
    expect(buildDeltaFilter(ZERO_CURSOR)).toBeNull();
  });

  it('should select items after the cursor in (updatedAt, id) order', () => {
    expect(buildDeltaFilter(cursor)).toBe(
      "(updatedAt gt 2024-05-01T10:00:00.107Z) or (updatedAt eq 2024-05-01T10:00:00.107Z and id gt 'c')"
    );
  });

  it('should request ordered pages with deleted items and a count', () => {
    expect(buildPullQuery(ZERO_CURSOR, { pageSize: 50 })).toEqual({
      filter: undefined,
      orderBy: DELTA_ORDER_BY,
      top: 50,
      includeDeleted: true,
      count: true,
    });
  });

  it('should send a caller filter alone from the zero cursor', () => {
    expect(buildPullQuery(ZERO_CURSOR, { pageSize: 50, filter: 'done eq false' }).filter).toBe(
      'done eq false'
    );
  });

  it('should combine the caller filter with the delta filter', () => {
    expect(buildPullQuery(cursor, { pageSize: 50, filter: 'done eq false' }).filter).toBe(
      "(done eq false) and ((updatedAt gt 2024-05-01T10:00:00.107Z) or (updatedAt eq 2024-05-01T10:00:00.107Z and id gt 'c'))"
    );
  });
});
