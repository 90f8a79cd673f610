import { formatTimestamp, type PullCursor } from '@tablesync/core';
import type { PageQuery } from './transport/types.js';

/** Delta queries walk a collection in this order */
export const DELTA_ORDER_BY = 'updatedAt,id';

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Filter selecting everything after `cursor` in (updatedAt, id) order.
 * Null for the zero cursor, which selects everything.
 */
export function buildDeltaFilter(cursor: PullCursor): string | null {
  if (cursor.lastSeenUpdatedAt === 0 && cursor.lastSeenId === '') {
    return null;
  }
  const timestamp = formatTimestamp(cursor.lastSeenUpdatedAt);
  return `(updatedAt gt ${timestamp}) or (updatedAt eq ${timestamp} and id gt ${quoteLiteral(cursor.lastSeenId)})`;
}

export interface DeltaQueryOptions {
  pageSize: number;
  /** Caller predicate, combined with the delta filter by `and` */
  filter?: string;
}

/**
 * Page request for the next slice of a collection after `cursor`.
 * Deleted items are always requested so removals propagate.
 */
export function buildPullQuery(cursor: PullCursor, options: DeltaQueryOptions): PageQuery {
  const delta = buildDeltaFilter(cursor);
  const filters = [options.filter, delta].filter((f): f is string => Boolean(f));

  return {
    filter: filters.length > 1 ? filters.map((f) => `(${f})`).join(' and ') : filters[0],
    orderBy: DELTA_ORDER_BY,
    top: options.pageSize,
    includeDeleted: true,
    count: true,
  };
}
