import { decodeVersion, versionBytesEqual } from '../version.js';

/**
 * Base interface for every record that takes part in synchronization.
 * The four metadata fields are owned by the table service: the client
 * never invents `updatedAt` or `version`, it only stores what it was sent.
 */
export interface SyncEntity {
  /** Globally unique, immutable once assigned */
  id: string;
  /** Server-assigned last modification time, ISO-8601 with milliseconds */
  updatedAt?: string | null;
  /** Base64 encoding of the opaque concurrency token */
  version?: string | null;
  /** Soft-delete marker */
  deleted?: boolean;
}

/**
 * Metadata extracted from an entity in comparable form
 */
export interface EntityMetadata {
  id: string;
  /** Milliseconds since the Unix epoch, null when unset or unparsable */
  updatedAt: number | null;
  version: string | null;
  deleted: boolean;
}

/**
 * The kind of a local mutation waiting to be pushed
 */
export type OperationKind = 'create' | 'update' | 'delete';

const ENTITY_ID_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.|:-]{0,127}$/;

export function isValidEntityId(id: unknown): id is string {
  return typeof id === 'string' && ENTITY_ID_PATTERN.test(id);
}

export function parseTimestamp(value: string | null | undefined): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString();
}

export function getEntityMetadata(entity: SyncEntity): EntityMetadata {
  return {
    id: entity.id,
    updatedAt: parseTimestamp(entity.updatedAt),
    version: entity.version ?? null,
    deleted: entity.deleted === true,
  };
}

/**
 * Two records with the same id and the same version bytes are the same
 * revision of an entity. A missing version never matches.
 */
export function isSameEntityVersion(a: SyncEntity, b: SyncEntity): boolean {
  if (a.id !== b.id || !a.version || !b.version) {
    return false;
  }
  const left = decodeVersion(a.version);
  const right = decodeVersion(b.version);
  if (!left || !right) {
    // Not base64; only identical text is the same token
    return a.version === b.version;
  }
  return versionBytesEqual(left, right);
}
