/**
 * Version tokens are opaque bytes. They travel as base64 in entity bodies
 * and as quoted base64 in ETag, If-Match and If-None-Match headers.
 */

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function encodeVersion(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/**
 * Decode a base64 version. Returns null when the text is not base64.
 */
export function decodeVersion(version: string): Uint8Array | null {
  if (version.length === 0 || !BASE64_PATTERN.test(version)) {
    return null;
  }
  return new Uint8Array(Buffer.from(version, 'base64'));
}

export function versionBytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.from(a).equals(Buffer.from(b));
}

export function formatETag(version: string): string {
  return `"${version}"`;
}

/**
 * Parsed precondition header
 */
export type ETagCondition =
  | { kind: 'any' }
  | { kind: 'versions'; versions: Uint8Array[] };

/**
 * Parse an If-Match / If-None-Match header value. `*` matches any version;
 * otherwise a comma-separated list of (optionally weak) quoted base64
 * tokens. Returns null for a malformed header.
 */
export function parseETagHeader(header: string): ETagCondition | null {
  const trimmed = header.trim();
  if (trimmed === '*') {
    return { kind: 'any' };
  }

  const versions: Uint8Array[] = [];
  for (const part of trimmed.split(',')) {
    let token = part.trim();
    if (token.startsWith('W/')) {
      token = token.slice(2);
    }
    if (token.length < 2 || !token.startsWith('"') || !token.endsWith('"')) {
      return null;
    }
    const bytes = decodeVersion(token.slice(1, -1));
    if (!bytes) {
      return null;
    }
    versions.push(bytes);
  }

  return versions.length > 0 ? { kind: 'versions', versions } : null;
}

/**
 * Whether a precondition matches the current version of an entity.
 * A null `current` means the entity does not exist.
 */
export function conditionMatches(condition: ETagCondition, current: string | null): boolean {
  if (current === null) {
    return false;
  }
  if (condition.kind === 'any') {
    return true;
  }
  const currentBytes = decodeVersion(current);
  if (!currentBytes) {
    return false;
  }
  return condition.versions.some((v) => versionBytesEqual(v, currentBytes));
}
