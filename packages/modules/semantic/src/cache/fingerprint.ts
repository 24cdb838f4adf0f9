import { createHash } from 'node:crypto';

/**
 * Canonical form of a request: Unicode NFKC, lower case, surrounding
 * whitespace trimmed and inner runs collapsed to one space.
 */
export function normalizeRequestText(text: string): string {
  return text.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

export interface FingerprintInput {
  /** Already normalized. */
  text: string;
  parserId: string;
  schemaVersion: string;
}

/** Exact-match cache key. Components are length-prefixed so no two inputs collide by concatenation. */
export function requestFingerprint({ text, parserId, schemaVersion }: FingerprintInput): string {
  const hash = createHash('sha256');
  for (const part of [schemaVersion, parserId, text]) {
    hash.update(`${Buffer.byteLength(part)}:${part}`);
  }
  return hash.digest('hex');
}
