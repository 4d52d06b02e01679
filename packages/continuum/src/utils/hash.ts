/**
 * Hashing Utilities
 *
 * Content hashing for blob references and run output hashes.
 */

import { createHash } from 'crypto';

/**
 * Full SHA-256 hex digest of a buffer or string
 */
export function sha256(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Hash content for short display
 * Returns first 16 characters of SHA-256 hash
 */
export function hashContent(content: string | Uint8Array): string {
  return sha256(content).slice(0, 16);
}

/**
 * Serialize a value with object keys sorted, so equal values hash equally
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v && typeof v === 'object' && !Array.isArray(v)) {
      const sorted: Record<string, unknown> = {};
      const entries = Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      for (const [key, entry] of entries) {
        sorted[key] = entry;
      }
      return sorted;
    }
    return v;
  });
}

/**
 * Hash an arbitrary value through its canonical JSON form
 */
export function hashValue(value: unknown): string {
  return sha256(canonicalJson(value));
}
