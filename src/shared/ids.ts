import { randomBytes } from 'node:crypto';

/**
 * Generate a URL-safe random ID (16 bytes -> 22 chars base64url), optionally
 * prefixed like `job_<id>`.
 */
export function generateId(prefix?: string, bytes = 16): string {
  const id = randomBytes(bytes).toString('base64url');
  return prefix ? `${prefix}_${id}` : id;
}

/**
 * Deterministic index in [0, length) derived from `seed` (FNV-1a), for
 * choosing among templates without randomness.
 */
export function stableIndex(seed: string, length: number): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return length > 0 ? hash % length : 0;
}
