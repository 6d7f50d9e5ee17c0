/**
 * SHA-256 Hash Utilities
 *
 * Content hashes detect unchanged documents on re-ingest.
 * All hashes use the format: 'sha256:' + 64-character lowercase hex string.
 *
 * @module utils/hash
 */

import crypto from 'crypto';

/**
 * Hash prefix used for all SHA-256 hashes in this system
 */
export const HASH_PREFIX = 'sha256:';

/**
 * Regular expression for validating hash format
 */
export const HASH_PATTERN = /^sha256:[a-f0-9]{64}$/;

/**
 * Compute SHA-256 hash of content
 *
 * @returns Hash in format 'sha256:' + 64-char lowercase hex string
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Hash of several parts. Parts are length-prefixed so ["ab", "c"] and
 * ["a", "bc"] hash differently.
 */
export function computeCompositeHash(parts: readonly string[]): string {
  const hash = crypto.createHash('sha256');
  for (const part of parts) {
    hash.update(`${Buffer.byteLength(part, 'utf-8')}:`);
    hash.update(part);
  }
  return HASH_PREFIX + hash.digest('hex');
}

export function isValidHashFormat(hash: string): boolean {
  return HASH_PATTERN.test(hash);
}
