/**
 * Hashing utilities
 */

import { sha256 } from '@noble/hashes/sha256';
import { FINGERPRINT_LENGTH } from '@keyinfo/common';

/**
 * Hash data using SHA-256
 * @returns 32-byte hash
 */
export function sha256Hash(data: Buffer | Uint8Array | string): Buffer {
  const input = typeof data === 'string' ? Buffer.from(data) : data;
  return Buffer.from(sha256(input));
}

/**
 * Hash data and return as hex string
 */
export function sha256Hex(data: Buffer | Uint8Array | string): string {
  return sha256Hash(data).toString('hex');
}

/**
 * Short identifier for a key that is safe to log
 * @param key - Raw key bytes
 * @returns Leading hex characters of the key's SHA-256
 */
export function keyFingerprint(key: Buffer | Uint8Array): string {
  return sha256Hex(key).slice(0, FINGERPRINT_LENGTH);
}
