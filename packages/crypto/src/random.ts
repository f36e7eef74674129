/**
 * Secure random number generation
 */

import { randomBytes } from 'crypto';
import { AES_IV_LENGTH, RandomSourceError, errorMessage, toHex } from '@keyinfo/common';
import type { RandomSource } from '@keyinfo/common';

/**
 * Generate cryptographically secure random bytes
 * @param length - Number of bytes to generate
 * @returns Buffer with random bytes
 */
export function generateSecureRandom(length: number): Buffer {
  return randomBytes(length);
}

/**
 * Draw exactly `length` bytes from a random source
 * @throws RandomSourceError if the source throws or returns the wrong length
 */
export function drawRandom(
  source: RandomSource,
  length: number,
  purpose: string
): Buffer {
  let bytes: Buffer;
  try {
    bytes = source(length);
  } catch (error) {
    throw new RandomSourceError(`Failed to generate ${purpose}: ${errorMessage(error)}`);
  }
  if (bytes.length !== length) {
    throw new RandomSourceError(
      `Failed to generate ${purpose}: expected ${length} bytes, got ${bytes.length}`
    );
  }
  // Callers keep the result; the source may reuse its buffer
  return Buffer.from(bytes);
}

/**
 * Generate a random IV
 * @returns 32-character lowercase hex string
 */
export function generateRandomIV(source: RandomSource = generateSecureRandom): string {
  return toHex(drawRandom(source, AES_IV_LENGTH, 'IV'));
}

/**
 * Random suffix for temporary file names
 * @returns 16-character hex string
 */
export function generateFileSuffix(): string {
  return generateSecureRandom(8).toString('hex');
}
