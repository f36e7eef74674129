/**
 * Input validation utilities
 */

import { statSync } from 'fs';
import { AES_KEY_LENGTH, IV_HEX_LENGTH } from '../constants.js';
import { isValidHex } from './hex.js';

/** IV is empty (omitted) or exactly 32 hex characters */
export function isValidIV(iv: string): boolean {
  return iv === '' || (iv.length === IV_HEX_LENGTH && isValidHex(iv));
}

/** Path names an existing regular file holding exactly one AES key */
export function isValidKeyFile(path: string): boolean {
  try {
    const stats = statSync(path);
    return stats.isFile() && stats.size === AES_KEY_LENGTH;
  } catch {
    return false;
  }
}
