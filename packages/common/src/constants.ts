/**
 * Keyinfo constants
 */

/** AES key length in bytes (128 bits) */
export const AES_KEY_LENGTH = 16;

/** AES IV length in bytes (128 bits) */
export const AES_IV_LENGTH = 16;

/** Length of a hex-encoded IV */
export const IV_HEX_LENGTH = AES_IV_LENGTH * 2;

/** IV written when a best-effort random IV cannot be generated */
export const ZERO_IV = '0'.repeat(IV_HEX_LENGTH);

/** Generated key file name parts: hls_key_<random>.bin */
export const KEY_FILE_PREFIX = 'hls_key_';
export const KEY_FILE_SUFFIX = '.bin';

/** Generated keyinfo file name parts: hls_keyinfo_<random>.txt */
export const KEYINFO_FILE_PREFIX = 'hls_keyinfo_';
export const KEYINFO_FILE_SUFFIX = '.txt';

/** Key material is readable by the owner only */
export const KEY_FILE_MODE = 0o600;

export const KEYINFO_FILE_MODE = 0o644;

/** Attempts before giving up on finding an unused temp file name */
export const TEMP_FILE_ATTEMPTS = 100;

/** Length of the key fingerprint shown in logs */
export const FINGERPRINT_LENGTH = 16;
