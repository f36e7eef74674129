/**
 * Hex encoding utilities
 */

/** Convert Buffer/Uint8Array to lowercase hex string */
export function toHex(data: Buffer | Uint8Array): string {
  return Buffer.from(data).toString('hex');
}

/** Check if string is valid hex */
export function isValidHex(str: string): boolean {
  return /^[0-9a-fA-F]*$/.test(str) && str.length % 2 === 0;
}
