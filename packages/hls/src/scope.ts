/**
 * Scoped descriptor helpers: construct, use, always dispose
 */

import { errorMessage, type KeyInfoOptions } from '@keyinfo/common';
import { KeyInfo } from './KeyInfo.js';

/**
 * Run `fn` with a fresh descriptor and dispose it afterwards.
 * `fn` must finish synchronously; use withKeyInfoAsync for async work.
 */
export function withKeyInfo<T>(
  url: string,
  fn: (keyInfo: KeyInfo) => T,
  options?: KeyInfoOptions
): T {
  const keyInfo = new KeyInfo(url, options);
  let result: T;
  try {
    result = fn(keyInfo);
  } catch (error) {
    disposeAfterFailure(keyInfo);
    throw error;
  }
  keyInfo.dispose();
  return result;
}

/**
 * Async variant of withKeyInfo; disposal waits for `fn` to settle
 */
export async function withKeyInfoAsync<T>(
  url: string,
  fn: (keyInfo: KeyInfo) => Promise<T>,
  options?: KeyInfoOptions
): Promise<T> {
  const keyInfo = new KeyInfo(url, options);
  let result: T;
  try {
    result = await fn(keyInfo);
  } catch (error) {
    disposeAfterFailure(keyInfo);
    throw error;
  }
  keyInfo.dispose();
  return result;
}

/** The caller's error takes precedence over a cleanup failure */
function disposeAfterFailure(keyInfo: KeyInfo): void {
  try {
    keyInfo.dispose();
  } catch (error) {
    console.warn(`[KeyInfo] Cleanup after failure incomplete: ${errorMessage(error)}`);
  }
}
