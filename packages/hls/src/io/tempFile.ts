/**
 * Exclusive temporary file creation and cleanup
 */

import { closeSync, openSync, unlinkSync } from 'fs';
import { resolve } from 'path';
import {
  KeyInfoIOError,
  TEMP_FILE_ATTEMPTS,
  errorCode,
  errorMessage,
} from '@keyinfo/common';
import { generateFileSuffix } from '@keyinfo/crypto';

/** Open temporary file */
export interface TempFile {
  fd: number;
  /** Absolute path */
  path: string;
}

/**
 * Create a new file named `<prefix><random><suffix>` in `dir`, opened with
 * O_EXCL so concurrent callers never share a file
 */
export function createTempFile(
  dir: string,
  prefix: string,
  suffix: string,
  mode: number
): TempFile {
  for (let attempt = 0; attempt < TEMP_FILE_ATTEMPTS; attempt++) {
    const path = resolve(dir, `${prefix}${generateFileSuffix()}${suffix}`);
    try {
      return { fd: openSync(path, 'wx', mode), path };
    } catch (error) {
      if (errorCode(error) === 'EEXIST') continue;
      throw KeyInfoIOError.from('create temporary file', path, error);
    }
  }
  throw new KeyInfoIOError(
    'create temporary file',
    dir,
    `no unused name after ${TEMP_FILE_ATTEMPTS} attempts`
  );
}

/** Open `path` for writing, creating or truncating it */
export function openForWrite(path: string, mode: number): number {
  try {
    return openSync(path, 'w', mode);
  } catch (error) {
    throw KeyInfoIOError.from('open', path, error);
  }
}

/**
 * Run `fn` against an open descriptor and close it afterwards. When `fn`
 * throws, its error wins over a close failure.
 */
export function useFile<T>(fd: number, path: string, fn: (fd: number) => T): T {
  let result: T;
  try {
    result = fn(fd);
  } catch (error) {
    try {
      closeSync(fd);
    } catch (closeError) {
      console.warn(`[KeyInfo] Failed to close ${path}: ${errorMessage(closeError)}`);
    }
    throw error;
  }

  try {
    closeSync(fd);
  } catch (error) {
    throw KeyInfoIOError.from('close', path, error);
  }
  return result;
}

/**
 * Remove a file; an already missing file counts as removed
 * @returns The failure, or null on success
 */
export function removeFile(path: string, operation: string): KeyInfoIOError | null {
  try {
    unlinkSync(path);
    return null;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    return KeyInfoIOError.from(operation, path, error);
  }
}
