import {
  closeSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  statSync,
  writeSync,
} from 'fs';
import { tmpdir } from 'os';
import { basename, dirname, join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { KeyInfoIOError } from '@keyinfo/common';
import { createTempFile, openForWrite, removeFile, useFile } from './tempFile.js';

describe('tempFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'keyinfo-temp-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('createTempFile', () => {
    it('creates a new file with the given prefix, suffix and mode', () => {
      const { fd, path } = createTempFile(dir, 'hls_key_', '.bin', 0o600);
      closeSync(fd);

      expect(dirname(path)).toBe(dir);
      expect(basename(path)).toMatch(/^hls_key_[0-9a-f]{16}\.bin$/);
      expect(statSync(path).mode & 0o777).toBe(0o600);
    });

    it('never returns the same path twice', () => {
      const paths = new Set<string>();
      for (let i = 0; i < 20; i++) {
        const { fd, path } = createTempFile(dir, 'p_', '.tmp', 0o600);
        closeSync(fd);
        paths.add(path);
      }

      expect(paths.size).toBe(20);
    });

    it('wraps fs failures in KeyInfoIOError', () => {
      expect(() => createTempFile(join(dir, 'missing'), 'p_', '.tmp', 0o600)).toThrow(
        KeyInfoIOError
      );
    });
  });

  describe('openForWrite', () => {
    it('truncates an existing file', () => {
      const path = join(dir, 'out.txt');
      useFile(openForWrite(path, 0o644), path, (fd) => writeSync(fd, 'long content'));
      useFile(openForWrite(path, 0o644), path, (fd) => writeSync(fd, 'short'));

      expect(readFileSync(path, 'utf-8')).toBe('short');
    });
  });

  describe('useFile', () => {
    it('returns the callback result', () => {
      const path = join(dir, 'out.txt');

      const result = useFile(openForWrite(path, 0o644), path, () => 42);

      expect(result).toBe(42);
    });

    it('rethrows the callback error', () => {
      const path = join(dir, 'out.txt');

      expect(() =>
        useFile(openForWrite(path, 0o644), path, () => {
          throw new Error('serialize failed');
        })
      ).toThrow('serialize failed');
    });
  });

  describe('removeFile', () => {
    it('removes an existing file', () => {
      const { fd, path } = createTempFile(dir, 'p_', '.tmp', 0o600);
      closeSync(fd);

      expect(removeFile(path, 'remove file')).toBeNull();
      expect(existsSync(path)).toBe(false);
    });

    it('treats a missing file as removed', () => {
      expect(removeFile(join(dir, 'missing.tmp'), 'remove file')).toBeNull();
    });

    it('returns other failures', () => {
      const path = join(dir, 'subdir');
      mkdirSync(path);

      const error = removeFile(path, 'remove file');

      expect(error).toBeInstanceOf(KeyInfoIOError);
      expect(error?.operation).toBe('remove file');
      expect(error?.path).toBe(path);
    });
  });
});
