/**
 * HLS keyinfo descriptor
 *
 * Produces the file FFmpeg reads through `-hls_key_info_file`:
 *
 *   line 1: key URI written into the playlist's EXT-X-KEY tag
 *   line 2: path of the file holding the raw 16-byte key
 *   line 3: IV as 32 hex characters (optional)
 *
 * The descriptor owns the key file it generates and any keyinfo file created
 * by persistToTemporaryFile. Callers must call dispose() on every exit path,
 * or use withKeyInfo / withKeyInfoAsync.
 */

import {
  AES_KEY_LENGTH,
  KEY_FILE_MODE,
  KEY_FILE_PREFIX,
  KEY_FILE_SUFFIX,
  KEYINFO_FILE_MODE,
  KEYINFO_FILE_PREFIX,
  KEYINFO_FILE_SUFFIX,
  ZERO_IV,
  KeyInfoDisposeError,
  KeyInfoIOError,
  KeyInfoSinkError,
  KeyInfoValidationError,
  KeyInfoWriteError,
  KeyNotInitializedError,
  RandomSourceError,
  config,
  errorMessage,
  isValidIV,
  isValidKeyFile,
  type KeyFileOwnership,
  type KeyFileRef,
  type KeyInfoOptions,
  type RandIVOptions,
  type RandomSource,
} from '@keyinfo/common';
import {
  drawRandom,
  generateRandomIV,
  generateSecureRandom,
  keyFingerprint,
} from '@keyinfo/crypto';
import { BufferSink, FileDescriptorSink, type KeyInfoSink } from './io/sinks.js';
import { createTempFile, openForWrite, removeFile, useFile } from './io/tempFile.js';

const LOG_TAG = '[KeyInfo]';

function debug(message: string): void {
  if (config.debug) {
    console.debug(`${LOG_TAG} ${message}`);
  }
}

/**
 * Write key bytes to a fresh temp file. A file that was created but could
 * not be written is removed before the error is thrown.
 */
function writeKeyFile(dir: string, key: Buffer): string {
  const { fd, path } = createTempFile(dir, KEY_FILE_PREFIX, KEY_FILE_SUFFIX, KEY_FILE_MODE);

  try {
    useFile(fd, path, (openFd) => {
      const written = new FileDescriptorSink(openFd).write(key);
      if (written !== key.length) {
        throw new Error(`short write (${written} of ${key.length} bytes)`);
      }
    });
  } catch (error) {
    const cleanupError = removeFile(path, 'remove partial key file');
    throw new KeyInfoIOError('write key file', path, errorMessage(error), {
      cleanupError: cleanupError?.message,
    });
  }

  return path;
}

export class KeyInfo {
  /** Key URI, stored verbatim */
  readonly url: string;

  private readonly key: Buffer | null;
  private currentIV = '';
  private keyFile: KeyFileRef | null;
  /** Generated key file, tracked separately so an override cannot leak it */
  private generatedKeyFile: string | null;
  private infoFile: string | null = null;
  private readonly tempDir: string;
  private readonly randomSource: RandomSource;
  private readonly strict: boolean;

  /**
   * Generate a key and write it to `hls_key_<random>.bin` in the temp directory
   * @throws RandomSourceError if no secure random bytes are available
   * @throws KeyInfoIOError if the key file cannot be created or written
   */
  constructor(url: string, options: KeyInfoOptions = {}) {
    this.url = url;
    this.tempDir = options.tempDir ?? config.tempDir;
    this.randomSource = options.randomSource ?? generateSecureRandom;
    this.strict = options.strict ?? false;

    const key = drawRandom(this.randomSource, AES_KEY_LENGTH, 'key');
    const path = writeKeyFile(this.tempDir, key);

    this.key = key;
    this.keyFile = { kind: 'generated', path };
    this.generatedKeyFile = path;

    debug(`Created key ${keyFingerprint(key)} at ${path}`);
  }

  /** Current key file path; empty after dispose */
  get keyFilePath(): string {
    return this.keyFile?.path ?? '';
  }

  /** Whether the current key file was generated here or supplied by the caller */
  get keyFileOwnership(): KeyFileOwnership | null {
    return this.keyFile?.kind ?? null;
  }

  /** IV line; empty means the line is omitted */
  get iv(): string {
    return this.currentIV;
  }

  /** Tracked keyinfo file from persistToTemporaryFile; empty if none */
  get infoFilePath(): string {
    return this.infoFile ?? '';
  }

  /** Loggable key identifier */
  get fingerprint(): string {
    return this.key ? keyFingerprint(this.key) : '';
  }

  /** Copy of the raw key bytes */
  getKey(): Buffer | null {
    return this.key ? Buffer.from(this.key) : null;
  }

  /**
   * Set the IV line. Accepted verbatim unless the descriptor is strict, in
   * which case it must be hex and is stored lowercase.
   */
  setIV(iv: string): this {
    if (!this.strict) {
      this.currentIV = iv;
      return this;
    }
    if (!isValidIV(iv)) {
      throw new KeyInfoValidationError('IV', 'expected empty or 32 hex characters');
    }
    this.currentIV = iv.toLowerCase();
    return this;
  }

  /**
   * Point the key file line at a caller-owned file. The caller's file is
   * never removed; the generated file is still removed by dispose().
   */
  setKeyFile(path: string): this {
    if (this.strict && !isValidKeyFile(path)) {
      throw new KeyInfoValidationError(
        'key file',
        `${path} is not a regular file of ${AES_KEY_LENGTH} bytes`
      );
    }
    this.keyFile = { kind: 'external', path };
    return this;
  }

  /**
   * Set a fresh random IV
   * @throws RandomSourceError unless `bestEffort` is set, in which case the
   *   IV falls back to all zeros
   */
  randIV(options: RandIVOptions = {}): this {
    try {
      this.currentIV = generateRandomIV(this.randomSource);
    } catch (error) {
      if (!options.bestEffort || !(error instanceof RandomSourceError)) {
        throw error;
      }
      console.warn(`${LOG_TAG} ${error.message}, using zero IV`);
      this.currentIV = ZERO_IV;
    }
    return this;
  }

  /**
   * Remove every file this descriptor created. Missing files count as
   * removed, so calling dispose() again is a no-op.
   * @throws KeyInfoDisposeError listing every removal that failed
   */
  dispose(): void {
    const errors: KeyInfoIOError[] = [];

    if (this.generatedKeyFile) {
      const error = removeFile(this.generatedKeyFile, 'remove key file');
      if (error) errors.push(error);
      this.generatedKeyFile = null;
    }
    this.keyFile = null;

    if (this.infoFile) {
      const error = removeFile(this.infoFile, 'remove keyinfo file');
      if (error) errors.push(error);
      this.infoFile = null;
    }

    if (errors.length > 0) {
      throw new KeyInfoDisposeError(errors);
    }
    debug(`Disposed key ${this.fingerprint}`);
  }

  /**
   * Write the keyinfo lines to a sink
   * @returns Number of bytes written
   * @throws KeyInfoWriteError carrying the bytes written before the failure
   */
  serialize(sink: KeyInfoSink): number {
    const lines: Array<[field: string, value: string]> = [
      ['URL', this.url],
      ['key file path', this.keyFilePath],
    ];
    if (this.currentIV !== '') {
      lines.push(['IV', this.currentIV]);
    }

    let written = 0;
    for (const [field, value] of lines) {
      const chunk = Buffer.from(`${value}\n`, 'utf-8');
      let accepted: number;
      try {
        accepted = sink.write(chunk);
      } catch (error) {
        const partial = error instanceof KeyInfoSinkError ? error.bytesWritten : 0;
        throw new KeyInfoWriteError(field, written + partial, errorMessage(error));
      }
      written += accepted;
      if (accepted !== chunk.length) {
        throw new KeyInfoWriteError(
          field,
          written,
          `short write (${accepted} of ${chunk.length} bytes)`
        );
      }
    }

    return written;
  }

  /**
   * Write the keyinfo to `hls_keyinfo_<random>.txt` in the temp directory.
   * Later calls rewrite the same file. The file is removed by dispose().
   * @returns Path of the keyinfo file
   */
  persistToTemporaryFile(): string {
    this.assertKey();

    let fd: number;
    let path: string;
    if (this.infoFile) {
      path = this.infoFile;
      fd = openForWrite(path, KEYINFO_FILE_MODE);
    } else {
      ({ fd, path } = createTempFile(
        this.tempDir,
        KEYINFO_FILE_PREFIX,
        KEYINFO_FILE_SUFFIX,
        KEYINFO_FILE_MODE
      ));
      this.infoFile = path;
    }

    const bytes = useFile(fd, path, (openFd) => this.serialize(new FileDescriptorSink(openFd)));
    debug(`Wrote ${bytes} bytes of keyinfo to ${path}`);
    return path;
  }

  /**
   * Write the keyinfo to a caller-owned path, creating or truncating it.
   * The file is not tracked for disposal.
   */
  persistToFile(path: string): void {
    this.assertKey();

    const fd = openForWrite(path, KEYINFO_FILE_MODE);
    const bytes = useFile(fd, path, (openFd) => this.serialize(new FileDescriptorSink(openFd)));
    debug(`Wrote ${bytes} bytes of keyinfo to ${path}`);
  }

  /** Keyinfo file contents */
  toString(): string {
    const sink = new BufferSink();
    this.serialize(sink);
    return sink.toString();
  }

  private assertKey(): void {
    if (!this.key) {
      throw new KeyNotInitializedError();
    }
  }
}
