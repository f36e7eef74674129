/**
 * Custom error classes for keyinfo generation
 */

/** Base error class for keyinfo errors */
export class KeyInfoError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'KeyInfoError';
  }
}

/** Secure random source failed or returned the wrong amount of data */
export class RandomSourceError extends KeyInfoError {
  constructor(message: string) {
    super(message, 'RANDOM_SOURCE_ERROR');
    this.name = 'RandomSourceError';
  }
}

/** File creation, write, removal, open or close failure */
export class KeyInfoIOError extends KeyInfoError {
  constructor(
    public operation: string,
    public path: string,
    reason: string,
    details?: Record<string, unknown>
  ) {
    super(`Failed to ${operation}${path ? ` ${path}` : ''}: ${reason}`, 'IO_ERROR', {
      operation,
      path,
      ...details,
    });
    this.name = 'KeyInfoIOError';
  }

  /** Wrap an error thrown by the fs module */
  static from(operation: string, path: string, error: unknown): KeyInfoIOError {
    if (error instanceof KeyInfoIOError) {
      return error;
    }
    return new KeyInfoIOError(operation, path, errorMessage(error), {
      errno: errorCode(error),
    });
  }
}

/** Serialization failed part way; bytesWritten may have reached the sink */
export class KeyInfoWriteError extends KeyInfoIOError {
  constructor(
    field: string,
    public bytesWritten: number,
    reason: string
  ) {
    super(`write ${field}`, '', reason, { bytesWritten });
    this.name = 'KeyInfoWriteError';
  }
}

/** Sink failed after accepting part of a chunk */
export class KeyInfoSinkError extends KeyInfoError {
  constructor(
    message: string,
    public bytesWritten: number
  ) {
    super(message, 'SINK_ERROR', { bytesWritten });
    this.name = 'KeyInfoSinkError';
  }
}

/** One or more temporary files could not be removed */
export class KeyInfoDisposeError extends KeyInfoError {
  constructor(public errors: KeyInfoIOError[]) {
    super(
      `Failed to clean up temporary files: ${errors.map((e) => e.message).join('; ')}`,
      'DISPOSE_ERROR',
      { paths: errors.map((e) => e.path) }
    );
    this.name = 'KeyInfoDisposeError';
  }
}

/** File-producing operation called without key material */
export class KeyNotInitializedError extends KeyInfoError {
  constructor() {
    super('Key is not initialized', 'KEY_NOT_INITIALIZED');
    this.name = 'KeyNotInitializedError';
  }
}

/** Strict-mode setter rejected its input */
export class KeyInfoValidationError extends KeyInfoError {
  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`, 'VALIDATION_ERROR', { field });
    this.name = 'KeyInfoValidationError';
  }
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/** errno code (ENOENT, EEXIST, ...) of an fs error, if any */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
