/**
 * Synchronous serialization targets for keyinfo output
 */

import { writeSync } from 'fs';
import { KeyInfoSinkError, errorMessage } from '@keyinfo/common';

/** Synchronous byte sink; returns the number of bytes accepted */
export interface KeyInfoSink {
  write(chunk: Uint8Array): number;
}

/**
 * In-memory sink
 */
export class BufferSink implements KeyInfoSink {
  private chunks: Buffer[] = [];
  private size = 0;

  write(chunk: Uint8Array): number {
    const copy = Buffer.from(chunk);
    this.chunks.push(copy);
    this.size += copy.length;
    return copy.length;
  }

  get length(): number {
    return this.size;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.size);
  }

  toString(): string {
    return this.toBuffer().toString('utf-8');
  }
}

/**
 * Sink over an open file descriptor. Partial writes are retried until the
 * chunk is written or the descriptor stops accepting data. A failure after
 * part of the chunk reached the file throws KeyInfoSinkError with that count.
 */
export class FileDescriptorSink implements KeyInfoSink {
  constructor(private fd: number) {}

  write(chunk: Uint8Array): number {
    let offset = 0;
    while (offset < chunk.length) {
      let written: number;
      try {
        written = writeSync(this.fd, chunk, offset, chunk.length - offset);
      } catch (error) {
        throw new KeyInfoSinkError(errorMessage(error), offset);
      }
      if (written === 0) break;
      offset += written;
    }
    return offset;
  }
}
