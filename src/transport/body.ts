/**
 * Request and response body plumbing.
 *
 * @module transport/body
 */

import { Readable } from 'stream';

/**
 * Accumulates response body chunks in arrival order.
 *
 * Chunks are kept as bytes and decoded once at the end, so a multibyte
 * character split across two chunks decodes correctly.
 */
export class ResponseBodySink {
  private readonly chunks: Buffer[] = [];
  private length = 0;

  /**
   * Appends one chunk.
   * @returns The number of bytes consumed, always the chunk size.
   */
  write(chunk: Uint8Array): number {
    this.chunks.push(Buffer.from(chunk));
    this.length += chunk.byteLength;
    return chunk.byteLength;
  }

  get byteLength(): number {
    return this.length;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.length);
  }

  toString(): string {
    return this.toBuffer().toString('utf8');
  }
}

/**
 * Read cursor over an upload buffer, consumed by pull-based reads.
 */
export class UploadCursor {
  private readonly data: Buffer;
  private offset = 0;

  constructor(data: Uint8Array) {
    this.data = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }

  /** Bytes not yet handed out. */
  get remaining(): number {
    return this.data.byteLength - this.offset;
  }

  /** Total upload size in bytes. */
  get size(): number {
    return this.data.byteLength;
  }

  /**
   * Copies up to `max` bytes from the cursor and advances it.
   * An empty buffer means the upload is complete.
   */
  read(max: number): Buffer {
    const count = Math.max(0, Math.min(max, this.remaining));
    const chunk = Buffer.alloc(count);
    this.data.copy(chunk, 0, this.offset, this.offset + count);
    this.offset += count;
    return chunk;
  }
}

/**
 * Wraps a cursor in a readable stream the transport pulls from. Each read
 * request is served with at most the size asked for; the stream ends once the
 * cursor is exhausted.
 */
export function createUploadStream(cursor: UploadCursor): Readable {
  return new Readable({
    read(size: number) {
      const chunk = cursor.read(size);
      this.push(chunk.byteLength > 0 ? chunk : null);
    },
  });
}

/**
 * Encodes a request body to the exact bytes sent on the wire.
 */
export function toBodyBytes(data: string | Uint8Array): Buffer {
  return typeof data === 'string'
    ? Buffer.from(data, 'utf8')
    : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}
