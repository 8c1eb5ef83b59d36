/**
 * Random-access byte sources for the SMF decoder.
 *
 * The decoder keeps one reader per track so interleaved reads across tracks
 * do not evict each other's window.
 */

import { closeSync, fstatSync, openSync, readSync } from "node:fs";
import { FILE_READ_WINDOW_BYTES } from "@/core/constants";

export interface ByteReader {
  /** Byte at `offset`, or -1 past the end of the source. */
  byteAt(offset: number): number;
}

export interface ByteSource {
  readonly length: number;
  createReader(): ByteReader;
  close(): void;
}

/**
 * Source over bytes that are already in memory.
 */
export class BufferByteSource implements ByteSource {
  readonly length: number;

  constructor(private readonly bytes: Uint8Array) {
    this.length = bytes.length;
  }

  createReader(): ByteReader {
    const bytes = this.bytes;
    return {
      byteAt: (offset: number) =>
        offset >= 0 && offset < bytes.length ? bytes[offset] : -1,
    };
  }

  close(): void {
    // nothing to release
  }
}

/**
 * Source over an open file descriptor. Reads happen synchronously in
 * windows of `windowSize` bytes per reader.
 */
export class FileByteSource implements ByteSource {
  readonly length: number;
  private fd: number | null;

  constructor(
    readonly path: string,
    private readonly windowSize: number = FILE_READ_WINDOW_BYTES
  ) {
    this.fd = openSync(path, "r");
    try {
      this.length = fstatSync(this.fd).size;
    } catch (error) {
      closeSync(this.fd);
      this.fd = null;
      throw error;
    }
  }

  createReader(): ByteReader {
    return new FileWindowReader(this, this.windowSize);
  }

  /**
   * Fill `buffer` from `position`; returns the number of bytes read.
   */
  readInto(buffer: Uint8Array, position: number): number {
    if (this.fd === null) {
      throw new Error(`[FileByteSource] ${this.path} is closed`);
    }
    return readSync(this.fd, buffer, 0, buffer.length, position);
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

class FileWindowReader implements ByteReader {
  private readonly window: Uint8Array;
  private start = 0;
  private filled = 0;

  constructor(private readonly source: FileByteSource, windowSize: number) {
    this.window = new Uint8Array(windowSize);
  }

  byteAt(offset: number): number {
    if (offset < 0 || offset >= this.source.length) return -1;
    if (offset < this.start || offset >= this.start + this.filled) {
      this.start = offset;
      this.filled = this.source.readInto(this.window, offset);
      if (this.filled === 0) return -1;
    }
    return this.window[offset - this.start];
  }
}
