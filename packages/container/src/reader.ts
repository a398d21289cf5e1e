/**
 * Package Reader
 *
 * Sequential, buffered reads over an open package file. Tracks the logical
 * position so the loader can compare it against the file size once every
 * declared blob has been consumed.
 */

import type { FileHandle } from 'node:fs/promises';
import { Hash } from '@blobpack/core';
import { decodeU64, U64_LENGTH } from './codec.js';
import { PackageIoError, UnexpectedEofError } from './errors.js';

const DEFAULT_CHUNK_SIZE = 64 * 1024;

export class PackageReader {
  private buffer = new Uint8Array(0);
  private offset = 0;
  private filePosition = 0;

  constructor(
    private readonly handle: FileHandle,
    readonly size: number,
    private readonly chunkSize: number = DEFAULT_CHUNK_SIZE
  ) {}

  /** Bytes consumed so far. */
  get position(): number {
    return this.filePosition - (this.buffer.length - this.offset);
  }

  /**
   * Read `length` bytes, or fewer if the file ends first. Short reads from
   * the file are retried until it reports end of file.
   */
  async readUpTo(length: number): Promise<Uint8Array> {
    const out = new Uint8Array(length);
    let read = 0;

    while (read < length) {
      if (this.offset === this.buffer.length) {
        // Large remainders bypass the buffer
        if (length - read >= this.chunkSize) {
          const bytesRead = await this.readFile(out, read, length - read);
          if (bytesRead === 0) {
            break;
          }
          read += bytesRead;
          continue;
        }

        if ((await this.fill()) === 0) {
          break;
        }
      }

      const n = Math.min(length - read, this.buffer.length - this.offset);
      out.set(this.buffer.subarray(this.offset, this.offset + n), read);
      this.offset += n;
      read += n;
    }

    return read === length ? out : out.subarray(0, read);
  }

  /**
   * Read exactly `length` bytes or fail with UnexpectedEofError. The length
   * is checked against the file size before anything is allocated.
   */
  async readExact(length: number): Promise<Uint8Array> {
    const remaining = Math.max(0, this.size - this.position);
    if (length > remaining) {
      throw new UnexpectedEofError(length, remaining);
    }

    const bytes = await this.readUpTo(length);
    if (bytes.length < length) {
      throw new UnexpectedEofError(length, bytes.length);
    }
    return bytes;
  }

  async readU64(): Promise<bigint> {
    return decodeU64(await this.readExact(U64_LENGTH));
  }

  async readHash(): Promise<Hash> {
    return Hash.fromBytes(await this.readExact(Hash.LENGTH));
  }

  private async fill(): Promise<number> {
    const chunk = new Uint8Array(this.chunkSize);
    const bytesRead = await this.readFile(chunk, 0, this.chunkSize);
    this.buffer = chunk.subarray(0, bytesRead);
    this.offset = 0;
    return bytesRead;
  }

  private async readFile(target: Uint8Array, offset: number, length: number): Promise<number> {
    try {
      const { bytesRead } = await this.handle.read(target, offset, length, this.filePosition);
      this.filePosition += bytesRead;
      return bytesRead;
    } catch (error) {
      throw new PackageIoError('I/O error reading package', error);
    }
  }
}
