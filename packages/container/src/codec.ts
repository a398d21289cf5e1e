/**
 * Binary Codec
 *
 * Layout of a package file:
 *
 *   magic            "MEDIA📦\0" as UTF-8
 *   manifest index   u64 LE
 *   entry count      u64 LE
 *   entries          count × (32-byte hash, u64 LE length), ascending by hash
 *   blobs            count × raw bytes, in entry order
 */

import { Hash } from '@blobpack/core';

export const MAGIC_BYTES: Uint8Array = new TextEncoder().encode('MEDIA📦\0');

export const U64_LENGTH = 8;

export const ENTRY_LENGTH = Hash.LENGTH + U64_LENGTH;

export interface IndexEntry {
  readonly hash: Hash;
  readonly length: bigint;
}

export function encodeU64(value: bigint): Uint8Array {
  const bytes = new Uint8Array(U64_LENGTH);
  new DataView(bytes.buffer).setBigUint64(0, value, true);
  return bytes;
}

export function decodeU64(bytes: Uint8Array): bigint {
  if (bytes.length !== U64_LENGTH) {
    throw new RangeError(`u64 field must be ${U64_LENGTH} bytes, got ${bytes.length}`);
  }
  return new DataView(bytes.buffer, bytes.byteOffset, U64_LENGTH).getBigUint64(0, true);
}

export function magicMatches(bytes: Uint8Array): boolean {
  return bytes.length === MAGIC_BYTES.length && MAGIC_BYTES.every((byte, i) => bytes[i] === byte);
}

/**
 * Everything before the first blob, in one buffer
 */
export function encodeHeader(manifestIndex: number, entries: readonly IndexEntry[]): Uint8Array {
  const header = new Uint8Array(
    MAGIC_BYTES.length + U64_LENGTH * 2 + entries.length * ENTRY_LENGTH
  );

  let offset = 0;
  const put = (bytes: Uint8Array): void => {
    header.set(bytes, offset);
    offset += bytes.length;
  };

  put(MAGIC_BYTES);
  put(encodeU64(BigInt(manifestIndex)));
  put(encodeU64(BigInt(entries.length)));

  for (const entry of entries) {
    put(entry.hash.toBytes());
    put(encodeU64(entry.length));
  }

  return header;
}
