/**
 * Package Writer
 *
 * Serializes a set of hashed files and a manifest into the canonical
 * layout. Index order depends only on hash values, so the same input always
 * produces the same bytes regardless of how the caller enumerated files.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import { encodeManifest, Hash, type Manifest } from '@blobpack/core';
import { encodeHeader, type IndexEntry } from './codec.js';
import { FileIoError, IoCopyError, PackageIoError } from './errors.js';
import { withHandle } from './handle.js';

const COPY_CHUNK_SIZE = 64 * 1024;

export interface FileEntry {
  hash: Hash;
  /** Declared size in bytes; trusted, not re-checked against the file. */
  length: number | bigint;
}

/**
 * @param hashes relative path (under `root`) to hash and length, for every
 *   blob except the manifest
 */
export async function savePackage(
  hashes: ReadonlyMap<string, FileEntry>,
  manifest: Manifest,
  output: string,
  root: string
): Promise<void> {
  const manifestBytes = encodeManifest(manifest);
  const manifestHash = Hash.digest(manifestBytes);

  // One entry per distinct blob; paths with identical content share it
  const sources = new Map<string, string>();
  const entries = new Map<string, IndexEntry>();

  for (const [path, { hash, length }] of hashes) {
    if (!sources.has(hash.hex)) {
      sources.set(hash.hex, path);
    }
    entries.set(hash.hex, { hash, length: BigInt(length) });
  }

  entries.set(manifestHash.hex, {
    hash: manifestHash,
    length: BigInt(manifestBytes.length),
  });

  const sorted = [...entries.values()].sort((a, b) => a.hash.compare(b.hash));
  const manifestIndex = sorted.findIndex((entry) => entry.hash.equals(manifestHash));

  let handle: FileHandle;
  try {
    handle = await open(output, 'w');
  } catch (error) {
    throw new PackageIoError(`failed to create package \`${output}\``, error);
  }

  await withHandle(handle, output, async (file) => {
    await writeAll(file, encodeHeader(manifestIndex, sorted), output);

    for (const entry of sorted) {
      if (entry.hash.equals(manifestHash)) {
        await writeAll(file, manifestBytes, output);
        continue;
      }

      const relative = sources.get(entry.hash.hex);
      if (relative === undefined) {
        throw new Error(`no source path for blob ${entry.hash.hex}`);
      }
      await copyFileInto(file, join(root, relative));
    }
  });
}

async function writeAll(handle: FileHandle, data: Uint8Array, output: string): Promise<void> {
  try {
    await writeChunk(handle, data);
  } catch (error) {
    throw new PackageIoError(`failed to write package \`${output}\``, error);
  }
}

async function writeChunk(handle: FileHandle, data: Uint8Array): Promise<void> {
  let offset = 0;
  while (offset < data.length) {
    const { bytesWritten } = await handle.write(data, offset, data.length - offset);
    offset += bytesWritten;
  }
}

async function copyFileInto(output: FileHandle, path: string): Promise<void> {
  let source: FileHandle;
  try {
    source = await open(path, 'r');
  } catch (error) {
    throw new FileIoError(path, error);
  }

  await withHandle(source, path, async (file) => {
    try {
      const buffer = new Uint8Array(COPY_CHUNK_SIZE);
      let position = 0;
      for (;;) {
        const { bytesRead } = await file.read(buffer, 0, buffer.length, position);
        if (bytesRead === 0) {
          break;
        }
        await writeChunk(output, buffer.subarray(0, bytesRead));
        position += bytesRead;
      }
    } catch (error) {
      throw new IoCopyError(path, error);
    }
  });
}
