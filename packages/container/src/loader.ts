/**
 * Package Loader
 *
 * Parses a package file and checks every invariant before a Package is
 * handed out. The first violation aborts the load.
 */

import { constants } from 'node:buffer';
import { open, type FileHandle } from 'node:fs/promises';
import {
  decodeManifest,
  Hash,
  verifyManifest,
  type Manifest,
} from '@blobpack/core';
import { MAGIC_BYTES, magicMatches, type IndexEntry } from './codec.js';
import {
  DeserializeManifestError,
  FileHashDuplicatedError,
  FileHashInvalidError,
  FileHashOrderError,
  FileLengthRangeError,
  MagicBytesError,
  ManifestIndexOutOfBoundsError,
  ManifestIndexRangeError,
  PackageIoError,
  TrailingBytesError,
} from './errors.js';
import { withHandle } from './handle.js';
import { Package } from './package.js';
import { PackageReader } from './reader.js';

export async function loadPackage(path: string): Promise<Package> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    throw new PackageIoError(`failed to open package \`${path}\``, error);
  }

  return withHandle(handle, path, async (file) => {
    let size: number;
    try {
      size = (await file.stat()).size;
    } catch (error) {
      throw new PackageIoError(`failed to stat package \`${path}\``, error);
    }
    return readPackage(new PackageReader(file, size));
  });
}

export async function readPackage(reader: PackageReader): Promise<Package> {
  const magic = await reader.readUpTo(MAGIC_BYTES.length);
  if (!magicMatches(magic)) {
    throw new MagicBytesError(magic);
  }

  const rawIndex = await reader.readU64();
  if (rawIndex > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ManifestIndexRangeError(rawIndex);
  }
  const manifestIndex = Number(rawIndex);

  const count = await reader.readU64();

  const entries: IndexEntry[] = [];
  for (let i = 0n; i < count; i++) {
    const hash = await reader.readHash();
    const length = await reader.readU64();

    if (length > BigInt(constants.MAX_LENGTH)) {
      throw new FileLengthRangeError(length);
    }

    const last = entries[entries.length - 1];
    if (last) {
      const order = hash.compare(last.hash);
      if (order < 0) {
        throw new FileHashOrderError(hash);
      }
      if (order === 0) {
        throw new FileHashDuplicatedError(hash);
      }
    }

    entries.push({ hash, length });
  }

  const manifestEntry = entries[manifestIndex];
  if (!manifestEntry) {
    throw new ManifestIndexOutOfBoundsError(manifestIndex, entries.length);
  }
  const manifestHash = manifestEntry.hash;

  const files = new Map<string, Uint8Array>();
  for (const entry of entries) {
    const content = await reader.readExact(Number(entry.length));
    const actual = Hash.digest(content);
    if (!actual.equals(entry.hash)) {
      throw new FileHashInvalidError(entry.hash, actual);
    }
    files.set(entry.hash.hex, content);
  }

  if (reader.position !== reader.size) {
    throw new TrailingBytesError(Math.max(0, reader.size - reader.position));
  }

  const manifest = parseManifest(files, manifestHash);

  verifyManifest(manifest, manifestHash, files);

  return new Package({ files, manifest, manifestHash });
}

function parseManifest(files: ReadonlyMap<string, Uint8Array>, manifestHash: Hash): Manifest {
  const bytes = files.get(manifestHash.hex);
  if (!bytes) {
    throw new Error(`manifest blob ${manifestHash.hex} was not stored`);
  }
  try {
    return decodeManifest(bytes);
  } catch (error) {
    throw new DeserializeManifestError(error);
  }
}
