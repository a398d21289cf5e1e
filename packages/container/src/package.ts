/**
 * Package
 *
 * A validated, immutable set of blobs plus the manifest that describes
 * them. Instances come from `Package.load`; after construction nothing is
 * mutated, so one package can serve any number of concurrent lookups.
 */

import { Hash, type Manifest, type PackageType } from '@blobpack/core';
import type { IndexEntry } from './codec.js';
import { loadPackage } from './loader.js';
import { resolveFile, type Resource } from './resolver.js';
import { savePackage, type FileEntry } from './writer.js';

export interface PackageInit {
  files: ReadonlyMap<string, Uint8Array>;
  manifest: Manifest;
  manifestHash: Hash;
}

export class Package {
  /** Blob bytes keyed by hash hex; never handed out directly. */
  private readonly files: ReadonlyMap<string, Uint8Array>;
  readonly manifest: Manifest;
  readonly manifestHash: Hash;

  constructor(init: PackageInit) {
    this.files = new Map(init.files);
    this.manifest = init.manifest;
    this.manifestHash = init.manifestHash;
  }

  static load(path: string): Promise<Package> {
    return loadPackage(path);
  }

  static save(
    hashes: ReadonlyMap<string, FileEntry>,
    manifest: Manifest,
    output: string,
    root: string
  ): Promise<void> {
    return savePackage(hashes, manifest, output, root);
  }

  get type(): PackageType {
    return this.manifest.type;
  }

  /** Number of stored blobs, the manifest included. */
  get size(): number {
    return this.files.size;
  }

  /**
   * Copy of the blob stored under `hash`
   */
  get(hash: Hash): Uint8Array | undefined {
    return this.files.get(hash.hex)?.slice();
  }

  /**
   * Resolve a logical path (app) or page number (comic)
   */
  file(path: string): Resource | undefined {
    return resolveFile(this.manifest, this.files, path);
  }

  /**
   * Index entries in canonical on-disk order
   */
  entries(): IndexEntry[] {
    return [...this.files]
      .map(([hex, content]) => ({ hash: Hash.fromHex(hex), length: BigInt(content.length) }))
      .sort((a, b) => a.hash.compare(b.hash));
  }
}
