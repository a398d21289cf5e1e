/**
 * Packager
 *
 * Turns a directory tree into a package file.
 */

import { basename, join } from 'node:path';
import { glob } from 'glob';
import type { Manifest } from '@blobpack/core';
import { savePackage, type FileEntry } from '@blobpack/container';
import {
  calculateFileHash,
  createLogger,
  getFileSizeBytes,
  isDirectory,
  isWithin,
  pathExists,
  type Logger,
} from '@blobpack/utils';
import {
  FileReadError,
  MetadataMissingError,
  OutputInRootError,
  OutputIsDirError,
  PackageSaveError,
  WalkError,
} from './errors.js';
import { loadMetadata, METADATA_PATH } from './metadata.js';
import { createTemplate, templateManifest } from './template.js';

const IGNORED_FILES = new Set(['.DS_Store']);

export interface PackageOptions {
  /** Directory whose contents become the package. */
  root: string;
  /** Package file to create or overwrite. */
  output: string;
}

export interface PackageResult {
  output: string;
  manifest: Manifest;
  /** Source files included, before identical contents are merged. */
  files: number;
}

export class Packager {
  private readonly log: Logger;

  constructor(log?: Logger) {
    this.log = log ?? createLogger({ module: 'packager' });
  }

  /**
   * Package the contents of `root` into `output`
   */
  async package({ root, output }: PackageOptions): Promise<PackageResult> {
    if (isWithin(root, output)) {
      throw new OutputInRootError(output, root);
    }

    if (await isDirectory(output)) {
      throw new OutputIsDirError(output);
    }

    const metadataPath = join(root, METADATA_PATH);
    if (!(await pathExists(metadataPath))) {
      throw new MetadataMissingError(root);
    }

    const metadata = await loadMetadata(metadataPath);
    const paths = await this.paths(root);
    const template = createTemplate(metadata, root, paths);
    const hashes = await this.hashes(root, paths);
    const manifest = templateManifest(template, hashes);

    try {
      await savePackage(hashes, manifest, output, root);
    } catch (error) {
      throw new PackageSaveError(output, error);
    }

    this.log.info({ root, output, type: manifest.type, files: hashes.size }, 'Package saved');

    return { output, manifest, files: hashes.size };
  }

  /**
   * Relative, forward-slash paths of every file under `root`
   */
  private async paths(root: string): Promise<Set<string>> {
    let found: string[];
    try {
      found = await glob('**/*', { cwd: root, nodir: true, dot: true, posix: true });
    } catch (error) {
      throw new WalkError(root, error);
    }

    const paths = new Set<string>();
    for (const path of found) {
      if (IGNORED_FILES.has(basename(path)) || path === METADATA_PATH) {
        continue;
      }
      paths.add(path);
    }
    return paths;
  }

  private async hashes(root: string, paths: ReadonlySet<string>): Promise<Map<string, FileEntry>> {
    const hashes = new Map<string, FileEntry>();

    for (const relative of paths) {
      const path = join(root, relative);
      try {
        const [hash, length] = await Promise.all([
          calculateFileHash(path),
          getFileSizeBytes(path),
        ]);
        hashes.set(relative, { hash, length });
      } catch (error) {
        throw new FileReadError(path, error);
      }
      this.log.debug({ path: relative }, 'Hashed file');
    }

    return hashes;
  }
}
