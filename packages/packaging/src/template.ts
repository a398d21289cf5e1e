/**
 * Templates
 *
 * A template is what the metadata and the collected paths say a package
 * should look like, before any file is hashed.
 */

import { APP_INDEX, type Manifest, type PackageType } from '@blobpack/core';
import type { FileEntry } from '@blobpack/container';
import {
  IndexMissingError,
  InvalidPageError,
  NoPagesError,
  PageDuplicatedError,
  PageMissingError,
  UnexpectedFileError,
} from './errors.js';
import type { Metadata } from './metadata.js';

const U64_MAX = 2n ** 64n - 1n;

const PAGE_PATTERN = /^(\d+)\.jpg$/;

export type Template =
  | { type: 'app'; handles: PackageType }
  | { type: 'comic'; pages: string[] };

export function createTemplate(
  metadata: Metadata,
  root: string,
  paths: ReadonlySet<string>
): Template {
  switch (metadata.type) {
    case 'app':
      if (!paths.has(APP_INDEX)) {
        throw new IndexMissingError(root);
      }
      return { type: 'app', handles: metadata.handles };
    case 'comic':
      return { type: 'comic', pages: comicPages(root, paths) };
  }
}

/**
 * Page files are `<n>.jpg` and must number 0 through count - 1
 */
function comicPages(root: string, paths: ReadonlySet<string>): string[] {
  const pages = new Map<bigint, string>();

  for (const path of [...paths].sort()) {
    const match = PAGE_PATTERN.exec(path);
    const digits = match?.[1];
    if (digits === undefined) {
      throw new UnexpectedFileError(path, 'comic');
    }

    const page = BigInt(digits);
    if (page > U64_MAX) {
      throw new InvalidPageError(path);
    }
    if (pages.has(page)) {
      throw new PageDuplicatedError(page);
    }
    pages.set(page, path);
  }

  if (pages.size === 0) {
    throw new NoPagesError(root);
  }

  const ordered: string[] = [];
  for (let page = 0n; page < BigInt(pages.size); page++) {
    const path = pages.get(page);
    if (path === undefined) {
      throw new PageMissingError(page);
    }
    ordered.push(path);
  }
  return ordered;
}

export function templateManifest(
  template: Template,
  hashes: ReadonlyMap<string, FileEntry>
): Manifest {
  switch (template.type) {
    case 'app':
      return {
        type: 'app',
        handles: template.handles,
        paths: new Map([...hashes].map(([path, { hash }]) => [path, hash])),
      };
    case 'comic':
      return {
        type: 'comic',
        pages: template.pages.map((path) => {
          const entry = hashes.get(path);
          if (!entry) {
            throw new Error(`page ${path} was not hashed`);
          }
          return entry.hash;
        }),
      };
  }
}
