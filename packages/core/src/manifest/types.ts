/**
 * Manifest Types
 *
 * A manifest describes how a package's blobs compose into one logical
 * resource. Adding a content type means adding a member here and a branch
 * wherever the union is switched on.
 */

import type { Hash } from '../hash.js';

export const PACKAGE_TYPES = ['app', 'comic'] as const;

export type PackageType = (typeof PACKAGE_TYPES)[number];

/**
 * Path-addressed bundle, e.g. a web front-end. `handles` names the content
 * type the app knows how to display.
 */
export interface AppManifest {
  readonly type: 'app';
  readonly handles: PackageType;
  readonly paths: ReadonlyMap<string, Hash>;
}

/**
 * Index-addressed bundle: page 0, 1, 2, ...
 */
export interface ComicManifest {
  readonly type: 'comic';
  readonly pages: readonly Hash[];
}

export type Manifest = AppManifest | ComicManifest;

export type ManifestJson =
  | { type: 'app'; handles: PackageType; paths: Record<string, string> }
  | { type: 'comic'; pages: string[] };

/** Entry point every app package must contain. */
export const APP_INDEX = 'index.html';

/**
 * Every blob hash the manifest refers to, in manifest order, possibly
 * repeated.
 */
export function manifestHashes(manifest: Manifest): Hash[] {
  switch (manifest.type) {
    case 'app':
      return [...manifest.paths.values()];
    case 'comic':
      return [...manifest.pages];
  }
}

export function manifestToJson(manifest: Manifest): ManifestJson {
  switch (manifest.type) {
    case 'app':
      return {
        type: 'app',
        handles: manifest.handles,
        paths: Object.fromEntries(
          sortedPaths(manifest.paths).map(([path, hash]) => [path, hash.hex])
        ),
      };
    case 'comic':
      return {
        type: 'comic',
        pages: manifest.pages.map((hash) => hash.hex),
      };
  }
}

/**
 * Path entries ordered by UTF-16 code unit, independent of insertion order
 */
export function sortedPaths(paths: ReadonlyMap<string, Hash>): Array<[string, Hash]> {
  return [...paths].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
