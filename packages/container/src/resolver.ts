/**
 * Logical Resolver
 *
 * Maps the path a consumer asks for onto a stored blob.
 */

import mime from 'mime-types';
import type { Hash, Manifest } from '@blobpack/core';

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

export const PAGE_CONTENT_TYPE = 'image/jpeg';

export interface Resource {
  contentType: string;
  content: Uint8Array;
}

export function resolveFile(
  manifest: Manifest,
  files: ReadonlyMap<string, Uint8Array>,
  path: string
): Resource | undefined {
  switch (manifest.type) {
    case 'app': {
      const hash = manifest.paths.get(path);
      if (!hash) {
        return undefined;
      }
      return {
        contentType: mime.lookup(path) || DEFAULT_CONTENT_TYPE,
        content: blob(files, hash),
      };
    }
    case 'comic': {
      const page = parsePageIndex(path);
      if (page === undefined) {
        return undefined;
      }
      const hash = manifest.pages[page];
      if (!hash) {
        return undefined;
      }
      return {
        contentType: PAGE_CONTENT_TYPE,
        content: blob(files, hash),
      };
    }
  }
}

/**
 * Non-negative decimal integer, or undefined
 */
export function parsePageIndex(path: string): number | undefined {
  if (!/^\d+$/.test(path)) {
    return undefined;
  }
  const page = Number(path);
  return Number.isSafeInteger(page) ? page : undefined;
}

function blob(files: ReadonlyMap<string, Uint8Array>, hash: Hash): Uint8Array {
  const content = files.get(hash.hex);
  if (!content) {
    // The loader guarantees every manifest hash is present
    throw new Error(`package invariant violated: manifest hash ${hash.hex} has no blob`);
  }
  // Callers get their own bytes; the stored blob stays as verified
  return content.slice();
}
