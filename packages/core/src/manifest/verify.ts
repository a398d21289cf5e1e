import type { Hash } from '../hash.js';
import { ManifestExtraFilesError, ManifestMissingFilesError } from '../errors/index.js';
import { manifestHashes, type Manifest } from './types.js';

/**
 * Checks that the blobs of a package are exactly those the manifest
 * accounts for: its referenced hashes plus the manifest's own blob.
 *
 * `files` is keyed by hash hex.
 */
export function verifyManifest(
  manifest: Manifest,
  manifestHash: Hash,
  files: ReadonlyMap<string, Uint8Array>
): void {
  const referenced = new Set<string>([manifestHash.hex]);
  for (const hash of manifestHashes(manifest)) {
    referenced.add(hash.hex);
  }

  let extra = 0;
  for (const hex of files.keys()) {
    if (!referenced.has(hex)) {
      extra++;
    }
  }
  if (extra > 0) {
    throw new ManifestExtraFilesError(extra);
  }

  let missing = 0;
  for (const hex of referenced) {
    if (!files.has(hex)) {
      missing++;
    }
  }
  if (missing > 0) {
    throw new ManifestMissingFilesError(missing);
  }
}
