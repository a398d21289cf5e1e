/**
 * @blobpack/core
 *
 * Core model package containing:
 * - Content hashes
 * - Manifest types, canonical encoding and consistency check
 * - Error handling
 */

// Hashes
export { Hash, Hasher } from './hash.js';

// Manifest
export {
  PACKAGE_TYPES,
  APP_INDEX,
  manifestHashes,
  manifestToJson,
  sortedPaths,
  encodeManifest,
  decodeManifest,
  verifyManifest,
} from './manifest/index.js';

export type {
  PackageType,
  Manifest,
  AppManifest,
  ComicManifest,
  ManifestJson,
} from './manifest/index.js';

// Errors
export {
  BlobpackError,
  NotFoundError,
  ManifestDecodeError,
  ManifestExtraFilesError,
  ManifestMissingFilesError,
  type BlobpackErrorOptions,
} from './errors/index.js';
