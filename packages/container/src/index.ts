/**
 * @blobpack/container
 *
 * Content-addressed package files:
 * - Binary codec for the on-disk layout
 * - Writer producing the canonical sorted-index file
 * - Loader validating every invariant on the way in
 * - Resolver from logical paths to blobs
 */

export { Package, type PackageInit } from './package.js';
export { loadPackage, readPackage } from './loader.js';
export { savePackage, type FileEntry } from './writer.js';
export {
  resolveFile,
  parsePageIndex,
  DEFAULT_CONTENT_TYPE,
  PAGE_CONTENT_TYPE,
  type Resource,
} from './resolver.js';
export { PackageReader } from './reader.js';
export {
  MAGIC_BYTES,
  U64_LENGTH,
  ENTRY_LENGTH,
  encodeU64,
  decodeU64,
  encodeHeader,
  magicMatches,
  type IndexEntry,
} from './codec.js';
export {
  PackageError,
  MagicBytesError,
  ManifestIndexRangeError,
  ManifestIndexOutOfBoundsError,
  FileHashOrderError,
  FileHashDuplicatedError,
  FileLengthRangeError,
  FileHashInvalidError,
  UnexpectedEofError,
  TrailingBytesError,
  DeserializeManifestError,
  FileIoError,
  IoCopyError,
  PackageIoError,
} from './errors.js';
export { ManifestExtraFilesError, ManifestMissingFilesError } from '@blobpack/core';
