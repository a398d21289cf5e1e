/**
 * @blobpack/packaging
 *
 * Directory to package.
 *
 * Responsibilities:
 * - Read and validate metadata.yaml
 * - Collect and hash the files under a root
 * - Build the manifest for the declared package type
 * - Save the package file
 */

export { Packager, type PackageOptions, type PackageResult } from './packager.js';
export { loadMetadata, METADATA_PATH, type Metadata } from './metadata.js';
export { createTemplate, templateManifest, type Template } from './template.js';
export {
  PackagingError,
  OutputInRootError,
  OutputIsDirError,
  MetadataMissingError,
  MetadataInvalidError,
  IndexMissingError,
  NoPagesError,
  PageMissingError,
  PageDuplicatedError,
  InvalidPageError,
  UnexpectedFileError,
  WalkError,
  FileReadError,
  PackageSaveError,
} from './errors.js';
