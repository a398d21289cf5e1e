export {
  PACKAGE_TYPES,
  APP_INDEX,
  manifestHashes,
  manifestToJson,
  sortedPaths,
  type PackageType,
  type Manifest,
  type AppManifest,
  type ComicManifest,
  type ManifestJson,
} from './types.js';
export { encodeManifest, decodeManifest } from './codec.js';
export { verifyManifest } from './verify.js';
