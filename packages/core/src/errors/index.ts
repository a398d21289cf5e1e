/**
 * Custom Error Classes
 */

export interface BlobpackErrorOptions {
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base error class for all blobpack errors
 */
export class BlobpackError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, options: BlobpackErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BlobpackError';
    this.code = code;
    this.statusCode = options.statusCode ?? 500;
    this.details = options.details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends BlobpackError {
  public readonly path: string;

  constructor(path: string) {
    super(
      `${path} not found`,
      'NOT_FOUND',
      { statusCode: 404, details: { path } }
    );
    this.name = 'NotFoundError';
    this.path = path;
  }
}

/**
 * Canonical manifest bytes could not be decoded
 */
export class ManifestDecodeError extends BlobpackError {
  constructor(reason: string, cause?: unknown) {
    super(`malformed manifest: ${reason}`, 'MANIFEST_DECODE', { cause });
    this.name = 'ManifestDecodeError';
  }
}

/**
 * Package blobs not referenced by its manifest
 */
export class ManifestExtraFilesError extends BlobpackError {
  public readonly extra: number;

  constructor(extra: number) {
    super(
      `package contains ${extra} extra files not accounted for in manifest`,
      'MANIFEST_EXTRA_FILES',
      { details: { extra } }
    );
    this.name = 'ManifestExtraFilesError';
    this.extra = extra;
  }
}

/**
 * Manifest references blobs the package does not contain
 */
export class ManifestMissingFilesError extends BlobpackError {
  public readonly missing: number;

  constructor(missing: number) {
    super(
      `package missing ${missing} files from manifest`,
      'MANIFEST_MISSING_FILES',
      { details: { missing } }
    );
    this.name = 'ManifestMissingFilesError';
    this.missing = missing;
  }
}
