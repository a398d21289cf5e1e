/**
 * Packaging Errors
 */

import { BlobpackError, type BlobpackErrorOptions, type PackageType } from '@blobpack/core';

export class PackagingError extends BlobpackError {
  constructor(message: string, code: string, options: BlobpackErrorOptions = {}) {
    super(message, code, { statusCode: 400, ...options });
    this.name = 'PackagingError';
  }
}

export class OutputInRootError extends PackagingError {
  constructor(public readonly output: string, public readonly root: string) {
    super(`output \`${output}\` may not be inside of package root \`${root}\``, 'OUTPUT_IN_ROOT', {
      details: { output, root },
    });
    this.name = 'OutputInRootError';
  }
}

export class OutputIsDirError extends PackagingError {
  constructor(public readonly output: string) {
    super(`output \`${output}\` is an existing directory`, 'OUTPUT_IS_DIR', {
      details: { output },
    });
    this.name = 'OutputIsDirError';
  }
}

export class MetadataMissingError extends PackagingError {
  constructor(public readonly root: string) {
    super(`metadata.yaml missing in \`${root}\``, 'METADATA_MISSING', { details: { root } });
    this.name = 'MetadataMissingError';
  }
}

export class MetadataInvalidError extends PackagingError {
  constructor(public readonly path: string, reason: string, cause?: unknown) {
    super(`invalid metadata \`${path}\`: ${reason}`, 'METADATA_INVALID', {
      cause,
      details: { path, reason },
    });
    this.name = 'MetadataInvalidError';
  }
}

export class IndexMissingError extends PackagingError {
  constructor(public readonly root: string) {
    super(`app package root \`${root}\` has no index.html`, 'INDEX_MISSING', {
      details: { root },
    });
    this.name = 'IndexMissingError';
  }
}

export class NoPagesError extends PackagingError {
  constructor(public readonly root: string) {
    super(`comic package root \`${root}\` contains no pages`, 'NO_PAGES', { details: { root } });
    this.name = 'NoPagesError';
  }
}

export class PageMissingError extends PackagingError {
  constructor(public readonly page: bigint) {
    super(`comic is missing page ${page}`, 'PAGE_MISSING', {
      details: { page: page.toString() },
    });
    this.name = 'PageMissingError';
  }
}

export class PageDuplicatedError extends PackagingError {
  constructor(public readonly page: bigint) {
    super(`comic has more than one file for page ${page}`, 'PAGE_DUPLICATED', {
      details: { page: page.toString() },
    });
    this.name = 'PageDuplicatedError';
  }
}

export class InvalidPageError extends PackagingError {
  constructor(public readonly path: string) {
    super(`page number of \`${path}\` is out of range`, 'INVALID_PAGE', { details: { path } });
    this.name = 'InvalidPageError';
  }
}

export class UnexpectedFileError extends PackagingError {
  constructor(public readonly file: string, public readonly type: PackageType) {
    super(`unexpected file \`${file}\` in ${type} package`, 'UNEXPECTED_FILE', {
      details: { file, type },
    });
    this.name = 'UnexpectedFileError';
  }
}

export class WalkError extends PackagingError {
  constructor(public readonly root: string, cause: unknown) {
    super(`failed to list files under \`${root}\``, 'WALK', { cause, details: { root } });
    this.name = 'WalkError';
  }
}

export class FileReadError extends PackagingError {
  constructor(public readonly path: string, cause: unknown) {
    super(`I/O error reading \`${path}\``, 'FILE_READ', { cause, details: { path } });
    this.name = 'FileReadError';
  }
}

export class PackageSaveError extends PackagingError {
  constructor(public readonly path: string, cause: unknown) {
    super(`failed to save package \`${path}\``, 'PACKAGE_SAVE', { cause, details: { path } });
    this.name = 'PackageSaveError';
  }
}
