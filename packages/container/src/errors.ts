/**
 * Package Container Errors
 *
 * One class per way a package can fail to save or load. Each carries the
 * values needed to diagnose the failure without re-reading the file.
 */

import { BlobpackError, type BlobpackErrorOptions, type Hash } from '@blobpack/core';

/**
 * Base class for container errors
 */
export class PackageError extends BlobpackError {
  constructor(message: string, code: string, options: BlobpackErrorOptions = {}) {
    super(message, code, options);
    this.name = 'PackageError';
  }
}

export class MagicBytesError extends PackageError {
  public readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    const hex = Buffer.from(bytes).toString('hex');
    const text = Buffer.from(bytes).toString('utf8');
    super(
      `unexpected package magic bytes ${hex} ("${text}")`,
      'MAGIC_BYTES',
      { details: { bytes: hex } }
    );
    this.name = 'MagicBytesError';
    this.bytes = bytes;
  }
}

export class ManifestIndexRangeError extends PackageError {
  public readonly index: bigint;

  constructor(index: bigint) {
    super(
      `could not convert manifest index ${index} to an array index`,
      'MANIFEST_INDEX_RANGE',
      { details: { index: index.toString() } }
    );
    this.name = 'ManifestIndexRangeError';
    this.index = index;
  }
}

export class ManifestIndexOutOfBoundsError extends PackageError {
  public readonly index: number;

  constructor(index: number, count: number) {
    super(
      `manifest index ${index} out of bounds of hash array`,
      'MANIFEST_INDEX_OUT_OF_BOUNDS',
      { details: { index, count } }
    );
    this.name = 'ManifestIndexOutOfBoundsError';
    this.index = index;
  }
}

export class FileHashOrderError extends PackageError {
  public readonly hash: Hash;

  constructor(hash: Hash) {
    super(`package file hash \`${hash.hex}\` out of order`, 'FILE_HASH_ORDER', {
      details: { hash: hash.hex },
    });
    this.name = 'FileHashOrderError';
    this.hash = hash;
  }
}

export class FileHashDuplicatedError extends PackageError {
  public readonly hash: Hash;

  constructor(hash: Hash) {
    super(`package file hash \`${hash.hex}\` duplicated`, 'FILE_HASH_DUPLICATED', {
      details: { hash: hash.hex },
    });
    this.name = 'FileHashDuplicatedError';
    this.hash = hash;
  }
}

export class FileLengthRangeError extends PackageError {
  public readonly length: bigint;

  constructor(length: bigint) {
    super(
      `package file length \`${length}\` exceeds the maximum buffer size`,
      'FILE_LENGTH_RANGE',
      { details: { length: length.toString() } }
    );
    this.name = 'FileLengthRangeError';
    this.length = length;
  }
}

export class FileHashInvalidError extends PackageError {
  public readonly expected: Hash;
  public readonly actual: Hash;

  constructor(expected: Hash, actual: Hash) {
    super(
      `package file hash actually \`${actual.hex}\` but expected \`${expected.hex}\``,
      'FILE_HASH_INVALID',
      { details: { expected: expected.hex, actual: actual.hex } }
    );
    this.name = 'FileHashInvalidError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * The file ended inside a header field or a declared blob
 */
export class UnexpectedEofError extends PackageError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      `unexpected end of package: needed ${expected} bytes, found ${actual}`,
      'UNEXPECTED_EOF',
      { details: { expected, actual } }
    );
    this.name = 'UnexpectedEofError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class TrailingBytesError extends PackageError {
  public readonly trailing: number;

  constructor(trailing: number) {
    super(`package has trailing ${trailing} bytes`, 'TRAILING_BYTES', {
      details: { trailing },
    });
    this.name = 'TrailingBytesError';
    this.trailing = trailing;
  }
}

export class DeserializeManifestError extends PackageError {
  constructor(cause: unknown) {
    super('failed to deserialize manifest', 'DESERIALIZE_MANIFEST', { cause });
    this.name = 'DeserializeManifestError';
  }
}

/**
 * A source file could not be opened for reading
 */
export class FileIoError extends PackageError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`I/O error reading file \`${path}\``, 'FILE_IO', { cause, details: { path } });
    this.name = 'FileIoError';
    this.path = path;
  }
}

/**
 * A source file failed while being copied into the package
 */
export class IoCopyError extends PackageError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`I/O error copying from \`${path}\``, 'IO_COPY', { cause, details: { path } });
    this.name = 'IoCopyError';
    this.path = path;
  }
}

export class PackageIoError extends PackageError {
  constructor(message: string, cause: unknown) {
    super(message, 'IO', { cause });
    this.name = 'PackageIoError';
  }
}
