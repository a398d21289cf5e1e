/**
 * File Operations
 *
 * Thin helpers over node:fs used by the packager.
 */

import { stat } from 'node:fs/promises';
import { createReadStream } from 'node:fs';
import { Hasher, type Hash } from '@blobpack/core';

/**
 * Stream a file through BLAKE3
 */
export async function calculateFileHash(filePath: string): Promise<Hash> {
  return new Promise((resolve, reject) => {
    const hasher = new Hasher();
    const stream = createReadStream(filePath);

    stream.on('data', (data) => hasher.update(typeof data === 'string' ? Buffer.from(data) : data));
    stream.on('end', () => resolve(hasher.finalize()));
    stream.on('error', reject);
  });
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Check whether a path exists, without throwing
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Check whether a path is an existing directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
