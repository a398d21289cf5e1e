import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Hash } from '@blobpack/core';
import { calculateFileHash, getFileSizeBytes, isDirectory, isWithin, pathExists } from '../src/index.js';

describe('file helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'blobpack-utils-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('hashes a file by streaming it', async () => {
    const path = join(dir, 'data.bin');
    const content = new Uint8Array(200_000).map((_, i) => i % 251);
    await writeFile(path, content);

    expect((await calculateFileHash(path)).hex).toBe(Hash.digest(content).hex);
    expect(await getFileSizeBytes(path)).toBe(200_000);
  });

  it('tells files, directories and missing paths apart', async () => {
    const path = join(dir, 'file.txt');
    await writeFile(path, 'x');

    expect(await pathExists(path)).toBe(true);
    expect(await isDirectory(path)).toBe(false);
    expect(await isDirectory(dir)).toBe(true);
    expect(await pathExists(join(dir, 'missing'))).toBe(false);
    expect(await isDirectory(join(dir, 'missing'))).toBe(false);
  });
});

describe('isWithin', () => {
  it('accepts the parent itself and its descendants', () => {
    expect(isWithin('foo', 'foo')).toBe(true);
    expect(isWithin('foo', 'foo/bar')).toBe(true);
    expect(isWithin('/a/b', '/a/b/c/../d')).toBe(true);
  });

  it('rejects siblings and parents', () => {
    expect(isWithin('foo', 'foobar')).toBe(false);
    expect(isWithin('foo/bar', 'foo')).toBe(false);
    expect(isWithin('/a/b', '/a/b/../c')).toBe(false);
    expect(isWithin('foo', '..foo')).toBe(false);
  });
});
