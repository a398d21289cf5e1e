import { afterEach, describe, expect, it, vi } from 'vitest';
import { encodeManifest, Hash, NotFoundError, type Manifest } from '@blobpack/core';
import { Package } from '@blobpack/container';
import { describeError, formatBytes, printKeyValue, printSuccess } from '../src/lib/output.js';
import { entryRows } from '../src/commands/inspect.js';

describe('print helpers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints success lines to stdout with a check mark', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printSuccess('saved');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0]?.[1]).toBe('saved');
    expect(String(log.mock.calls[0]?.[0])).toContain('✓');
  });

  it('prints key/value pairs on one line', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printKeyValue('Blobs', 3);

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0]?.[0])).toMatch(/Blobs:.* 3$/);
  });
});

describe('describeError', () => {
  it('appends the code of our own errors', () => {
    expect(describeError(new NotFoundError('/x'))).toBe('/x not found [NOT_FOUND]');
  });

  it('follows the cause chain', () => {
    const error = new Error('outer', { cause: new Error('inner') });

    expect(describeError(error)).toBe('outer: inner');
  });

  it('handles values that are not errors', () => {
    expect(describeError('boom')).toBe('Unknown error');
  });
});

describe('formatBytes', () => {
  it('keeps small sizes in bytes', () => {
    expect(formatBytes(0n)).toBe('0 B');
    expect(formatBytes(1023n)).toBe('1023 B');
  });

  it('scales to binary units', () => {
    expect(formatBytes(1536n)).toBe('1.5 KiB');
    expect(formatBytes(1048576n)).toBe('1.0 MiB');
  });
});

describe('entryRows', () => {
  it('lists every blob in index order and marks the manifest', () => {
    const page = new TextEncoder().encode('page');
    const manifest: Manifest = { type: 'comic', pages: [Hash.digest(page)] };
    const manifestBytes = encodeManifest(manifest);
    const manifestHash = Hash.digest(manifestBytes);
    const pkg = new Package({
      files: new Map([
        [manifestHash.hex, manifestBytes],
        [Hash.digest(page).hex, page],
      ]),
      manifest,
      manifestHash,
    });

    const expected = [
      { hash: manifestHash.hex, length: `${manifestBytes.length} B`, role: 'manifest' },
      { hash: Hash.digest(page).hex, length: '4 B', role: 'blob' },
    ].sort((a, b) => (a.hash < b.hash ? -1 : 1));

    expect(entryRows(pkg)).toEqual(expected);
  });
});
