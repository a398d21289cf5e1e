import { encode } from 'cborg';
import { describe, expect, it } from 'vitest';
import {
  decodeManifest,
  encodeManifest,
  Hash,
  ManifestDecodeError,
  ManifestExtraFilesError,
  ManifestMissingFilesError,
  manifestHashes,
  manifestToJson,
  verifyManifest,
  type Manifest,
} from '../src/index.js';

const encoder = new TextEncoder();

const a = Hash.digest(encoder.encode('a'));
const b = Hash.digest(encoder.encode('b'));

describe('manifest encoding', () => {
  it('round-trips an app manifest', () => {
    const manifest: Manifest = {
      type: 'app',
      handles: 'comic',
      paths: new Map([
        ['index.html', a],
        ['index.js', b],
      ]),
    };

    expect(decodeManifest(encodeManifest(manifest))).toEqual(manifest);
  });

  it('round-trips a comic manifest, keeping page order', () => {
    const manifest: Manifest = { type: 'comic', pages: [b, a, b] };

    const decoded = decodeManifest(encodeManifest(manifest));

    expect(decoded.type).toBe('comic');
    expect(manifestHashes(decoded).map((hash) => hash.hex)).toEqual([b.hex, a.hex, b.hex]);
  });

  it('encodes equal app manifests identically whatever the insertion order', () => {
    const forward = encodeManifest({
      type: 'app',
      handles: 'app',
      paths: new Map([
        ['a.css', a],
        ['b.css', b],
      ]),
    });
    const backward = encodeManifest({
      type: 'app',
      handles: 'app',
      paths: new Map([
        ['b.css', b],
        ['a.css', a],
      ]),
    });

    expect(backward).toEqual(forward);
  });

  it('rejects bytes that are not CBOR', () => {
    expect(() => decodeManifest(new Uint8Array(0))).toThrow(ManifestDecodeError);
    expect(() => decodeManifest(new Uint8Array([0xff, 0xff]))).toThrow(ManifestDecodeError);
  });

  it('rejects an unknown manifest type', () => {
    expect(() => decodeManifest(encode({ type: 'movie', frames: [] }))).toThrow(
      ManifestDecodeError
    );
  });

  it('rejects hashes of the wrong length', () => {
    expect(() => decodeManifest(encode({ type: 'comic', pages: [new Uint8Array(31)] }))).toThrow(
      /hash must be 32 bytes/
    );
  });

  it('rejects unexpected fields', () => {
    expect(() => decodeManifest(encode({ type: 'comic', pages: [], title: 'x' }))).toThrow(
      ManifestDecodeError
    );
  });

  it('rejects duplicate app paths', () => {
    const bytes = encode({
      type: 'app',
      handles: 'comic',
      paths: [
        ['index.html', a.toBytes()],
        ['index.html', b.toBytes()],
      ],
    });

    expect(() => decodeManifest(bytes)).toThrow(/duplicate path index.html/);
  });
});

describe('manifestToJson', () => {
  it('tags comics and lists page hashes', () => {
    expect(JSON.stringify(manifestToJson({ type: 'comic', pages: [a] }))).toBe(
      `{"type":"comic","pages":["${a.hex}"]}`
    );
  });

  it('renders app paths as an object', () => {
    expect(
      manifestToJson({ type: 'app', handles: 'comic', paths: new Map([['index.html', a]]) })
    ).toEqual({ type: 'app', handles: 'comic', paths: { 'index.html': a.hex } });
  });
});

describe('verifyManifest', () => {
  const manifest: Manifest = { type: 'comic', pages: [a, b, a] };
  const manifestBytes = encodeManifest(manifest);
  const manifestHash = Hash.digest(manifestBytes);

  it('accepts exactly the referenced blobs plus the manifest', () => {
    const files = new Map([
      [a.hex, encoder.encode('a')],
      [b.hex, encoder.encode('b')],
      [manifestHash.hex, manifestBytes],
    ]);

    expect(() => verifyManifest(manifest, manifestHash, files)).not.toThrow();
  });

  it('counts unreferenced blobs', () => {
    const stray = Hash.digest(encoder.encode('stray'));
    const files = new Map([
      [a.hex, encoder.encode('a')],
      [b.hex, encoder.encode('b')],
      [stray.hex, encoder.encode('stray')],
      [manifestHash.hex, manifestBytes],
    ]);

    expect(() => verifyManifest(manifest, manifestHash, files)).toThrow(ManifestExtraFilesError);
    try {
      verifyManifest(manifest, manifestHash, files);
    } catch (error) {
      expect(error instanceof ManifestExtraFilesError && error.extra).toBe(1);
    }
  });

  it('counts distinct missing blobs', () => {
    const files = new Map([[manifestHash.hex, manifestBytes]]);

    try {
      verifyManifest(manifest, manifestHash, files);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestMissingFilesError);
      expect(error instanceof ManifestMissingFilesError && error.missing).toBe(2);
    }
  });
});
