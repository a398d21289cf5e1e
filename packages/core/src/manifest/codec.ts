/**
 * Canonical Manifest Encoding
 *
 * CBOR with canonically sorted map keys. App paths are written as a list of
 * [path, hash] pairs sorted by path, so equal manifests always encode to
 * identical bytes.
 */

import { decode, encode } from 'cborg';
import { z } from 'zod';
import { Hash } from '../hash.js';
import { ManifestDecodeError } from '../errors/index.js';
import { PACKAGE_TYPES, sortedPaths, type Manifest } from './types.js';

const hashSchema = z
  .instanceof(Uint8Array)
  .refine((bytes) => bytes.length === Hash.LENGTH, {
    message: `hash must be ${Hash.LENGTH} bytes`,
  })
  .transform((bytes) => Hash.fromBytes(bytes));

const encodedManifestSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('app'),
    handles: z.enum(PACKAGE_TYPES),
    paths: z.array(z.tuple([z.string(), hashSchema])),
  }).strict(),
  z.object({
    type: z.literal('comic'),
    pages: z.array(hashSchema),
  }).strict(),
]);

export function encodeManifest(manifest: Manifest): Uint8Array {
  switch (manifest.type) {
    case 'app':
      return encode({
        type: 'app',
        handles: manifest.handles,
        paths: sortedPaths(manifest.paths).map(([path, hash]) => [path, hash.toBytes()]),
      });
    case 'comic':
      return encode({
        type: 'comic',
        pages: manifest.pages.map((hash) => hash.toBytes()),
      });
  }
}

export function decodeManifest(bytes: Uint8Array): Manifest {
  let raw: unknown;
  try {
    raw = decode(bytes, { rejectDuplicateMapKeys: true });
  } catch (error) {
    throw new ManifestDecodeError(
      error instanceof Error ? error.message : 'invalid CBOR',
      error
    );
  }

  const parsed = encodedManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const reason = issue
      ? `${issue.path.join('.') || '<root>'}: ${issue.message}`
      : 'unexpected shape';
    throw new ManifestDecodeError(reason, parsed.error);
  }

  const manifest = parsed.data;
  switch (manifest.type) {
    case 'app': {
      const paths = new Map<string, Hash>();
      for (const [path, hash] of manifest.paths) {
        if (paths.has(path)) {
          throw new ManifestDecodeError(`duplicate path ${path}`);
        }
        paths.set(path, hash);
      }
      return { type: 'app', handles: manifest.handles, paths };
    }
    case 'comic':
      return { type: 'comic', pages: manifest.pages };
  }
}
