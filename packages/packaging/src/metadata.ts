/**
 * Package Metadata
 *
 * `metadata.yaml` at the root of a package directory declares what kind of
 * package the directory becomes:
 *
 *   type: app
 *   handles: comic
 *
 * or
 *
 *   type: comic
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { PACKAGE_TYPES } from '@blobpack/core';
import { FileReadError, MetadataInvalidError } from './errors.js';

export const METADATA_PATH = 'metadata.yaml';

const metadataSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('app'),
    handles: z.enum(PACKAGE_TYPES),
  }),
  z.object({
    type: z.literal('comic'),
  }),
]);

export type Metadata = z.infer<typeof metadataSchema>;

export async function loadMetadata(path: string): Promise<Metadata> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new FileReadError(path, error);
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new MetadataInvalidError(path, error instanceof Error ? error.message : 'invalid YAML', error);
  }

  const parsed = metadataSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join(', ');
    throw new MetadataInvalidError(path, reason, parsed.error);
  }

  return parsed.data;
}
