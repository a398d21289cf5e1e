/**
 * Package Routes
 *
 * Serves the blobs of one package by logical path.
 */

import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { NotFoundError } from '@blobpack/core';
import type { Package, Resource } from '@blobpack/container';

export interface PackageRoutesOptions {
  pkg: Package;
}

export function sendResource(reply: FastifyReply, resource: Resource): FastifyReply {
  const { content } = resource;
  return reply
    .type(resource.contentType)
    .send(Buffer.from(content.buffer, content.byteOffset, content.byteLength));
}

export const packageRoutes: FastifyPluginAsync<PackageRoutesOptions> = async (fastify, { pkg }) => {
  fastify.get<{ Params: { '*': string } }>('/*', async (request, reply) => {
    const path = request.params['*'];
    const resource = pkg.file(path);
    if (!resource) {
      throw new NotFoundError(`${fastify.prefix}/${path}`);
    }
    return sendResource(reply, resource);
  });
};
