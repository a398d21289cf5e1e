/**
 * Fastify Server Factory
 *
 * Serves an app package and the content package it handles.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import { APP_INDEX, manifestToJson, NotFoundError } from '@blobpack/core';
import type { Package } from '@blobpack/container';

import { errorHandler } from './plugins/errorHandler.js';

// Routes
import { healthRoutes } from './routes/health.js';
import { packageRoutes, sendResource } from './routes/package.js';

export interface ServerOptions {
  /** App package, served under `/` and `/app/`. */
  app: Package;
  /** Content package, served under `/content/`. */
  content: Package;
  logger?: FastifyBaseLogger;
}

export async function createServer({ app, content, logger }: ServerOptions): Promise<FastifyInstance> {
  const server = Fastify({
    loggerInstance: logger,
    requestTimeout: 30000,
  });

  await server.register(errorHandler);

  server.get('/', async (_request, reply) => {
    const index = app.file(APP_INDEX);
    if (!index) {
      throw new NotFoundError('/');
    }
    return sendResource(reply, index);
  });

  server.get('/api/manifest', async () => manifestToJson(content.manifest));

  await server.register(healthRoutes, { prefix: '/health', app: app.type, content: content.type });
  await server.register(packageRoutes, { prefix: '/app', pkg: app });
  await server.register(packageRoutes, { prefix: '/content', pkg: content });

  return server;
}
