/**
 * Health Routes
 */

import type { FastifyPluginAsync } from 'fastify';
import type { PackageType } from '@blobpack/core';

export interface HealthRoutesOptions {
  app: PackageType;
  content: PackageType;
}

interface HealthStatus {
  status: 'ok';
  app: PackageType;
  content: PackageType;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, { app, content }) => {
  // Liveness probe; packages are loaded before the server starts
  fastify.get('/', async (): Promise<HealthStatus> => ({
    status: 'ok',
    app,
    content,
  }));
};
