/**
 * Error Handler Plugin
 *
 * Global error handling for Fastify.
 */

import { STATUS_CODES } from 'node:http';
import type { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { BlobpackError } from '@blobpack/core';

interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
}

function statusText(statusCode: number): string {
  return STATUS_CODES[statusCode] ?? 'Error';
}

const errorHandlerPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.setErrorHandler((error: Error, request: FastifyRequest, reply: FastifyReply) => {
    const { log } = request;

    // Our own errors know their status
    if (error instanceof BlobpackError && error.statusCode < 500) {
      const apiError: ApiError = {
        statusCode: error.statusCode,
        error: statusText(error.statusCode),
        message: error.message,
        code: error.code,
      };

      log.info({ err: error }, 'Request failed');
      return reply.status(error.statusCode).send(apiError);
    }

    // Known HTTP errors raised by Fastify itself
    if ('statusCode' in error && typeof error.statusCode === 'number' &&
        error.statusCode >= 400 && error.statusCode < 500) {
      const apiError: ApiError = {
        statusCode: error.statusCode,
        error: statusText(error.statusCode),
        message: error.message,
      };

      log.warn({ err: error }, 'Client error');
      return reply.status(error.statusCode).send(apiError);
    }

    // Internal server errors
    log.error({ err: error }, 'Internal server error');

    const apiError: ApiError = {
      statusCode: 500,
      error: statusText(500),
      message: process.env['NODE_ENV'] === 'production'
        ? 'An unexpected error occurred'
        : error.message,
    };

    return reply.status(500).send(apiError);
  });

  // Handle 404
  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const apiError: ApiError = {
      statusCode: 404,
      error: statusText(404),
      message: `Route ${request.method} ${request.url} not found`,
    };

    return reply.status(404).send(apiError);
  });
};

export const errorHandler = fp(errorHandlerPlugin, {
  name: 'error-handler',
});
