import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { encodeManifest, Hash, type Manifest } from '@blobpack/core';
import { Package } from '@blobpack/container';
import { createServer } from '../src/server.js';

const encoder = new TextEncoder();

function packageOf(manifest: Manifest, blobs: Uint8Array[]): Package {
  const manifestBytes = encodeManifest(manifest);
  const manifestHash = Hash.digest(manifestBytes);
  const files = new Map<string, Uint8Array>([[manifestHash.hex, manifestBytes]]);
  for (const blob of blobs) {
    files.set(Hash.digest(blob).hex, blob);
  }
  return new Package({ files, manifest, manifestHash });
}

describe('createServer', () => {
  const index = encoder.encode('<html></html>');
  const script = encoder.encode('console.log(1)');
  const first = encoder.encode('page one');
  const second = encoder.encode('page two');

  const app = packageOf(
    {
      type: 'app',
      handles: 'comic',
      paths: new Map([
        ['index.html', Hash.digest(index)],
        ['js/main.js', Hash.digest(script)],
      ]),
    },
    [index, script]
  );
  const content = packageOf(
    { type: 'comic', pages: [Hash.digest(first), Hash.digest(second)] },
    [first, second]
  );

  let server: FastifyInstance;

  beforeAll(async () => {
    server = await createServer({ app, content });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it('serves the app index at the root', async () => {
    const response = await server.inject({ method: 'GET', url: '/' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toMatch(/^text\/html/);
    expect(response.body).toBe('<html></html>');
  });

  it('serves app files by path', async () => {
    const response = await server.inject({ method: 'GET', url: '/app/js/main.js' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toMatch(/^application\/javascript/);
    expect(response.body).toBe('console.log(1)');
  });

  it('serves comic pages as jpeg', async () => {
    const response = await server.inject({ method: 'GET', url: '/content/1' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('image/jpeg');
    expect(response.body).toBe('page two');
  });

  it('returns the content manifest as JSON', async () => {
    const response = await server.inject({ method: 'GET', url: '/api/manifest' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      type: 'comic',
      pages: [Hash.digest(first).hex, Hash.digest(second).hex],
    });
  });

  it('reports health with both package types', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', app: 'app', content: 'comic' });
  });

  it('returns 404 for a page past the end', async () => {
    const response = await server.inject({ method: 'GET', url: '/content/2' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      statusCode: 404,
      error: 'Not Found',
      message: '/content/2 not found',
      code: 'NOT_FOUND',
    });
  });

  it('returns 404 for an unknown app path', async () => {
    const response = await server.inject({ method: 'GET', url: '/app/missing.css' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      statusCode: 404,
      error: 'Not Found',
      message: '/app/missing.css not found',
      code: 'NOT_FOUND',
    });
  });

  it('returns 404 for unknown routes', async () => {
    const response = await server.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      statusCode: 404,
      error: 'Not Found',
      message: 'Route GET /nope not found',
    });
  });
});
