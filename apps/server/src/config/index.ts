/**
 * Server Configuration
 *
 * All configuration loaded from environment variables.
 * Package paths are required; everything else has a development default.
 */

import { existsSync, readFileSync } from 'fs';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const workspaceManifestSchema = z.object({ workspaces: z.array(z.string()) });

// Nearest directory whose package.json declares workspaces
function findWorkspaceRoot(start: string): string {
  let dir = start;
  for (;;) {
    const manifest = resolve(dir, 'package.json');
    if (existsSync(manifest) &&
        workspaceManifestSchema.safeParse(JSON.parse(readFileSync(manifest, 'utf8'))).success) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return start;
    }
    dir = parent;
  }
}

export const workspaceRoot = findWorkspaceRoot(dirname(fileURLToPath(import.meta.url)));

// Load .env from workspace root
dotenvConfig({ path: resolve(workspaceRoot, '.env') });

// Relative package paths are taken from the workspace root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(workspaceRoot, p);
  }
  return p;
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.string().regex(/^\d+$/, 'must be a port number').transform(Number).default('8000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Packages
  APP_PACKAGE: z.string().min(1, 'path of the app package is required'),
  CONTENT_PACKAGE: z.string().min(1, 'path of the content package is required'),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

export const config = {
  nodeEnv: env.NODE_ENV,
  host: env.HOST,
  port: env.PORT,
  logLevel: env.LOG_LEVEL,

  appPackage: resolvePath(env.APP_PACKAGE),
  contentPackage: resolvePath(env.CONTENT_PACKAGE),
} as const;

export type Config = typeof config;
