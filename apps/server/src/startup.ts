/**
 * Startup
 *
 * Loads the app and content packages and checks that they belong together.
 */

import { BlobpackError, type PackageType } from '@blobpack/core';
import { Package } from '@blobpack/container';

export class ServerStartupError extends BlobpackError {
  constructor(message: string, code: string, details: Record<string, unknown>, cause?: unknown) {
    super(message, code, { details, cause });
    this.name = 'ServerStartupError';
  }
}

export class PackageLoadError extends ServerStartupError {
  constructor(public readonly path: string, cause: unknown) {
    super(`failed to load package \`${path}\``, 'PACKAGE_LOAD', { path }, cause);
    this.name = 'PackageLoadError';
  }
}

export class AppTypeError extends ServerStartupError {
  constructor(public readonly type: PackageType) {
    super(`app package has type \`${type}\`, expected \`app\``, 'APP_TYPE', { type });
    this.name = 'AppTypeError';
  }
}

export class ContentTypeMismatchError extends ServerStartupError {
  constructor(public readonly content: PackageType, public readonly handles: PackageType) {
    super(
      `content package has type \`${content}\` but app handles \`${handles}\``,
      'CONTENT_TYPE_MISMATCH',
      { content, handles }
    );
    this.name = 'ContentTypeMismatchError';
  }
}

export interface LoadedPackages {
  app: Package;
  content: Package;
}

async function load(path: string): Promise<Package> {
  try {
    return await Package.load(path);
  } catch (error) {
    throw new PackageLoadError(path, error);
  }
}

export async function loadPackages(appPath: string, contentPath: string): Promise<LoadedPackages> {
  const app = await load(appPath);
  if (app.manifest.type !== 'app') {
    throw new AppTypeError(app.manifest.type);
  }

  const content = await load(contentPath);
  if (content.type !== app.manifest.handles) {
    throw new ContentTypeMismatchError(content.type, app.manifest.handles);
  }

  return { app, content };
}
