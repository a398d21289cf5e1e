/**
 * Inspect Command
 *
 * Show the manifest and index of a package file.
 */

import ora from 'ora';
import { manifestToJson } from '@blobpack/core';
import { Package } from '@blobpack/container';
import {
  describeError,
  formatBytes,
  printError,
  printHeader,
  printJson,
  printKeyValue,
  printTable,
} from '../lib/output.js';

export interface InspectCommandOptions {
  json?: boolean;
}

export function entryRows(pkg: Package): Record<string, string>[] {
  return pkg.entries().map(({ hash, length }) => ({
    hash: hash.hex,
    length: formatBytes(length),
    role: hash.equals(pkg.manifestHash) ? 'manifest' : 'blob',
  }));
}

export async function inspectCommand(file: string, options: InspectCommandOptions): Promise<void> {
  const spinner = ora(`Loading ${file}...`).start();

  let pkg: Package;
  try {
    pkg = await Package.load(file);
    spinner.stop();
  } catch (error) {
    spinner.fail('Failed to load package');
    printError(describeError(error));
    process.exit(1);
  }

  if (options.json) {
    printJson(manifestToJson(pkg.manifest));
    return;
  }

  printHeader(`Package: ${file}`);
  printKeyValue('Type', pkg.type);
  if (pkg.manifest.type === 'app') {
    printKeyValue('Handles', pkg.manifest.handles);
    printKeyValue('Paths', pkg.manifest.paths.size);
  } else {
    printKeyValue('Pages', pkg.manifest.pages.length);
  }
  printKeyValue('Manifest', pkg.manifestHash.hex);

  console.log();
  printTable(entryRows(pkg));
}
