/**
 * Package Command
 *
 * Build a package file from a directory.
 */

import ora from 'ora';
import chalk from 'chalk';
import { Packager } from '@blobpack/packaging';
import { describeError, printError, printKeyValue, printSuccess } from '../lib/output.js';

export interface PackageCommandOptions {
  root: string;
  output: string;
}

export async function packageCommand(options: PackageCommandOptions): Promise<void> {
  const spinner = ora(`Packaging ${options.root}...`).start();

  try {
    const result = await new Packager().package(options);
    spinner.stop();
    printSuccess(`Saved ${chalk.cyan(result.output)}`);

    printKeyValue('Type', result.manifest.type);
    printKeyValue('Files', result.files);
  } catch (error) {
    spinner.fail('Packaging failed');
    printError(describeError(error));
    process.exit(1);
  }
}
