/**
 * Verify Command
 *
 * Load a package file and check every invariant.
 */

import ora from 'ora';
import chalk from 'chalk';
import { Package } from '@blobpack/container';
import { describeError, printError, printKeyValue, printSuccess } from '../lib/output.js';

export async function verifyCommand(file: string): Promise<void> {
  const spinner = ora(`Verifying ${file}...`).start();

  try {
    const pkg = await Package.load(file);
    spinner.stop();
    printSuccess(`${chalk.cyan(file)} is valid`);

    printKeyValue('Type', pkg.type);
    printKeyValue('Blobs', pkg.size);
  } catch (error) {
    spinner.fail('Verification failed');
    printError(describeError(error));
    process.exit(1);
  }
}
