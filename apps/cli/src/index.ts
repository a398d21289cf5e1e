#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for blobpack package files.
 */

import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { packageCommand } from './commands/package.js';
import { verifyCommand } from './commands/verify.js';
import { inspectCommand } from './commands/inspect.js';

const program = new Command();

program
  .name('blobpack')
  .description('Build, verify and inspect content-addressed package files')
  .version('0.1.0');

program
  .command('package')
  .description('Package a directory containing metadata.yaml')
  .requiredOption('-r, --root <dir>', 'Directory to package')
  .requiredOption('-o, --output <file>', 'Package file to write')
  .action(packageCommand);

program
  .command('verify <file>')
  .description('Load a package and check its integrity')
  .action(verifyCommand);

program
  .command('inspect <file>')
  .description('Show the manifest and index of a package')
  .option('--json', 'Print the manifest as JSON')
  .action(inspectCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('blobpack --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
await program.parseAsync();
