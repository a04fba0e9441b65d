#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for capture-relay: inspect the album the relay
 * watches and push single files through the configured destinations.
 */

import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { latestCommand } from './commands/latest.js';
import { sinceCommand } from './commands/since.js';
import { sendCommand } from './commands/send.js';
import { configCommand } from './commands/config.js';

type GlobalOptions = {
  debug?: boolean;
};

const program = new Command();

program
  .name('capture-relay')
  .description('Capture album relay CLI')
  .version('1.0.0')
  .option('--debug', 'Enable debug output');

const globals = (): GlobalOptions => program.opts<GlobalOptions>();

// ============================================
// ALBUM COMMANDS
// ============================================

program
  .command('latest')
  .description('Show the newest item in the album')
  .option('-r, --root <dir>', 'Album root (defaults to ALBUM_ROOT)')
  .option('--json', 'Output in JSON format')
  .action((options: { root?: string; json?: boolean }) =>
    latestCommand({ ...globals(), ...options }));

program
  .command('since <path>')
  .description('List items newer than a watermark path')
  .option('-r, --root <dir>', 'Album root (defaults to ALBUM_ROOT)')
  .option('--json', 'Output in JSON format')
  .action((path: string, options: { root?: string; json?: boolean }) =>
    sinceCommand(path, { ...globals(), ...options }));

// ============================================
// UPLOAD COMMANDS
// ============================================

program
  .command('send <file>')
  .description('Upload one file to every enabled destination')
  .action((file: string) => sendCommand(file, globals()));

program
  .command('config')
  .description('Show the effective configuration (secrets masked)')
  .option('--json', 'Output in JSON format')
  .action((options: { json?: boolean }) => configCommand(options));

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('capture-relay --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
await program.parseAsync();
