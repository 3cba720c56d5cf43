#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for chaptercut.
 */

import './env.js';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { errorMessage, logger } from '@chaptercut/utils';
import { loadConfig, type AppConfig } from './config/index.js';

// Commands
import { chaptersCommand } from './commands/chapters.js';
import { extractCommand } from './commands/extract.js';
import { downloadCommand } from './commands/download.js';
import { parseCommand } from './commands/parse.js';
import { cleanupCommand } from './commands/cleanup.js';

function parseChapterNumber(value: string): number {
  const number = Number(value);
  if (!Number.isInteger(number) || number < 1) {
    throw new InvalidArgumentError('Chapter must be a positive whole number.');
  }
  return number;
}

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error(chalk.red('Invalid environment configuration:'), errorMessage(error));
  process.exit(1);
}

const program = new Command();

program
  .name('chaptercut')
  .description('Split videos into their description chapters')
  .version('1.0.0');

// ============================================
// VIDEO COMMANDS
// ============================================

program
  .command('chapters <url>')
  .description('List the chapters in a video description')
  .option('--json', 'Output in JSON format')
  .action((url: string, options: { json?: boolean }) => chaptersCommand(config, url, options));

program
  .command('extract <url>')
  .description('Extract chapters into separate video files')
  .option('--first', 'Extract the first chapter (default)')
  .option('--all', 'Extract every chapter')
  .option('-c, --chapter <n>', 'Extract chapter number n', parseChapterNumber)
  .option('-o, --output <dir>', 'Output directory')
  .action((url: string, options: { first?: boolean; all?: boolean; chapter?: number; output?: string }) =>
    extractCommand(config, url, options)
  );

program
  .command('download <url>')
  .description('Download the whole video (for videos without chapters)')
  .option('-o, --output <dir>', 'Output directory')
  .action((url: string, options: { output?: string }) => downloadCommand(config, url, options));

// ============================================
// OFFLINE COMMANDS
// ============================================

program
  .command('parse [file]')
  .description('Find chapters in a text file (or stdin)')
  .option('--json', 'Output in JSON format')
  .action((file: string | undefined, options: { json?: boolean }) => parseCommand(config, file, options));

program
  .command('cleanup')
  .description('Remove stale session workspaces')
  .action(() => cleanupCommand(config));

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('chaptercut --help'), 'for available commands');
  }
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  process.exit(err.exitCode);
});

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, 'Command failed');
  console.error(chalk.red('✗'), errorMessage(error));
  process.exit(1);
});
