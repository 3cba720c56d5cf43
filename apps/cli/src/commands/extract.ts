/**
 * Extract Command
 * 
 * Cut one, several or all chapters of a video into separate files.
 */

import ora from 'ora';
import chalk from 'chalk';
import { ValidationError, type ChapterSelection } from '@chaptercut/core';
import type { AppConfig } from '../config/index.js';
import { withSession } from '../lib/session.js';
import {
  formatProgress,
  printBatchSummary,
  printError,
  printHeader,
  printKeyValue,
} from '../lib/output.js';

export interface ExtractOptions {
  first?: boolean;
  all?: boolean;
  /** 1-based */
  chapter?: number;
  output?: string;
}

/**
 * At most one of `--first`, `--all` and `--chapter`; the default is the
 * first chapter
 */
export function toSelection(options: ExtractOptions): ChapterSelection {
  const requested = [options.first, options.all, options.chapter !== undefined].filter(Boolean);
  if (requested.length > 1) {
    throw new ValidationError('selection', 'use only one of --first, --all and --chapter');
  }
  if (options.chapter !== undefined) {
    return { kind: 'index', index: options.chapter - 1 };
  }
  if (options.all) {
    return { kind: 'all' };
  }
  return { kind: 'first' };
}

export async function extractCommand(
  config: AppConfig,
  url: string,
  options: ExtractOptions
): Promise<void> {
  const selection = toSelection(options);
  const spinner = ora('Fetching video info...').start();

  await withSession(config, options.output, async ({ orchestrator }) => {
    const analysis = await orchestrator.analyze(url);
    if (!analysis.ok) {
      spinner.fail(analysis.error.message);
      process.exitCode = 1;
      return;
    }

    const { metadata, chapters } = analysis;
    if (chapters.length === 0) {
      spinner.stop();
      printError('No chapters found in the description');
      console.log('Run', chalk.cyan(`chaptercut download ${url}`), 'to fetch the whole video');
      process.exitCode = 1;
      return;
    }

    if (selection.kind === 'index' && (selection.index < 0 || selection.index >= chapters.length)) {
      spinner.fail(`Chapter ${selection.index + 1} does not exist (1-${chapters.length})`);
      process.exitCode = 1;
      return;
    }

    spinner.stop();
    printHeader(metadata.title);
    printKeyValue('Chapters', chapters.length);
    printKeyValue(
      'Selected',
      selection.kind === 'all' ? 'all' : `#${selection.kind === 'index' ? selection.index + 1 : 1}`
    );
    console.log();

    spinner.start('Starting extraction...');
    const summary = await orchestrator.extract(selection, {
      onProgress: (progress) => {
        spinner.text = formatProgress(progress);
      },
    });
    spinner.stop();

    printBatchSummary(summary);
    if (summary.extracted === 0) {
      process.exitCode = 1;
    }
  });
}
