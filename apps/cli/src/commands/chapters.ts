/**
 * Chapters Command
 * 
 * List the chapters found in a video's description.
 */

import ora from 'ora';
import chalk from 'chalk';
import { TimeCode } from '@chaptercut/core';
import type { AppConfig } from '../config/index.js';
import { withSession } from '../lib/session.js';
import {
  chaptersToJson,
  printChapters,
  printError,
  printHeader,
  printJson,
  printKeyValue,
  printWarning,
} from '../lib/output.js';

interface ChaptersOptions {
  json?: boolean;
}

export async function chaptersCommand(
  config: AppConfig,
  url: string,
  options: ChaptersOptions
): Promise<void> {
  const spinner = options.json ? null : ora('Fetching video info...').start();

  const result = await withSession(config, undefined, ({ orchestrator }) => orchestrator.analyze(url));
  spinner?.stop();

  if (!result.ok) {
    if (options.json) {
      printJson({ ok: false, code: result.error.code, error: result.error.message });
    } else {
      printError(result.error.message);
    }
    process.exitCode = 1;
    return;
  }

  const { metadata, chapters } = result;

  if (options.json) {
    printJson({
      ok: true,
      title: metadata.title,
      durationSeconds: metadata.durationSeconds,
      chapters: chaptersToJson(chapters),
    });
    return;
  }

  printHeader(metadata.title);
  printKeyValue('Duration', TimeCode.format(metadata.durationSeconds));
  printKeyValue('Chapters', chapters.length);
  console.log();

  if (chapters.length === 0) {
    printWarning('No chapters found in the description');
    console.log('Run', chalk.cyan(`chaptercut download ${url}`), 'to fetch the whole video');
    return;
  }

  printChapters(chapters);
}
