/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { TimeCode, type ChapterList } from '@chaptercut/core';
import { formatMegabytes } from '@chaptercut/utils';
import type { BatchSummary, PipelineProgress } from '@chaptercut/pipeline';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function printChapters(chapters: ChapterList): void {
  const width = String(chapters.length).length;
  chapters.forEach((chapter, index) => {
    const number = String(index + 1).padStart(width, ' ');
    console.log(`  ${chalk.cyan(number + '.')} ${chalk.yellow(chapter.timecode.text.padEnd(8))} ${chapter.title}`);
  });
}

/**
 * JSON-friendly view of a chapter list
 */
export function chaptersToJson(chapters: ChapterList): Array<{ number: number; time: string; seconds: number; title: string }> {
  return chapters.map((chapter, index) => ({
    number: index + 1,
    time: chapter.timecode.text,
    seconds: chapter.timecode.toSeconds(),
    title: chapter.title,
  }));
}

export function formatProgress(progress: PipelineProgress): string {
  return `Step ${progress.step}/${progress.totalSteps} (${progress.percent.toFixed(0)}%): ${progress.message}`;
}

export function printBatchSummary(summary: BatchSummary): void {
  for (const outcome of summary.outcomes) {
    if (outcome.status === 'extracted') {
      printSuccess(
        `${outcome.title} ${chalk.gray(`(${TimeCode.format(outcome.range.startSeconds)} - ${TimeCode.format(outcome.range.endSeconds)}, ${formatMegabytes(outcome.sizeBytes)})`)}`
      );
      console.log(`    ${chalk.gray(outcome.outputPath)}`);
    } else {
      printError(`${outcome.title}: ${outcome.error.message}`);
    }
  }

  console.log();
  if (summary.extracted > 0) {
    printSuccess(`${summary.extracted} chapter(s) extracted to ${summary.outputDir}`);
  } else {
    printError('No chapters were extracted successfully');
  }
  if (summary.failed > 0) {
    printWarning(`${summary.failed} chapter(s) failed`);
  }
}
