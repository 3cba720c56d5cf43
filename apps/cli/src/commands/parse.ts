/**
 * Parse Command
 * 
 * Run chapter extraction on local text: a file, or stdin when no file
 * is given. Nothing is fetched.
 */

import { readFile } from 'node:fs/promises';
import { extractChapters } from '@chaptercut/core';
import type { AppConfig } from '../config/index.js';
import { chaptersToJson, printChapters, printJson, printWarning } from '../lib/output.js';

interface ParseOptions {
  json?: boolean;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export async function parseCommand(
  config: AppConfig,
  file: string | undefined,
  options: ParseOptions
): Promise<void> {
  const text = file ? await readFile(file, 'utf-8') : await readStdin();

  const chapters = extractChapters(text, {
    maxChapters: config.limits.maxChapters,
    maxLines: config.limits.maxLines,
    maxDescriptionLength: config.limits.maxDescriptionLength,
  });

  if (options.json) {
    printJson(chaptersToJson(chapters));
    return;
  }

  if (chapters.length === 0) {
    printWarning('No chapters found');
    return;
  }
  printChapters(chapters);
}
