/**
 * Chapter Extraction Engine
 * 
 * Turns free-form description text into a ChapterList.
 * 
 * Each line goes through the passes in order and the first pass that
 * yields anything wins, so a line the strict pass accepts is never
 * rescanned by the fallback pass. Results are then deduplicated, sorted
 * and capped.
 */

import { logger } from '@chaptercut/utils';
import type { ChapterList, ChapterMarker } from '../types/chapter.js';
import { matchStrict } from './strictPass.js';
import { scanFallback } from './fallbackPass.js';
import { chapterIdentity } from './identity.js';

// Shortest line that can hold `M:SS` plus a title
const MIN_LINE_LENGTH = 4;

export type LinePass = (line: string) => ChapterMarker[];

export const LINE_PASSES: readonly LinePass[] = [
  (line) => {
    const marker = matchStrict(line);
    return marker ? [marker] : [];
  },
  scanFallback,
];

export interface ExtractOptions {
  /** Keep at most this many chapters (after sorting) */
  maxChapters?: number;
  /** Only the first N lines are considered */
  maxLines?: number;
  /** Longer descriptions are not parsed at all */
  maxDescriptionLength?: number;
}

/**
 * Markers found on a single line
 */
export function extractLine(rawLine: string): ChapterMarker[] {
  const line = rawLine.trim();
  if (line.length < MIN_LINE_LENGTH) {
    return [];
  }

  for (const pass of LINE_PASSES) {
    const markers = pass(line);
    if (markers.length > 0) {
      return markers;
    }
  }
  return [];
}

/**
 * Drop later markers whose identity was already seen
 */
export function dedupeChapters(markers: readonly ChapterMarker[]): ChapterMarker[] {
  const seen = new Set<string>();
  const unique: ChapterMarker[] = [];

  for (const marker of markers) {
    const key = chapterIdentity(marker);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(marker);
    }
  }
  return unique;
}

export function extractChapters(
  description: string | null | undefined,
  options: ExtractOptions = {}
): ChapterList {
  if (!description) {
    return [];
  }

  const { maxChapters, maxLines, maxDescriptionLength } = options;

  if (maxDescriptionLength !== undefined && description.length > maxDescriptionLength) {
    logger.debug(
      { length: description.length, maxDescriptionLength },
      'Description too long, skipping chapter extraction'
    );
    return [];
  }

  let lines = description.split(/\r?\n/);
  if (maxLines !== undefined) {
    lines = lines.slice(0, maxLines);
  }

  const found = lines.flatMap(extractLine);
  const chapters = dedupeChapters(found).sort(
    (a, b) => a.timecode.toSeconds() - b.timecode.toSeconds()
  );

  return maxChapters !== undefined ? chapters.slice(0, maxChapters) : chapters;
}
