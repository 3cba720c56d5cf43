/**
 * Fallback Pass
 * 
 * Recovers looser conventions (`Intro - 0:12`, `[1:45] Second part`,
 * several timecodes on one line) by scanning for every timecode-shaped
 * token. Each valid token takes the text after it, up to the next
 * timecode, as its title; when nothing follows, the text before it. A
 * title that then fails cleaning drops the token, it never falls back.
 * 
 * Scan order is left to right. Text before a token is not bounded by an
 * earlier token on the same line, so adjacent timecodes can end up with
 * overlapping titles.
 */

import { TimeCode } from '../timecode.js';
import type { ChapterMarker } from '../types/chapter.js';
import { cleanTitle } from './titleCleaner.js';

const TIMECODE_TOKEN = /\d{1,2}:\d{2}(?::\d{2})?/g;
const TITLE_AFTER = /^[\s\-–—•:[\]()]*(.+?)(?=\s+\d{1,2}:\d{2}(?::\d{2})?|$)/;
const TITLE_BEFORE = /^(.+?)[\s\-–—•:[\]()]*$/;

function titleAfter(text: string): string | null {
  const after = text.trim();
  if (!after) return null;

  const match = TITLE_AFTER.exec(after);
  return match?.[1]?.trim() || null;
}

function titleBefore(text: string): string | null {
  const before = text.trim();
  if (!before) return null;

  const match = TITLE_BEFORE.exec(before);
  return match?.[1]?.trim() || null;
}

export function scanFallback(line: string): ChapterMarker[] {
  const markers: ChapterMarker[] = [];

  for (const match of line.matchAll(TIMECODE_TOKEN)) {
    const timecode = TimeCode.parse(match[0]);
    if (!timecode) continue;

    const start = match.index ?? 0;
    const end = start + match[0].length;

    const candidate = titleAfter(line.slice(end)) ?? titleBefore(line.slice(0, start));
    const title = candidate ? cleanTitle(candidate) : null;
    if (title) {
      markers.push({ timecode, title });
    }
  }

  return markers;
}
