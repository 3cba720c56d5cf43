/**
 * Strict Pass
 * 
 * The common `00:00 Intro` convention: a timecode at the very start of the
 * line, whitespace, then the title.
 */

import { TimeCode } from '../timecode.js';
import type { ChapterMarker } from '../types/chapter.js';
import { cleanTitle } from './titleCleaner.js';

const LEADING_TIMECODE_LINE = /^(\d{1,2}:\d{2}(?::\d{2})?)\s+(.+)$/;

export function matchStrict(line: string): ChapterMarker | null {
  const match = LEADING_TIMECODE_LINE.exec(line);
  if (!match) return null;

  const [, token = '', remainder = ''] = match;
  const timecode = TimeCode.parse(token);
  if (!timecode) return null;

  const title = cleanTitle(remainder);
  if (!title) return null;

  return { timecode, title };
}
