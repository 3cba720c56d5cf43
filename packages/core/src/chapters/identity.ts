import type { ChapterMarker } from '../types/chapter.js';

/**
 * Dedup key: same second and same first three words (case-insensitive)
 * means same chapter, whatever follows.
 */
export function chapterIdentity(marker: ChapterMarker): string {
  const leadingWords = marker.title
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .slice(0, 3)
    .join(' ');

  return `${marker.timecode.toSeconds()}|${leadingWords}`;
}
