/**
 * Chapter Boundary Resolver
 * 
 * Maps selected chapters to `[start, end)` second ranges on the source
 * timeline. A chapter ends where the next one starts; the last chapter
 * gets a fixed window since nothing bounds it.
 */

import { TimeCode } from './timecode.js';
import { SegmentRangeError, ValidationError } from './errors/index.js';
import type {
  ChapterList,
  ChapterSelection,
  ExtractionRange,
  RangeResolution,
} from './types/chapter.js';

export const DEFAULT_FALLBACK_WINDOW_SECONDS = 60;

export interface ResolveOptions {
  /** Length given to the last chapter */
  fallbackWindowSeconds?: number;
  /** Upper bound on any single range */
  maxSegmentDuration?: number;
  /** Total media length; ranges never run past it. 0 or absent = unknown */
  mediaDuration?: number;
}

/**
 * Indices of the chapters a selection refers to
 */
export function selectIndices(chapters: ChapterList, selection: ChapterSelection): number[] {
  switch (selection.kind) {
    case 'first':
      return chapters.length > 0 ? [0] : [];
    case 'all':
      return chapters.map((_, index) => index);
    case 'index':
      if (
        !Number.isInteger(selection.index) ||
        selection.index < 0 ||
        selection.index >= chapters.length
      ) {
        throw new ValidationError(
          'chapter',
          `index ${selection.index} is outside 0..${chapters.length - 1}`
        );
      }
      return [selection.index];
  }
}

export function resolveRange(
  chapters: ChapterList,
  index: number,
  options: ResolveOptions = {}
): RangeResolution {
  const marker = chapters[index];
  if (!marker) {
    throw new ValidationError('chapter', `no chapter at index ${index}`);
  }

  const {
    fallbackWindowSeconds = DEFAULT_FALLBACK_WINDOW_SECONDS,
    maxSegmentDuration,
    mediaDuration,
  } = options;

  const startSeconds = marker.timecode.toSeconds();
  const next = chapters[index + 1];
  let endSeconds = next ? next.timecode.toSeconds() : startSeconds + fallbackWindowSeconds;

  if (maxSegmentDuration !== undefined && endSeconds - startSeconds > maxSegmentDuration) {
    endSeconds = startSeconds + maxSegmentDuration;
  }
  if (mediaDuration !== undefined && mediaDuration > 0 && endSeconds > mediaDuration) {
    endSeconds = mediaDuration;
  }

  if (startSeconds >= endSeconds) {
    return {
      ok: false,
      sourceMarkerIndex: index,
      error: new SegmentRangeError(index, startSeconds, endSeconds),
    };
  }

  return {
    ok: true,
    range: { startSeconds, endSeconds, sourceMarkerIndex: index },
  };
}

export function resolveRanges(
  chapters: ChapterList,
  selection: ChapterSelection,
  options: ResolveOptions = {}
): RangeResolution[] {
  return selectIndices(chapters, selection).map((index) =>
    resolveRange(chapters, index, options)
  );
}

/**
 * `M:SS - M:SS` for logs and progress messages
 */
export function describeRange(range: ExtractionRange): string {
  return `${TimeCode.format(range.startSeconds)} - ${TimeCode.format(range.endSeconds)}`;
}

/**
 * Express a source-timeline range relative to media that starts at
 * `offsetSeconds` (a pre-cut download).
 */
export function rebaseRange(range: ExtractionRange, offsetSeconds: number): ExtractionRange {
  return {
    ...range,
    startSeconds: Math.max(0, range.startSeconds - offsetSeconds),
    endSeconds: Math.max(0, range.endSeconds - offsetSeconds),
  };
}
