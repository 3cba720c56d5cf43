/**
 * Chapter Types
 */

import type { TimeCode } from '../timecode.js';
import type { ChapterCutError } from '../errors/index.js';

export interface ChapterMarker {
  readonly timecode: TimeCode;
  readonly title: string;
}

/**
 * Unique markers sorted ascending by seconds
 */
export type ChapterList = readonly ChapterMarker[];

/**
 * `[startSeconds, endSeconds)` of one chapter on the source timeline
 */
export interface ExtractionRange {
  startSeconds: number;
  endSeconds: number;
  sourceMarkerIndex: number;
}

export type ChapterSelection =
  | { kind: 'first' }
  | { kind: 'all' }
  | { kind: 'index'; index: number };

export type RangeResolution =
  | { ok: true; range: ExtractionRange }
  | { ok: false; sourceMarkerIndex: number; error: ChapterCutError };
