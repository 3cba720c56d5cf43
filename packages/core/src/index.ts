/**
 * @chaptercut/core
 * 
 * Core chapter logic:
 * - TimeCode parsing and formatting
 * - Chapter extraction engine (strict + fallback line passes)
 * - Chapter boundary resolution
 * - Collaborator contracts
 * - Error handling
 */

// TimeCode
export { TimeCode } from './timecode.js';

// Chapter extraction
export {
  extractChapters,
  extractLine,
  dedupeChapters,
  matchStrict,
  scanFallback,
  cleanTitle,
  chapterIdentity,
  LINE_PASSES,
  type LinePass,
  type ExtractOptions,
} from './chapters/index.js';

// Boundary resolution
export {
  selectIndices,
  resolveRange,
  resolveRanges,
  describeRange,
  rebaseRange,
  DEFAULT_FALLBACK_WINDOW_SECONDS,
  type ResolveOptions,
} from './boundaries.js';

// Limits
export { DEFAULT_LIMITS, type ExtractionLimits } from './limits.js';

// Types
export type {
  ChapterMarker,
  ChapterList,
  ChapterSelection,
  ExtractionRange,
  RangeResolution,
} from './types/chapter.js';

export type {
  VideoMetadata,
  MetadataProvider,
  RangeHint,
  DownloadProgress,
  AcquireOptions,
  AcquiredMedia,
  MediaAcquirer,
  EncodeRequest,
  EncodeResult,
  SegmentEncoder,
} from './types/collaborators.js';

// Errors
export {
  ChapterCutError,
  ValidationError,
  MetadataError,
  DownloadError,
  EncodeError,
  SegmentRangeError,
  toChapterCutError,
  type MetadataErrorKind,
  type DownloadErrorKind,
} from './errors/index.js';
