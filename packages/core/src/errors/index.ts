/**
 * Custom Error Classes
 */

/**
 * Base error class for all chaptercut errors
 */
export class ChapterCutError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ChapterCutError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends ChapterCutError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

export type MetadataErrorKind =
  | 'unavailable'
  | 'private'
  | 'timeout'
  | 'invalid-reference'
  | 'live-stream'
  | 'too-long';

/**
 * Metadata lookup failed or the video is not eligible for extraction
 */
export class MetadataError extends ChapterCutError {
  public readonly kind: MetadataErrorKind;

  constructor(kind: MetadataErrorKind, reference: string, message: string) {
    super(message, 'METADATA_ERROR', { kind, reference });
    this.name = 'MetadataError';
    this.kind = kind;
  }
}

export type DownloadErrorKind = 'download-failed' | 'file-too-large' | 'insufficient-disk-space';

/**
 * Media acquisition failed
 */
export class DownloadError extends ChapterCutError {
  public readonly kind: DownloadErrorKind;

  constructor(kind: DownloadErrorKind, reference: string, message: string) {
    super(message, 'DOWNLOAD_ERROR', { kind, reference });
    this.name = 'DownloadError';
    this.kind = kind;
  }
}

/**
 * Cutting / transcoding one segment failed
 */
export class EncodeError extends ChapterCutError {
  constructor(outputPath: string, message: string, stderr?: string) {
    super(message, 'ENCODE_ERROR', {
      outputPath,
      stderr: stderr?.substring(0, 1000),
    });
    this.name = 'EncodeError';
  }
}

/**
 * A chapter's resolved range collapsed after clamping
 */
export class SegmentRangeError extends ChapterCutError {
  constructor(markerIndex: number, startSeconds: number, endSeconds: number) {
    super(
      `Chapter ${markerIndex + 1} has an empty range (${startSeconds}s to ${endSeconds}s)`,
      'SEGMENT_RANGE_ERROR',
      { markerIndex, startSeconds, endSeconds }
    );
    this.name = 'SegmentRangeError';
  }
}

/**
 * Wrap anything thrown into a ChapterCutError
 */
export function toChapterCutError(error: unknown, code = 'INTERNAL_ERROR'): ChapterCutError {
  if (error instanceof ChapterCutError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ChapterCutError(message, code);
}
