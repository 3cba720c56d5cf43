/**
 * Collaborator Contracts
 * 
 * Interfaces the orchestrator drives. Implementations live in the
 * acquisition (yt-dlp) and processing (ffmpeg) packages; tests use
 * in-process fakes.
 */

import type { ExtractionRange } from './chapter.js';

export interface VideoMetadata {
  reference: string;
  title: string;
  description: string;
  durationSeconds: number;
  isLive: boolean;
}

export interface MetadataProvider {
  /**
   * Throws MetadataError on failure
   */
  fetchMetadata(reference: string): Promise<VideoMetadata>;
}

export interface RangeHint {
  startSeconds: number;
  endSeconds: number;
}

export interface DownloadProgress {
  percent: number;
  downloadedBytes?: number;
  totalBytes?: number;
  speedBytesPerSecond?: number;
  estimated: boolean;
}

export interface AcquireOptions {
  hint?: RangeHint;
  outputDir: string;
  onProgress?: (progress: DownloadProgress) => void;
  signal?: AbortSignal;
}

export interface AcquiredMedia {
  path: string;
  /** Source-timeline second at which the local media begins */
  offsetSeconds: number;
  sizeBytes: number;
}

export interface MediaAcquirer {
  /**
   * Throws DownloadError on failure. May ignore the range hint.
   */
  acquire(reference: string, options: AcquireOptions): Promise<AcquiredMedia>;
}

export interface EncodeRequest {
  media: AcquiredMedia;
  /** Source-timeline range; the encoder rebases it onto the media */
  range: ExtractionRange;
  outputPath: string;
  /** Unstructured log lines, in order, as the encoder produces them */
  onLine?: (line: string) => void;
  signal?: AbortSignal;
}

export interface EncodeResult {
  outputPath: string;
  sizeBytes: number;
  durationMs: number;
}

export interface SegmentEncoder {
  /**
   * Throws EncodeError on failure
   */
  encode(request: EncodeRequest): Promise<EncodeResult>;
}
