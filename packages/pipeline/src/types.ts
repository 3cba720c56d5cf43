/**
 * Pipeline Types
 */

import type {
  ChapterCutError,
  ChapterList,
  ExtractionLimits,
  ExtractionRange,
  MediaAcquirer,
  MetadataProvider,
  SegmentEncoder,
  VideoMetadata,
} from '@chaptercut/core';

export interface PipelineProgress {
  step: number;
  totalSteps: number;
  percent: number;  // 0-100 across the whole operation
  message: string;
}

export type ProgressReporter = (progress: PipelineProgress) => void;

export interface OrchestratorDeps {
  metadata: MetadataProvider;
  acquirer: MediaAcquirer;
  encoder: SegmentEncoder;
  /** Cheap syntactic check run before any lookup */
  isSupportedReference?: (reference: string) => boolean;
}

export interface OrchestratorOptions {
  /** Where downloaded media is kept until the operation ends */
  mediaDir: string;
  /** Where finished files are written */
  outputDir: string;
  limits?: Partial<ExtractionLimits>;
}

export interface AnalyzedVideo {
  metadata: VideoMetadata;
  chapters: ChapterList;
}

export type AnalysisResult =
  | ({ ok: true } & AnalyzedVideo)
  | { ok: false; reference: string; error: ChapterCutError };

export type ChapterOutcome =
  | {
      status: 'extracted';
      markerIndex: number;
      title: string;
      range: ExtractionRange;
      outputPath: string;
      sizeBytes: number;
    }
  | {
      status: 'failed';
      markerIndex: number;
      title: string;
      error: ChapterCutError;
    };

export interface BatchSummary {
  outcomes: ChapterOutcome[];
  extracted: number;
  failed: number;
  outputDir: string;
}

export type FullDownloadResult =
  | { ok: true; outputPath: string; sizeBytes: number }
  | { ok: false; error: ChapterCutError };

export interface RunOptions {
  onProgress?: ProgressReporter;
  signal?: AbortSignal;
}
