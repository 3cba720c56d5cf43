/**
 * Extraction Orchestrator
 * 
 * Drives one session: analyse a video, then cut the selected chapters
 * (or fetch the whole video when it has none).
 * 
 * Steps for an extraction:
 * 1. Resolve selected chapters to ranges
 * 2. Download (one range-hinted download for a single chapter, one full
 *    download otherwise)
 * 3. Encode each range, feeding encoder output to a progress machine
 * 4. Remove temporary media
 * 
 * Per-chapter failures are recorded as outcomes; the batch carries on.
 */

import { join } from 'node:path';
import {
  DEFAULT_LIMITS,
  MetadataError,
  ValidationError,
  extractChapters,
  resolveRanges,
  toChapterCutError,
  type AcquiredMedia,
  type ChapterCutError,
  type ChapterSelection,
  type DownloadProgress,
  type ExtractionLimits,
  type ExtractionRange,
  type RangeHint,
} from '@chaptercut/core';
import { ProgressStateMachine, type ProgressUpdate } from '@chaptercut/processing';
import {
  chapterFilename,
  copyFile,
  createLogger,
  ensureDir,
  getFileSizeBytes,
  removePath,
  sanitizeFilename,
} from '@chaptercut/utils';
import type {
  AnalysisResult,
  AnalyzedVideo,
  BatchSummary,
  ChapterOutcome,
  FullDownloadResult,
  OrchestratorDeps,
  OrchestratorOptions,
  PipelineProgress,
  RunOptions,
} from './types.js';

const log = createLogger({ module: 'orchestrator' });

const TOTAL_STEPS = 4;

// Overall percent bands
const RESOLVE_PERCENT = 40;
const DOWNLOAD_BAND = { from: 45, to: 60 };
const ENCODE_BAND = { from: 60, to: 85 };
const CLEANUP_PERCENT = 90;
const SAVE_PERCENT = 85;

// Offset of the progress machine's final stage from its base
const ENCODE_SPAN = 10;

export class ExtractionOrchestrator {
  private readonly limits: ExtractionLimits;
  private session: AnalyzedVideo | null = null;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions
  ) {
    this.limits = { ...DEFAULT_LIMITS, ...options.limits };
  }

  /**
   * The analysed video, if any
   */
  getSession(): AnalyzedVideo | null {
    return this.session;
  }

  clear(): void {
    this.session = null;
  }

  async analyze(reference: string): Promise<AnalysisResult> {
    this.clear();
    const trimmed = reference.trim();

    try {
      if (this.deps.isSupportedReference && !this.deps.isSupportedReference(trimmed)) {
        throw new MetadataError('invalid-reference', trimmed, 'Please provide a valid YouTube URL');
      }

      const metadata = await this.deps.metadata.fetchMetadata(trimmed);

      if (metadata.isLive) {
        throw new MetadataError('live-stream', trimmed, 'Live streams are not supported');
      }
      if (metadata.durationSeconds > this.limits.maxVideoDuration) {
        throw new MetadataError(
          'too-long',
          trimmed,
          `Video is too long (${Math.ceil(metadata.durationSeconds / 60)} min, limit ${Math.floor(this.limits.maxVideoDuration / 60)} min)`
        );
      }

      const chapters = extractChapters(metadata.description, {
        maxChapters: this.limits.maxChapters,
        maxLines: this.limits.maxLines,
        maxDescriptionLength: this.limits.maxDescriptionLength,
      });

      this.session = { metadata, chapters };
      log.info({ reference: trimmed, chapters: chapters.length }, 'Video analysed');

      return { ok: true, metadata, chapters };
    } catch (error) {
      const failure = toChapterCutError(error);
      log.warn({ reference: trimmed, code: failure.code, error: failure.message }, 'Analysis failed');
      return { ok: false, reference: trimmed, error: failure };
    }
  }

  /**
   * Throws ValidationError when nothing was analysed or the selection
   * names a chapter that does not exist.
   */
  async extract(selection: ChapterSelection, runOptions: RunOptions = {}): Promise<BatchSummary> {
    const session = this.requireSession();
    const { chapters, metadata } = session;
    const report = this.reporter(runOptions);
    const outcomes: ChapterOutcome[] = [];

    const titleOf = (index: number): string => chapters[index]?.title ?? `Chapter ${index + 1}`;

    report(1, RESOLVE_PERCENT, 'Resolving chapters...');
    const resolutions = resolveRanges(chapters, selection, {
      fallbackWindowSeconds: this.limits.fallbackWindowSeconds,
      maxSegmentDuration: this.limits.maxSegmentDuration,
      mediaDuration: metadata.durationSeconds,
    });

    const ranges: ExtractionRange[] = [];
    for (const resolution of resolutions) {
      if (resolution.ok) {
        ranges.push(resolution.range);
      } else {
        outcomes.push({
          status: 'failed',
          markerIndex: resolution.sourceMarkerIndex,
          title: titleOf(resolution.sourceMarkerIndex),
          error: resolution.error,
        });
      }
    }

    if (ranges.length === 0) {
      return this.summarize(outcomes);
    }

    const failAll = (failure: ChapterCutError): BatchSummary => {
      for (const range of ranges) {
        outcomes.push({
          status: 'failed',
          markerIndex: range.sourceMarkerIndex,
          title: titleOf(range.sourceMarkerIndex),
          error: failure,
        });
      }
      return this.summarize(outcomes);
    };

    try {
      await ensureDir(this.options.outputDir);
    } catch (error) {
      const failure = toChapterCutError(error);
      log.error({ outputDir: this.options.outputDir, error: failure.message }, 'Output directory unavailable');
      return failAll(failure);
    }

    const hint = ranges.length === 1 ? toHint(ranges[0]) : undefined;

    let media: AcquiredMedia;
    try {
      media = await this.acquire(metadata.reference, hint, runOptions);
    } catch (error) {
      const failure = toChapterCutError(error);
      log.error({ reference: metadata.reference, error: failure.message }, 'Download failed');
      return failAll(failure);
    }

    try {
      const bandWidth = (ENCODE_BAND.to - ENCODE_BAND.from) / ranges.length;

      for (const [position, range] of ranges.entries()) {
        const title = titleOf(range.sourceMarkerIndex);
        const label = `Chapter ${position + 1}/${ranges.length}`;
        const bandStart = ENCODE_BAND.from + position * bandWidth;

        const machine = new ProgressStateMachine({
          basePercent: 0,
          sink: (update: ProgressUpdate) => {
            const fraction = Math.min(1, update.percent / ENCODE_SPAN);
            report(3, bandStart + fraction * bandWidth, `${label}: ${update.message}`);
          },
        });

        report(3, bandStart, `${label}: ${title}`);
        outcomes.push(
          await this.encodeChapter(media, range, title, position + 1, machine, runOptions.signal)
        );
      }
    } finally {
      report(4, CLEANUP_PERCENT, 'Cleaning up...');
      await removePath(media.path);
    }

    report(4, 100, 'Extraction complete');
    return this.summarize(outcomes);
  }

  /**
   * Fetch the whole video into the output directory, named after its title
   */
  async downloadFull(runOptions: RunOptions = {}): Promise<FullDownloadResult> {
    const { metadata } = this.requireSession();
    const report = this.reporter(runOptions);

    let media: AcquiredMedia | null = null;
    try {
      media = await this.acquire(metadata.reference, undefined, runOptions);

      report(3, SAVE_PERCENT, 'Saving video...');
      const outputPath = join(this.options.outputDir, `${sanitizeFilename(metadata.title)}.mp4`);
      await copyFile(media.path, outputPath);
      const sizeBytes = await getFileSizeBytes(outputPath);

      report(4, 100, 'Complete');
      log.info({ reference: metadata.reference, outputPath, sizeBytes }, 'Full video saved');
      return { ok: true, outputPath, sizeBytes };
    } catch (error) {
      const failure = toChapterCutError(error);
      log.error({ reference: metadata.reference, error: failure.message }, 'Full download failed');
      return { ok: false, error: failure };
    } finally {
      if (media) {
        await removePath(media.path);
      }
    }
  }

  private async acquire(
    reference: string,
    hint: RangeHint | undefined,
    runOptions: RunOptions
  ): Promise<AcquiredMedia> {
    const report = this.reporter(runOptions);
    report(2, DOWNLOAD_BAND.from, hint ? 'Downloading chapter...' : 'Downloading video...');

    return this.deps.acquirer.acquire(reference, {
      hint,
      outputDir: this.options.mediaDir,
      signal: runOptions.signal,
      onProgress: (progress: DownloadProgress) => {
        const span = DOWNLOAD_BAND.to - DOWNLOAD_BAND.from;
        const percent = DOWNLOAD_BAND.from + (Math.min(100, progress.percent) / 100) * span;
        report(2, percent, `Downloading... ${progress.percent.toFixed(1)}%`);
      },
    });
  }

  private async encodeChapter(
    media: AcquiredMedia,
    range: ExtractionRange,
    title: string,
    position: number,
    machine: ProgressStateMachine,
    signal?: AbortSignal
  ): Promise<ChapterOutcome> {
    const outputPath = join(this.options.outputDir, chapterFilename(position, title));

    try {
      const result = await this.deps.encoder.encode({
        media,
        range,
        outputPath,
        onLine: (line) => {
          machine.consume(line);
        },
        signal,
      });

      log.info({ chapterIndex: range.sourceMarkerIndex, outputPath }, 'Chapter extracted');
      return {
        status: 'extracted',
        markerIndex: range.sourceMarkerIndex,
        title,
        range,
        outputPath: result.outputPath,
        sizeBytes: result.sizeBytes,
      };
    } catch (error) {
      const failure: ChapterCutError = toChapterCutError(error);
      log.warn(
        { chapterIndex: range.sourceMarkerIndex, code: failure.code, error: failure.message },
        'Chapter extraction failed'
      );
      await removePath(outputPath);
      return { status: 'failed', markerIndex: range.sourceMarkerIndex, title, error: failure };
    }
  }

  private requireSession(): AnalyzedVideo {
    if (!this.session) {
      throw new ValidationError('session', 'no video has been analysed');
    }
    return this.session;
  }

  private reporter(runOptions: RunOptions): (step: number, percent: number, message: string) => void {
    return (step, percent, message) => {
      const progress: PipelineProgress = {
        step,
        totalSteps: TOTAL_STEPS,
        percent: Math.round(percent * 10) / 10,
        message,
      };
      runOptions.onProgress?.(progress);
    };
  }

  private summarize(outcomes: ChapterOutcome[]): BatchSummary {
    const ordered = [...outcomes].sort((a, b) => a.markerIndex - b.markerIndex);
    const extracted = ordered.filter((outcome) => outcome.status === 'extracted').length;
    return {
      outcomes: ordered,
      extracted,
      failed: ordered.length - extracted,
      outputDir: this.options.outputDir,
    };
  }
}

function toHint(range: ExtractionRange | undefined): RangeHint | undefined {
  if (!range) return undefined;
  return { startSeconds: range.startSeconds, endSeconds: range.endSeconds };
}
