/**
 * yt-dlp Client
 * 
 * Metadata lookup and media download through the yt-dlp CLI.
 * Docs: https://github.com/yt-dlp/yt-dlp#usage-and-options
 * 
 * Features:
 * - Single-JSON metadata dump, validated with zod
 * - Range-hinted downloads (`--download-sections`) with a full-download
 *   fallback
 * - Line-by-line progress reporting
 * - File size cap and a free-space check before downloading
 */

import { join } from 'node:path';
import { z } from 'zod';
import {
  DownloadError,
  MetadataError,
  type AcquireOptions,
  type AcquiredMedia,
  type MediaAcquirer,
  type MetadataErrorKind,
  type MetadataProvider,
  type RangeHint,
  type VideoMetadata,
} from '@chaptercut/core';
import {
  createLogger,
  ensureDir,
  errorMessage,
  executeCommand,
  formatMegabytes,
  getFileSizeBytes,
  getFreeDiskBytes,
  pathExists,
  removePath,
  type CommandResult,
  type CommandRunner,
} from '@chaptercut/utils';
import { parseVideoReference } from './links.js';
import { parseDownloadProgress } from './downloadProgress.js';

const log = createLogger({ module: 'yt-dlp' });

// Progressive streams first so no merge step is needed
export const DEFAULT_FORMAT = 'best[height<=720]/best[height<=480]/worst';

export interface YtDlpConfig {
  binaryPath: string;
  format: string;
  maxFileSizeMb: number;
  /** Downloads are refused below this much free space; 0 skips the check */
  minFreeDiskMb: number;
  retries: number;
  metadataTimeout: number;  // ms
  downloadTimeout: number;  // ms
}

const VideoInfoSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  duration: z.number().nonnegative().nullish(),
  is_live: z.boolean().nullish(),
  live_status: z.string().nullish(),
  webpage_url: z.string().nullish(),
});

export type VideoInfo = z.infer<typeof VideoInfoSchema>;

/**
 * Classify yt-dlp's stderr for a failed metadata lookup
 */
export function classifyMetadataFailure(stderr: string, timedOut = false): MetadataErrorKind {
  const lower = stderr.toLowerCase();
  if (lower.includes('private')) return 'private';
  if (timedOut || lower.includes('timed out') || lower.includes('timeout')) return 'timeout';
  return 'unavailable';
}

const FAILURE_MESSAGES: Record<MetadataErrorKind, string> = {
  'private': 'This video is private and cannot be processed',
  'unavailable': 'This video is unavailable',
  'timeout': 'Request timed out, please try again',
  'invalid-reference': 'Please provide a valid YouTube URL',
  'live-stream': 'Live streams are not supported',
  'too-long': 'Video is too long',
};

export class YtDlpClient implements MetadataProvider, MediaAcquirer {
  private config: YtDlpConfig;
  private runner: CommandRunner;

  constructor(config?: Partial<YtDlpConfig>, runner: CommandRunner = executeCommand) {
    this.config = {
      binaryPath: config?.binaryPath ?? process.env['YTDLP_PATH'] ?? 'yt-dlp',
      format: config?.format ?? DEFAULT_FORMAT,
      maxFileSizeMb: config?.maxFileSizeMb ?? 500,
      minFreeDiskMb: config?.minFreeDiskMb ?? 1024,
      retries: config?.retries ?? 2,
      metadataTimeout: config?.metadataTimeout ?? 60000,
      downloadTimeout: config?.downloadTimeout ?? 3600000,
    };
    this.runner = runner;
  }

  async fetchMetadata(reference: string): Promise<VideoMetadata> {
    const { url } = parseVideoReference(reference);

    const args = [
      '--dump-single-json',
      '--skip-download',
      '--no-playlist',
      '--no-warnings',
      '--socket-timeout', '30',
      url,
    ];

    let result: CommandResult;
    try {
      result = await this.runner(this.config.binaryPath, args, {
        timeout: this.config.metadataTimeout,
      });
    } catch (error) {
      log.error({ reference, error: errorMessage(error) }, 'Could not run yt-dlp');
      throw new MetadataError('unavailable', reference, `Could not run yt-dlp: ${errorMessage(error)}`);
    }

    if (result.exitCode !== 0) {
      const kind = classifyMetadataFailure(result.stderr, result.timedOut);
      log.warn({ reference, kind, stderr: result.stderr.substring(0, 500) }, 'Metadata lookup failed');
      throw new MetadataError(kind, reference, FAILURE_MESSAGES[kind]);
    }

    const info = this.parseInfo(reference, result.stdout);
    return {
      reference: info.webpage_url ?? url,
      title: info.title?.trim() || 'Unknown',
      description: info.description ?? '',
      durationSeconds: info.duration ?? 0,
      isLive: info.is_live === true || info.live_status === 'is_live',
    };
  }

  /**
   * Download the video. With a range hint only that section is fetched;
   * when that fails the whole video is downloaded instead and
   * `offsetSeconds` is 0.
   */
  async acquire(reference: string, options: AcquireOptions): Promise<AcquiredMedia> {
    const { url, videoId } = parseVideoReference(reference);
    await ensureDir(options.outputDir);
    await this.ensureFreeSpace(url, options.outputDir);

    if (options.hint) {
      try {
        return await this.download(url, videoId, options, options.hint);
      } catch (error) {
        if (error instanceof DownloadError && error.kind === 'file-too-large') {
          throw error;
        }
        log.warn(
          { reference, hint: options.hint, error: errorMessage(error) },
          'Section download failed, falling back to full download'
        );
      }
    }

    return this.download(url, videoId, options);
  }

  private async ensureFreeSpace(url: string, dir: string): Promise<void> {
    if (this.config.minFreeDiskMb <= 0) return;

    let freeBytes: number;
    try {
      freeBytes = await getFreeDiskBytes(dir);
    } catch (error) {
      log.warn({ dir, error: errorMessage(error) }, 'Could not check free disk space, continuing');
      return;
    }

    if (freeBytes < this.config.minFreeDiskMb * 1024 * 1024) {
      log.warn({ url, dir, freeBytes }, 'Not enough free disk space');
      throw new DownloadError(
        'insufficient-disk-space',
        url,
        `Insufficient disk space (${formatMegabytes(freeBytes)} free, ${this.config.minFreeDiskMb} MB needed)`
      );
    }
  }

  private parseInfo(reference: string, stdout: string): VideoInfo {
    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      throw new MetadataError('unavailable', reference, 'yt-dlp returned unreadable metadata');
    }

    const parsed = VideoInfoSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ reference, issues: parsed.error.issues }, 'Unexpected metadata shape');
      throw new MetadataError('unavailable', reference, 'yt-dlp returned unexpected metadata');
    }
    return parsed.data;
  }

  private buildDownloadArgs(url: string, videoId: string, outputDir: string, hint?: RangeHint): string[] {
    const template = hint
      ? `${videoId}_${Math.floor(hint.startSeconds)}-${Math.ceil(hint.endSeconds)}.%(ext)s`
      : `${videoId}.%(ext)s`;

    const args = [
      '-f', this.config.format,
      '--newline',
      '--progress',
      '--no-playlist',
      '--no-warnings',
      '--retries', String(this.config.retries),
      '--socket-timeout', '60',
      '--max-filesize', `${Math.ceil(this.config.maxFileSizeMb)}M`,
      '--print', 'after_move:filepath',
      '-o', join(outputDir, template),
    ];

    if (hint) {
      args.push(
        '--download-sections', `*${hint.startSeconds}-${hint.endSeconds}`,
        '--force-keyframes-at-cuts'
      );
    }

    args.push(url);
    return args;
  }

  private async download(
    url: string,
    videoId: string,
    options: AcquireOptions,
    hint?: RangeHint
  ): Promise<AcquiredMedia> {
    const args = this.buildDownloadArgs(url, videoId, options.outputDir, hint);
    const printedPaths: string[] = [];

    const onLine = (line: string): void => {
      const progress = parseDownloadProgress(line);
      if (progress) {
        options.onProgress?.(progress);
        return;
      }
      // --print writes the final path as a bare line
      if (!line.startsWith('[')) {
        printedPaths.push(line);
      }
    };

    let result: CommandResult;
    try {
      result = await this.runner(this.config.binaryPath, args, {
        timeout: this.config.downloadTimeout,
        signal: options.signal,
        onStdoutLine: onLine,
        onStderrLine: (line) => {
          const progress = parseDownloadProgress(line);
          if (progress) options.onProgress?.(progress);
        },
      });
    } catch (error) {
      throw new DownloadError('download-failed', url, `Could not run yt-dlp: ${errorMessage(error)}`);
    }

    const output = `${result.stdout}\n${result.stderr}`;
    if (output.includes('larger than max-filesize')) {
      throw new DownloadError(
        'file-too-large',
        url,
        `Video exceeds the ${this.config.maxFileSizeMb}MB limit`
      );
    }

    const filePath = printedPaths[printedPaths.length - 1];
    if (result.exitCode !== 0 || filePath === undefined || !(await pathExists(filePath))) {
      log.warn(
        { url, exitCode: result.exitCode, sectioned: Boolean(hint), stderr: result.stderr.substring(0, 500) },
        'Download failed'
      );
      throw new DownloadError(
        'download-failed',
        url,
        result.timedOut ? 'Download timed out' : 'Download failed'
      );
    }

    const sizeBytes = await getFileSizeBytes(filePath);
    if (sizeBytes > this.config.maxFileSizeMb * 1024 * 1024) {
      await removePath(filePath);
      throw new DownloadError(
        'file-too-large',
        url,
        `Video exceeds the ${this.config.maxFileSizeMb}MB limit`
      );
    }

    log.info({ url, filePath, sizeBytes, sectioned: Boolean(hint) }, 'Download complete');

    return {
      path: filePath,
      offsetSeconds: hint ? hint.startSeconds : 0,
      sizeBytes,
    };
  }
}
