/**
 * CLI Configuration
 * 
 * Everything comes from the environment (optionally via `.env`).
 * `LOG_LEVEL` and `NODE_ENV` are read by the shared logger itself.
 */

import { tmpdir } from 'node:os';
import { resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_LIMITS, ValidationError, type ExtractionLimits } from '@chaptercut/core';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  // Media tools
  YTDLP_PATH: z.string().min(1).default('yt-dlp'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),

  // Directories
  CHAPTERCUT_WORK_DIR: z.string().min(1).optional(),
  CHAPTERCUT_OUTPUT_DIR: z.string().min(1).default('./extracted_segments'),

  // Limits
  CHAPTERCUT_MAX_CHAPTERS: positiveInt(DEFAULT_LIMITS.maxChapters),
  CHAPTERCUT_MAX_VIDEO_DURATION: positiveInt(DEFAULT_LIMITS.maxVideoDuration),
  CHAPTERCUT_MAX_FILE_SIZE_MB: positiveInt(DEFAULT_LIMITS.maxFileSizeMb),
  CHAPTERCUT_MAX_SEGMENT_DURATION: positiveInt(DEFAULT_LIMITS.maxSegmentDuration),
  CHAPTERCUT_FALLBACK_WINDOW: positiveInt(DEFAULT_LIMITS.fallbackWindowSeconds),
  CHAPTERCUT_MAX_DESCRIPTION_LENGTH: positiveInt(DEFAULT_LIMITS.maxDescriptionLength),
  CHAPTERCUT_MAX_LINES: positiveInt(DEFAULT_LIMITS.maxLines),
  // 0 disables the free-space check
  CHAPTERCUT_MIN_FREE_DISK_MB: z.coerce.number().int().nonnegative().default(1024),

  // Session workspaces older than this are pruned
  CHAPTERCUT_RETENTION_MINUTES: positiveInt(30),
});

export interface AppConfig {
  tools: {
    ytdlp: string;
    ffmpeg: string;
  };
  workDir: string;
  outputDir: string;
  limits: ExtractionLimits;
  minFreeDiskMb: number;
  workspaceRetentionMs: number;
}

/**
 * Validate an environment into the CLI's configuration.
 * Relative directories resolve against `cwd`.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationError('environment', issues);
  }

  const parsed = parseResult.data;

  return {
    tools: {
      ytdlp: parsed.YTDLP_PATH,
      ffmpeg: parsed.FFMPEG_PATH,
    },
    workDir: resolve(cwd, parsed.CHAPTERCUT_WORK_DIR ?? resolve(tmpdir(), 'chaptercut')),
    outputDir: resolve(cwd, parsed.CHAPTERCUT_OUTPUT_DIR),
    limits: {
      maxChapters: parsed.CHAPTERCUT_MAX_CHAPTERS,
      maxVideoDuration: parsed.CHAPTERCUT_MAX_VIDEO_DURATION,
      maxFileSizeMb: parsed.CHAPTERCUT_MAX_FILE_SIZE_MB,
      maxSegmentDuration: parsed.CHAPTERCUT_MAX_SEGMENT_DURATION,
      fallbackWindowSeconds: parsed.CHAPTERCUT_FALLBACK_WINDOW,
      maxDescriptionLength: parsed.CHAPTERCUT_MAX_DESCRIPTION_LENGTH,
      maxLines: parsed.CHAPTERCUT_MAX_LINES,
    },
    minFreeDiskMb: parsed.CHAPTERCUT_MIN_FREE_DISK_MB,
    workspaceRetentionMs: parsed.CHAPTERCUT_RETENTION_MINUTES * 60 * 1000,
  };
}
