/**
 * yt-dlp Download Progress
 * 
 * Parses the `--newline` progress lines yt-dlp prints while downloading:
 * 
 *   [download]  42.3% of ~ 10.00MiB at 1.20MiB/s ETA 00:05
 *   [download] 100% of 10.00MiB in 00:00:03 at 3.10MiB/s
 * 
 * A `~` before the size marks an estimated total.
 */

import type { DownloadProgress } from '@chaptercut/core';

const PROGRESS_PATTERN =
  /^\[download\]\s+(\d+(?:\.\d+)?)%(?:\s+of\s+(~)?\s*(\d+(?:\.\d+)?)\s*([KMGT]?i?B))?(?:.*?\bat\s+(\d+(?:\.\d+)?)\s*([KMGT]?i?B)\/s)?/;

const UNIT_MULTIPLIERS: Record<string, number> = {
  B: 1,
  KiB: 1024,
  MiB: 1024 ** 2,
  GiB: 1024 ** 3,
  TiB: 1024 ** 4,
  KB: 1000,
  MB: 1000 ** 2,
  GB: 1000 ** 3,
  TB: 1000 ** 4,
};

/**
 * Convert a yt-dlp size (`10.00MiB`) to bytes
 */
export function parseSize(value: string, unit: string): number | undefined {
  const multiplier = UNIT_MULTIPLIERS[unit];
  const number = parseFloat(value);
  if (multiplier === undefined || !Number.isFinite(number)) {
    return undefined;
  }
  return number * multiplier;
}

export function parseDownloadProgress(line: string): DownloadProgress | null {
  const match = PROGRESS_PATTERN.exec(line.trim());
  if (!match?.[1]) return null;

  const percent = Math.min(100, parseFloat(match[1]));
  const progress: DownloadProgress = {
    percent,
    estimated: match[2] === '~',
  };

  if (match[3] && match[4]) {
    const totalBytes = parseSize(match[3], match[4]);
    if (totalBytes !== undefined) {
      progress.totalBytes = totalBytes;
      progress.downloadedBytes = Math.round((totalBytes * percent) / 100);
    }
  }

  if (match[5] && match[6]) {
    progress.speedBytesPerSecond = parseSize(match[5], match[6]);
  }

  return progress;
}
