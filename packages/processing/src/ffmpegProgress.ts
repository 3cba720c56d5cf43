/**
 * FFmpeg Progress Reader
 * 
 * Reads the key=value blocks ffmpeg writes with `-progress pipe:1`.
 * Every block ends with a `progress=continue|end` line, at which point
 * a snapshot is produced.
 */

export interface EncodeProgressSnapshot {
  frame: number;
  outTimeSeconds: number;
  speed: number;
  /** 0-100 against the expected output duration */
  percent: number;
  finished: boolean;
}

export class FFmpegProgressReader {
  private frame = 0;
  private outTimeSeconds = 0;
  private speed = 0;

  constructor(private readonly durationSeconds: number) {}

  /**
   * Feed one stdout line. Returns a snapshot when the line closes a block.
   */
  push(line: string): EncodeProgressSnapshot | null {
    const match = line.trim().match(/^(\w+)=(.*)$/);
    if (!match) return null;

    const key = match[1] ?? '';
    const value = (match[2] ?? '').trim();

    switch (key) {
      case 'frame':
        this.frame = parseInt(value, 10) || 0;
        return null;
      // Both carry microseconds
      case 'out_time_us':
      case 'out_time_ms': {
        const micros = parseInt(value, 10);
        if (Number.isFinite(micros) && micros >= 0) {
          this.outTimeSeconds = micros / 1_000_000;
        }
        return null;
      }
      case 'out_time': {
        const seconds = parseFFmpegTime(value);
        if (seconds !== null) {
          this.outTimeSeconds = seconds;
        }
        return null;
      }
      case 'speed':
        this.speed = parseFloat(value.replace('x', '')) || 0;
        return null;
      case 'progress':
        return this.snapshot(value === 'end');
      default:
        return null;
    }
  }

  private snapshot(finished: boolean): EncodeProgressSnapshot {
    let percent = 0;
    if (finished) {
      percent = 100;
    } else if (this.durationSeconds > 0) {
      percent = Math.min(100, (this.outTimeSeconds / this.durationSeconds) * 100);
    }

    return {
      frame: this.frame,
      outTimeSeconds: this.outTimeSeconds,
      speed: this.speed,
      percent,
      finished,
    };
  }
}

/**
 * Parse FFmpeg time format (HH:MM:SS.micro) to seconds
 */
export function parseFFmpegTime(time: string): number | null {
  const parts = time.split(':');
  if (parts.length !== 3) return null;

  const [hours, minutes, seconds] = parts.map((p) => parseFloat(p));
  if (hours === undefined || minutes === undefined || seconds === undefined) return null;
  if ([hours, minutes, seconds].some((n) => !Number.isFinite(n))) return null;

  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * One narration line for a snapshot, e.g. `video 42% (t: 12.3s, 2.01x)`
 */
export function formatEncodeProgress(label: string, snapshot: EncodeProgressSnapshot): string {
  const parts = [`t: ${snapshot.outTimeSeconds.toFixed(1)}s`];
  if (snapshot.speed > 0) {
    parts.push(`${snapshot.speed.toFixed(2)}x`);
  }
  return `${label} ${snapshot.percent.toFixed(0)}% (${parts.join(', ')})`;
}
