import { describe, it, expect } from 'vitest';
import { FFmpegProgressReader, formatEncodeProgress, parseFFmpegTime } from './ffmpegProgress.js';

describe('FFmpegProgressReader', () => {
  it('produces a snapshot at the end of each block', () => {
    const reader = new FFmpegProgressReader(20);

    expect(reader.push('frame=120')).toBeNull();
    expect(reader.push('out_time_us=5000000')).toBeNull();
    expect(reader.push('speed=2.5x')).toBeNull();

    expect(reader.push('progress=continue')).toEqual({
      frame: 120,
      outTimeSeconds: 5,
      speed: 2.5,
      percent: 25,
      finished: false,
    });
  });

  it('reads out_time_ms as microseconds', () => {
    const reader = new FFmpegProgressReader(10);
    reader.push('out_time_ms=2500000');

    expect(reader.push('progress=continue')?.outTimeSeconds).toBe(2.5);
  });

  it('falls back to the clock-formatted out_time', () => {
    const reader = new FFmpegProgressReader(100);
    reader.push('out_time=00:00:30.000000');

    expect(reader.push('progress=continue')?.percent).toBe(30);
  });

  it('ignores unavailable values', () => {
    const reader = new FFmpegProgressReader(100);
    reader.push('out_time_us=1000000');
    reader.push('out_time=N/A');
    reader.push('speed=N/A');

    const snapshot = reader.push('progress=continue');
    expect(snapshot?.outTimeSeconds).toBe(1);
    expect(snapshot?.speed).toBe(0);
  });

  it('reports 100 percent when the stream ends', () => {
    const reader = new FFmpegProgressReader(100);
    reader.push('out_time_us=1000000');

    const snapshot = reader.push('progress=end');
    expect(snapshot?.percent).toBe(100);
    expect(snapshot?.finished).toBe(true);
  });

  it('caps percent at 100 and stays at 0 without a known duration', () => {
    const long = new FFmpegProgressReader(1);
    long.push('out_time_us=5000000');
    expect(long.push('progress=continue')?.percent).toBe(100);

    const unknown = new FFmpegProgressReader(0);
    unknown.push('out_time_us=5000000');
    expect(unknown.push('progress=continue')?.percent).toBe(0);
  });

  it('ignores lines that are not key=value', () => {
    const reader = new FFmpegProgressReader(10);
    expect(reader.push('[mp4 @ 0x1] something happened')).toBeNull();
  });
});

describe('parseFFmpegTime', () => {
  it('parses hours, minutes and fractional seconds', () => {
    expect(parseFFmpegTime('01:02:03.5')).toBe(3723.5);
  });

  it('rejects other shapes', () => {
    expect(parseFFmpegTime('02:03')).toBeNull();
    expect(parseFFmpegTime('N/A')).toBeNull();
  });
});

describe('formatEncodeProgress', () => {
  it('includes speed only when known', () => {
    const base = { frame: 0, outTimeSeconds: 12.34, percent: 41.6, finished: false };

    expect(formatEncodeProgress('video', { ...base, speed: 2 })).toBe('video 42% (t: 12.3s, 2.00x)');
    expect(formatEncodeProgress('audio', { ...base, speed: 0 })).toBe('audio 42% (t: 12.3s)');
  });
});
