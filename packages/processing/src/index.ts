/**
 * @chaptercut/processing
 * 
 * Segment cutting and encode progress:
 * - ffmpeg command builder and two-pass segment encoder
 * - `-progress pipe:1` reader
 * - Progress estimation state machine over encoder log lines
 */

// Encoder
export { FFmpegSegmentEncoder, type SegmentEncoderOptions } from './encoder.js';

// Command Builder
export {
  SegmentCommandBuilder,
  type InputOptions,
  type OutputOptions,
  type StreamMapping,
  type VideoCodecOptions,
  type AudioCodecOptions,
} from './commandBuilder.js';

// FFmpeg progress
export {
  FFmpegProgressReader,
  parseFFmpegTime,
  formatEncodeProgress,
  type EncodeProgressSnapshot,
} from './ffmpegProgress.js';

// Progress estimation
export * from './progress/index.js';
