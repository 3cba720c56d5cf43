/**
 * Segment Encoder
 * 
 * Cuts one chapter range out of local media with ffmpeg, in two passes:
 * the audio track first (into a temporary .m4a), then the video with the
 * prepared audio muxed back in. Media without a usable audio track falls
 * back to a video-only output.
 * 
 * The encoder narrates each pass as plain log lines through `onLine`;
 * the progress state machine turns those into percentages. Narration
 * never carries file names: a chapter title must not read as a stage
 * marker.
 */

import {
  EncodeError,
  describeRange,
  rebaseRange,
  type EncodeRequest,
  type EncodeResult,
  type SegmentEncoder,
} from '@chaptercut/core';
import {
  createLogger,
  errorMessage,
  executeCommand,
  formatMegabytes,
  getFileSizeBytes,
  pathExists,
  removePath,
  type CommandResult,
  type CommandRunner,
} from '@chaptercut/utils';
import { SegmentCommandBuilder } from './commandBuilder.js';
import { FFmpegProgressReader, formatEncodeProgress } from './ffmpegProgress.js';

const log = createLogger({ module: 'encoder' });

export interface SegmentEncoderOptions {
  ffmpegPath?: string;
  runner?: CommandRunner;
  /** Per-pass timeout in milliseconds */
  timeout?: number;
  preset?: string;
  crf?: number;
  audioBitrate?: string;
  /** Outputs larger than this are removed and the encode fails */
  maxOutputSizeMb?: number;
}

interface PassContext {
  label: string;
  durationSeconds: number;
  onLine: (line: string) => void;
  signal?: AbortSignal;
}

export class FFmpegSegmentEncoder implements SegmentEncoder {
  private readonly ffmpegPath: string;
  private readonly runner: CommandRunner;
  private readonly timeout: number;
  private readonly preset: string;
  private readonly crf: number;
  private readonly audioBitrate: string;
  private readonly maxOutputSizeMb: number | undefined;

  constructor(options: SegmentEncoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.runner = options.runner ?? executeCommand;
    this.timeout = options.timeout ?? 3600000; // 1 hour
    this.preset = options.preset ?? 'veryfast';
    this.crf = options.crf ?? 23;
    this.audioBitrate = options.audioBitrate ?? '128k';
    this.maxOutputSizeMb = options.maxOutputSizeMb;
  }

  async encode(request: EncodeRequest): Promise<EncodeResult> {
    const { media, outputPath, signal } = request;
    const onLine = request.onLine ?? (() => undefined);
    const range = rebaseRange(request.range, media.offsetSeconds);
    const durationSeconds = range.endSeconds - range.startSeconds;
    const startedAt = Date.now();

    if (durationSeconds <= 0) {
      throw new EncodeError(outputPath, `Nothing to encode for ${describeRange(request.range)}`);
    }

    const audioPath = `${outputPath}.audio.m4a`;
    log.debug({ outputPath, range: describeRange(request.range) }, 'Building segment');
    onLine('Building segment');

    try {
      const hasAudio = await this.encodeAudio(media.path, range.startSeconds, audioPath, {
        label: 'audio',
        durationSeconds,
        onLine,
        signal,
      });

      log.debug({ outputPath }, 'Writing video');
      onLine('Writing video');
      const builder = new SegmentCommandBuilder()
        .withProgress()
        .addInputWithSeek(media.path, range.startSeconds, durationSeconds);

      if (hasAudio) {
        builder
          .addInput(audioPath)
          .map(0, 'v:0')
          .map(1, 'a:0')
          .setAudioCodec('copy');
      } else {
        builder.map(0, 'v:0').noAudio();
      }

      const args = builder
        .setVideoCodec({ codec: 'libx264', preset: this.preset, crf: this.crf, pixFmt: 'yuv420p' })
        .setOutputOptions({ movflags: '+faststart' })
        .setOutput(outputPath)
        .build();

      const result = await this.runPass(args, { label: 'video', durationSeconds, onLine, signal });
      if (result.exitCode !== 0) {
        throw new EncodeError(
          outputPath,
          result.timedOut
            ? 'Video pass timed out'
            : `Video pass failed with exit code ${result.exitCode}`,
          result.stderr
        );
      }
      onLine('Done !');
    } catch (error) {
      if (error instanceof EncodeError) throw error;
      throw new EncodeError(outputPath, `Encode failed: ${errorMessage(error)}`);
    } finally {
      await removePath(audioPath);
    }

    if (!(await pathExists(outputPath))) {
      throw new EncodeError(outputPath, 'Encoder reported success but wrote no output');
    }

    const sizeBytes = await getFileSizeBytes(outputPath);
    if (this.maxOutputSizeMb !== undefined && sizeBytes > this.maxOutputSizeMb * 1024 * 1024) {
      await removePath(outputPath);
      throw new EncodeError(
        outputPath,
        `Output file too large (${formatMegabytes(sizeBytes)}, limit ${this.maxOutputSizeMb} MB)`
      );
    }

    const durationMs = Date.now() - startedAt;
    log.info({ outputPath, sizeBytes, durationMs }, 'Segment encoded');

    return { outputPath, sizeBytes, durationMs };
  }

  /**
   * Returns false when the audio pass failed and the video pass should
   * go ahead without audio.
   */
  private async encodeAudio(
    inputPath: string,
    startSeconds: number,
    audioPath: string,
    context: PassContext
  ): Promise<boolean> {
    log.debug({ audioPath }, 'Writing audio');
    context.onLine('Writing audio');

    const args = new SegmentCommandBuilder()
      .withProgress()
      .addInputWithSeek(inputPath, startSeconds, context.durationSeconds)
      .map(0, 'a:0')
      .noVideo()
      .setAudioCodec({ codec: 'aac', bitrate: this.audioBitrate })
      .setOutput(audioPath)
      .build();

    const result = await this.runPass(args, context);
    context.onLine('Done.');

    if (result.exitCode !== 0) {
      log.warn(
        { inputPath, exitCode: result.exitCode, stderr: result.stderr.substring(0, 500) },
        'Audio pass failed, continuing without audio'
      );
      return false;
    }
    return true;
  }

  private async runPass(args: string[], context: PassContext): Promise<CommandResult> {
    const reader = new FFmpegProgressReader(context.durationSeconds);

    log.debug({ pass: context.label, args }, 'Running ffmpeg pass');

    return this.runner(this.ffmpegPath, args, {
      timeout: this.timeout,
      signal: context.signal,
      onStdoutLine: (line) => {
        const snapshot = reader.push(line);
        if (snapshot) {
          context.onLine(formatEncodeProgress(context.label, snapshot));
        }
      },
      onStderrLine: (line) => {
        log.debug({ pass: context.label, line }, 'ffmpeg');
      },
    });
  }
}
