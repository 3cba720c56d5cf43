import { describe, it, expect } from 'vitest';
import { SegmentCommandBuilder } from './commandBuilder.js';

const GLOBALS = ['-y', '-hide_banner', '-loglevel', 'error', '-nostats'];

describe('SegmentCommandBuilder', () => {
  it('builds an audio-only pass', () => {
    const args = new SegmentCommandBuilder()
      .addInputWithSeek('in.mp4', 12.5, 30)
      .map(0, 'a:0')
      .noVideo()
      .setAudioCodec({ codec: 'aac', bitrate: '128k' })
      .setOutput('out.m4a')
      .build();

    expect(args).toEqual([
      ...GLOBALS,
      '-ss', '12.5', '-t', '30', '-i', 'in.mp4',
      '-map', '0:a:0',
      '-vn',
      '-c:a', 'aac', '-b:a', '128k',
      'out.m4a',
    ]);
  });

  it('builds a video pass that muxes prepared audio', () => {
    const args = new SegmentCommandBuilder()
      .withProgress()
      .addInputWithSeek('in.mp4', 0, 60)
      .addInput('audio.m4a')
      .map(0, 'v:0')
      .map(1, 'a:0')
      .setVideoCodec({ codec: 'libx264', preset: 'veryfast', crf: 23, pixFmt: 'yuv420p' })
      .setAudioCodec('copy')
      .setOutputOptions({ movflags: '+faststart' })
      .setOutput('out.mp4')
      .build();

    expect(args).toEqual([
      ...GLOBALS,
      '-progress', 'pipe:1',
      '-ss', '0', '-t', '60', '-i', 'in.mp4',
      '-i', 'audio.m4a',
      '-map', '0:v:0', '-map', '1:a:0',
      '-c:v', 'libx264', '-preset', 'veryfast', '-crf', '23', '-pix_fmt', 'yuv420p',
      '-c:a', 'copy',
      '-movflags', '+faststart',
      'out.mp4',
    ]);
  });

  it('rounds seek positions to milliseconds', () => {
    const args = new SegmentCommandBuilder()
      .addInputWithSeek('in.mp4', 1 / 3)
      .setOutput('out.mp4')
      .build();

    expect(args.slice(GLOBALS.length)).toEqual(['-ss', '0.333', '-i', 'in.mp4', 'out.mp4']);
  });

  it('skips codec options when copying', () => {
    const args = new SegmentCommandBuilder()
      .addInput('in.mp4')
      .setVideoCodec('copy')
      .setOutput('out.mp4')
      .build();

    expect(args.slice(GLOBALS.length)).toEqual(['-i', 'in.mp4', '-c:v', 'copy', 'out.mp4']);
  });

  it('requires an output file', () => {
    expect(() => new SegmentCommandBuilder().addInput('in.mp4').build()).toThrow(
      'Output file not specified'
    );
  });
});
