/**
 * FFmpeg Command Builder
 * 
 * Fluent API for the two commands a segment cut needs: an audio-only
 * pass and a video pass that muxes the prepared audio back in.
 */

export interface InputOptions {
  seekTo?: number;        // -ss before input (fast seek)
  duration?: number;      // -t duration
}

export interface OutputOptions {
  movflags?: string;      // -movflags for mp4
}

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g. 'v:0', 'a:0'
}

export interface VideoCodecOptions {
  codec: 'copy' | 'libx264';
  preset?: string;
  crf?: number;
  pixFmt?: string;
}

export interface AudioCodecOptions {
  codec: 'copy' | 'aac';
  bitrate?: string;
}

export class SegmentCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private dropVideo = false;
  private dropAudio = false;
  private outputOpts: OutputOptions = {};
  private outputFile = '';
  private globalArgs: string[] = ['-y', '-hide_banner', '-loglevel', 'error', '-nostats'];

  /**
   * Stream machine-readable key=value progress to stdout
   */
  withProgress(): this {
    this.globalArgs.push('-progress', 'pipe:1');
    return this;
  }

  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Add input with seeking
   */
  addInputWithSeek(file: string, seekSeconds: number, duration?: number): this {
    return this.addInput(file, { seekTo: seekSeconds, duration });
  }

  map(inputIndex: number, streamSpec: string): this {
    this.mappings.push({ inputIndex, streamSpec });
    return this;
  }

  setVideoCodec(options: VideoCodecOptions | 'copy'): this {
    this.videoCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audioCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /** -vn */
  noVideo(): this {
    this.dropVideo = true;
    return this;
  }

  /** -an */
  noAudio(): this {
    this.dropAudio = true;
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [...this.globalArgs];

    for (const input of this.inputs) {
      if (input.options.seekTo !== undefined) {
        args.push('-ss', formatSeconds(input.options.seekTo));
      }
      if (input.options.duration !== undefined) {
        args.push('-t', formatSeconds(input.options.duration));
      }
      args.push('-i', input.file);
    }

    for (const mapping of this.mappings) {
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}`);
    }

    if (this.dropVideo) {
      args.push('-vn');
    } else if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      if (this.videoCodec.codec !== 'copy') {
        if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
        if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
        if (this.videoCodec.pixFmt) args.push('-pix_fmt', this.videoCodec.pixFmt);
      }
    }

    if (this.dropAudio) {
      args.push('-an');
    } else if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.codec !== 'copy') {
        if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
      }
    }

    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}

// Millisecond precision, without trailing zeros
function formatSeconds(seconds: number): string {
  return Number(seconds.toFixed(3)).toString();
}
