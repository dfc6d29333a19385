/**
 * FFmpeg Command Builder
 *
 * Fluent API for building FFmpeg argument lists.
 * Covers what segment rendering and joining need: seeked and looped inputs,
 * a complex filter graph, stream mapping, codec options and output flags.
 */

export interface InputOptions {
  seekTo?: number;        // -ss before input (fast seek)
  duration?: number;      // -t duration
  format?: string;        // -f format
  extraArgs?: string[];   // Additional input args, e.g. -loop 1
}

export interface OutputOptions {
  duration?: number;      // -t on the output
  frameRate?: number;     // -r
  movflags?: string;      // -movflags for mp4
  extraArgs?: string[];   // Additional output args
}

export interface StreamMapping {
  /** Input index, or a filter graph label such as "vout" */
  source: number | string;
  streamSpec?: string;    // e.g., 'v:0', 'a'
  optional?: boolean;     // Add ? for optional
}

export interface VideoCodecOptions {
  codec: string;
  preset?: string;
  crf?: number;
  bitrate?: string;
  bufsize?: string;
  pixFmt?: string;
  threads?: number;
  extraArgs?: string[];
}

export interface AudioCodecOptions {
  codec: string;
  bitrate?: string;
  extraArgs?: string[];
}

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | 'none' | null = null;
  private complexFilter: string | null = null;
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Enable hardware accelerated decoding
   */
  useHardwareAccel(type: 'cuda' | 'qsv' | 'videotoolbox' | 'vaapi', device?: string): this {
    this.globalArgs.push('-hwaccel', type);
    if (device) {
      this.globalArgs.push('-hwaccel_device', device);
    }
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string, optional: boolean = false): this {
    this.mappings.push({ source: inputIndex, streamSpec, optional });
    return this;
  }

  /**
   * Map the output pad of the complex filter graph
   */
  mapLabel(label: string): this {
    this.mappings.push({ source: label });
    return this;
  }

  /**
   * Set video codec (copy = no re-encode)
   */
  setVideoCodec(options: VideoCodecOptions | 'copy'): this {
    this.videoCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /**
   * Set audio codec (copy = no re-encode, none = drop audio)
   */
  setAudioCodec(options: AudioCodecOptions | 'copy' | 'none'): this {
    this.audioCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /**
   * Set complex filter graph
   */
  setComplexFilter(filterGraph: string): this {
    this.complexFilter = filterGraph;
    return this;
  }

  /**
   * Set output options
   */
  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Global args
    args.push(...this.globalArgs);

    // Inputs
    for (const input of this.inputs) {
      if (input.options.extraArgs) {
        args.push(...input.options.extraArgs);
      }
      if (input.options.seekTo !== undefined) {
        args.push('-ss', formatTime(input.options.seekTo));
      }
      if (input.options.duration !== undefined) {
        args.push('-t', formatTime(input.options.duration));
      }
      if (input.options.format) {
        args.push('-f', input.options.format);
      }
      args.push('-i', input.file);
    }

    // Complex filter (before mappings)
    if (this.complexFilter) {
      args.push('-filter_complex', this.complexFilter);
    }

    // Mappings
    for (const mapping of this.mappings) {
      if (typeof mapping.source === 'string') {
        args.push('-map', `[${mapping.source}]`);
      } else {
        const opt = mapping.optional ? '?' : '';
        args.push('-map', `${mapping.source}:${mapping.streamSpec ?? ''}${opt}`);
      }
    }

    // Video codec
    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);

      if (this.videoCodec.codec !== 'copy') {
        if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
        if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
        if (this.videoCodec.bitrate) args.push('-b:v', this.videoCodec.bitrate);
        if (this.videoCodec.bufsize) args.push('-bufsize', this.videoCodec.bufsize);
        if (this.videoCodec.pixFmt) args.push('-pix_fmt', this.videoCodec.pixFmt);
        if (this.videoCodec.threads !== undefined) args.push('-threads', this.videoCodec.threads.toString());
        if (this.videoCodec.extraArgs) args.push(...this.videoCodec.extraArgs);
      }
    }

    // Audio codec
    if (this.audioCodec === 'none') {
      args.push('-an');
    } else if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);

      if (this.audioCodec.codec !== 'copy') {
        if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
        if (this.audioCodec.extraArgs) args.push(...this.audioCodec.extraArgs);
      }
    }

    // Output options
    if (this.outputOpts.frameRate !== undefined) {
      args.push('-r', this.outputOpts.frameRate.toString());
    }
    if (this.outputOpts.duration !== undefined) {
      args.push('-t', formatTime(this.outputOpts.duration));
    }
    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }
    if (this.outputOpts.extraArgs) {
      args.push(...this.outputOpts.extraArgs);
    }

    // Output file
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}

/**
 * Seconds with millisecond precision, trailing zeros dropped
 */
export function formatTime(seconds: number): string {
  return Number(seconds.toFixed(3)).toString();
}
