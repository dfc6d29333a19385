/**
 * Media Encoder
 *
 * The external encoder seen by the composition engine: probe a file,
 * transcode one segment with its overlays, and concatenate rendered
 * segments. FFmpegEncoder drives ffmpeg/ffprobe; tests substitute fakes.
 */

import { dirname, join } from 'node:path';
import {
  CancelledError,
  EncodeFailedError,
  type OutputSettings,
  type OverlayInstruction,
  type QualitySettings,
  type VideoDescriptor,
} from '@brandcast/core';
import type { VideoProbe } from '@brandcast/media';
import { createLogger, safeWriteFile, type CommandResult, type Logger } from '@brandcast/utils';
import { FFmpegCommandBuilder } from './commandBuilder.js';
import { buildAudioCodecOptions, buildVideoCodecOptions } from './codecOptions.js';
import { FFmpeg } from './ffmpeg.js';
import { FILTER_OUTPUT_LABEL, buildOverlayFilterGraph, logoInputArgs } from './filterGraph.js';

export interface TranscodeRequest {
  source: string;
  /** Seconds into the source */
  start: number;
  /** Seconds to render */
  duration: number;
  overlays: readonly OverlayInstruction[];
  output: string;
}

export interface MediaEncoder extends VideoProbe {
  transcode(request: TranscodeRequest, signal?: AbortSignal): Promise<void>;
  concat(inputs: readonly string[], output: string, signal?: AbortSignal): Promise<void>;
}

export interface FFmpegEncoderOptions {
  ffmpeg: FFmpeg;
  probe: VideoProbe;
  output: OutputSettings;
  quality: QualitySettings;
  logger?: Logger;
}

/**
 * Quote a path for an ffconcat list
 */
export function quoteConcatPath(path: string): string {
  return `'${path.replace(/'/g, `'\\''`)}'`;
}

export function buildConcatList(inputs: readonly string[]): string {
  return `ffconcat version 1.0\n${inputs.map((input) => `file ${quoteConcatPath(input)}`).join('\n')}\n`;
}

export class FFmpegEncoder implements MediaEncoder {
  private readonly ffmpeg: FFmpeg;
  private readonly videoProbe: VideoProbe;
  private readonly output: OutputSettings;
  private readonly quality: QualitySettings;
  private readonly logger: Logger;

  constructor(options: FFmpegEncoderOptions) {
    this.ffmpeg = options.ffmpeg;
    this.videoProbe = options.probe;
    this.output = options.output;
    this.quality = options.quality;
    this.logger = createLogger({ module: 'ffmpeg-encoder' }, options.logger);
  }

  probe(path: string, signal?: AbortSignal): Promise<VideoDescriptor> {
    return this.videoProbe.probe(path, signal);
  }

  buildTranscodeArgs(request: TranscodeRequest): string[] {
    const builder = new FFmpegCommandBuilder();

    if (this.quality.hardwareAcceleration && this.quality.hwaccel !== null) {
      builder.useHardwareAccel(this.quality.hwaccel);
    }

    builder.addInput(request.source, { seekTo: request.start, duration: request.duration });
    for (const overlay of request.overlays) {
      builder.addInput(overlay.sourcePath, { extraArgs: logoInputArgs(overlay) });
    }

    builder
      .setComplexFilter(buildOverlayFilterGraph(request.overlays))
      .mapLabel(FILTER_OUTPUT_LABEL)
      .setVideoCodec(buildVideoCodecOptions(this.output, this.quality));

    const audio = buildAudioCodecOptions(this.output);
    if (audio !== 'none') {
      builder.map(0, 'a', true);
    }

    return builder
      .setAudioCodec(audio)
      .setOutputOptions({
        duration: request.duration,
        ...(this.output.fps !== null ? { frameRate: this.output.fps } : {}),
        movflags: '+faststart',
      })
      .setOutput(request.output)
      .build();
  }

  buildConcatArgs(listFile: string, output: string): string[] {
    const builder = new FFmpegCommandBuilder()
      .addInput(listFile, { format: 'concat', extraArgs: ['-safe', '0'] })
      .map(0, 'v');

    if (this.output.preserveAudio) {
      builder.map(0, 'a', true).setAudioCodec('copy');
    } else {
      builder.setAudioCodec('none');
    }

    return builder
      .setVideoCodec('copy')
      .setOutputOptions({ movflags: '+faststart' })
      .setOutput(output)
      .build();
  }

  async transcode(request: TranscodeRequest, signal?: AbortSignal): Promise<void> {
    const result = await this.ffmpeg.execute(this.buildTranscodeArgs(request), signal);
    this.check('render', result);
  }

  async concat(inputs: readonly string[], output: string, signal?: AbortSignal): Promise<void> {
    const listFile = join(dirname(output), 'concat.txt');
    await safeWriteFile(listFile, buildConcatList(inputs));

    const result = await this.ffmpeg.execute(this.buildConcatArgs(listFile, output), signal);
    this.check('join', result);
  }

  private check(operation: string, result: CommandResult): void {
    if (result.aborted) {
      throw new CancelledError();
    }
    if (result.timedOut) {
      throw new EncodeFailedError(`${operation} (timed out)`, result.exitCode, result.stderr);
    }
    if (result.exitCode !== 0) {
      this.logger.warn({ operation, exitCode: result.exitCode }, 'Encoder exited with an error');
      throw new EncodeFailedError(operation, result.exitCode, result.stderr);
    }
  }
}
