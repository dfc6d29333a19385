/**
 * Brandcast Service
 *
 * Wires settings, the encoder binaries, the composition engine, the file
 * lifecycle and the scheduler into one object the worker and the CLI share.
 */

import {
  getBinariesConfig,
  type JobReportSink,
  type ResolvedAssets,
  type Settings,
} from '@brandcast/core';
import { FileLifecycleManager } from '@brandcast/lifecycle';
import { AssetResolver, FFProbe, FFProbeVideoProbe } from '@brandcast/media';
import { CompositionEngine, FFmpeg, FFmpegEncoder, type MediaEncoder } from '@brandcast/processing';
import { createLogger, ensureDir, type CommandRunner, type Logger } from '@brandcast/utils';
import { JobPipeline } from './jobPipeline.js';
import { JobScheduler } from './jobScheduler.js';

export interface BrandcastServiceOptions {
  settings: Settings;
  ffmpegPath?: string;
  ffprobePath?: string;
  /** Replaces process spawning, mainly for tests */
  runner?: CommandRunner;
  /** Replaces the ffmpeg-backed encoder */
  encoder?: MediaEncoder;
  reportSink?: JobReportSink;
  clock?: () => Date;
  logger?: Logger;
}

export interface ToolStatus {
  ffmpeg: { path: string; available: boolean };
  ffprobe: { path: string; available: boolean };
}

export class BrandcastService {
  readonly settings: Settings;
  readonly ffprobe: FFProbe;
  readonly ffmpeg: FFmpeg;
  readonly encoder: MediaEncoder;
  readonly engine: CompositionEngine;
  readonly lifecycle: FileLifecycleManager;
  private readonly reportSink?: JobReportSink;
  private readonly logger: Logger;

  constructor(options: BrandcastServiceOptions) {
    const { settings } = options;
    const binaries = getBinariesConfig({ ffmpeg: options.ffmpegPath, ffprobe: options.ffprobePath });

    this.settings = settings;
    this.reportSink = options.reportSink;
    this.logger = options.logger ?? createLogger({ module: 'brandcast' });

    this.ffprobe = new FFProbe({ ffprobePath: binaries.ffprobe.resolvedPath, runner: options.runner });
    this.ffmpeg = new FFmpeg({
      ffmpegPath: binaries.ffmpeg.resolvedPath,
      runner: options.runner,
      timeout: settings.performance.encoderTimeoutMs,
      logger: this.logger,
    });
    this.encoder = options.encoder ?? new FFmpegEncoder({
      ffmpeg: this.ffmpeg,
      probe: new FFProbeVideoProbe(this.ffprobe),
      output: settings.output,
      quality: settings.quality,
      logger: this.logger,
    });
    this.engine = new CompositionEngine({
      encoder: this.encoder,
      durationToleranceSeconds: settings.validation.durationToleranceSeconds,
      logger: this.logger,
    });
    this.lifecycle = new FileLifecycleManager({
      directories: settings.directories,
      files: settings.files,
      clock: options.clock,
      logger: this.logger,
    });
  }

  async checkTools(): Promise<ToolStatus> {
    const [ffmpeg, ffprobe] = await Promise.all([this.ffmpeg.isAvailable(), this.ffprobe.isAvailable()]);
    return {
      ffmpeg: { path: this.ffmpeg.ffmpegPath, available: ffmpeg },
      ffprobe: { path: this.ffprobe.ffprobePath, available: ffprobe },
    };
  }

  /**
   * Create every configured directory that does not exist yet
   */
  async prepareDirectories(): Promise<void> {
    const { input, output, processed, failed, temp } = this.settings.directories;
    for (const dir of [input, output, processed, failed, temp]) {
      if (dir !== null) await ensureDir(dir);
    }
  }

  /**
   * Resolve both logos. Throws AssetMissingError when either is unusable.
   */
  resolveAssets(): Promise<ResolvedAssets> {
    return new AssetResolver(this.ffprobe, this.logger).resolve(this.settings.logos);
  }

  createPipeline(assets: ResolvedAssets): JobPipeline {
    return new JobPipeline({
      probe: this.encoder,
      engine: this.engine,
      assets,
      settings: this.settings,
      logger: this.logger,
    });
  }

  createScheduler(assets: ResolvedAssets): JobScheduler {
    return new JobScheduler({
      runner: this.createPipeline(assets),
      finalizer: this.lifecycle,
      settings: this.settings,
      reportSink: this.reportSink,
      logger: this.logger,
    });
  }
}
