/**
 * Settings Model
 *
 * Immutable snapshot of every tunable, built once at process start.
 */

import { isAbsolute, join, resolve } from 'node:path';
import type { Position } from '../types/overlay.js';
import type { SettingsFile } from './schema.js';

export type OutputNaming = 'timestamp' | 'sequential' | 'simple';
export type SourceAction = 'move' | 'delete';
export type HwAccel = 'cuda' | 'qsv' | 'videotoolbox' | 'vaapi';
export type SettingsLogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LogoSettings {
  readonly file: string;
  readonly position: Position;
  /** Target height before scaling; null follows the width or the asset */
  readonly height: number | null;
  readonly width: number | null;
  readonly opacity: number;
  readonly scale: number;
}

export interface SegmentSettings {
  readonly introDuration: number;
  readonly outroDuration: number;
  readonly minDuration: number;
}

export interface DirectorySettings {
  readonly input: string;
  readonly output: string;
  readonly processed: string;
  readonly failed: string | null;
  readonly temp: string;
}

export interface OutputSettings {
  readonly videoCodec: string;
  readonly audioCodec: string;
  readonly preserveAudio: boolean;
  readonly crf: number | null;
  readonly preset: string | null;
  readonly bitrate: string | null;
  readonly audioBitrate: string | null;
  readonly fps: number | null;
  readonly pixelFormat: string;
}

export interface QualitySettings {
  readonly hardwareAcceleration: boolean;
  readonly gpuCodec: string;
  readonly hwaccel: HwAccel | null;
  readonly threads: number | null;
  readonly bufferSize: string | null;
}

export interface PerformanceSettings {
  readonly maxConcurrentProcesses: number;
  readonly memoryLimitBytes: number;
  readonly memoryHeadroom: number;
  readonly assumedResolution: { readonly width: number; readonly height: number };
  readonly parallelSegments: boolean;
  readonly maxParallelSegments: number;
  readonly encoderTimeoutMs: number;
}

export interface FileManagementSettings {
  readonly outputNaming: OutputNaming;
  readonly sourceAction: SourceAction;
  readonly counterFile: string;
}

export interface RetrySettings {
  /** Retries after the first attempt; 0 when retrying is disabled */
  readonly maxRetryAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
}

export interface Settings {
  readonly segments: SegmentSettings;
  readonly directories: DirectorySettings;
  readonly supportedExtensions: readonly string[];
  readonly logos: {
    readonly static: LogoSettings;
    readonly animated: LogoSettings;
  };
  readonly output: OutputSettings;
  readonly quality: QualitySettings;
  readonly performance: PerformanceSettings;
  readonly files: FileManagementSettings;
  readonly retry: RetrySettings;
  readonly logging: {
    readonly level: SettingsLogLevel;
    readonly file: string | null;
  };
  readonly validation: {
    readonly enabled: boolean;
    readonly durationToleranceSeconds: number;
  };
  readonly watcher: {
    readonly stabilityMs: number;
  };
  readonly keepTempFiles: boolean;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Build the Settings model from a validated settings file.
 * Relative paths resolve against `baseDir` (the settings file's directory).
 */
export function toSettings(file: SettingsFile, baseDir: string): Settings {
  const at = (p: string) => (isAbsolute(p) ? p : resolve(baseDir, p));
  const vp = file.video_processing;
  const { static_logo: staticLogo, animated_logo: animatedLogo } = file.logo_configuration;
  const perf = file.performance_settings;
  const adv = file.advanced_settings;
  const output = at(vp.output_dir);

  const animatedPosition: Position = animatedLogo.position === 'center'
    ? { kind: 'centered', bottomMargin: animatedLogo.bottom_margin }
    : { kind: 'absolute', x: animatedLogo.position[0], y: animatedLogo.position[1] };

  return deepFreeze<Settings>({
    segments: {
      introDuration: vp.intro_duration,
      outroDuration: vp.outro_duration,
      minDuration: vp.min_video_duration,
    },
    directories: {
      input: at(vp.input_dir),
      output,
      processed: at(vp.processed_dir),
      failed: vp.failed_dir === null ? null : at(vp.failed_dir),
      temp: at(vp.temp_dir),
    },
    supportedExtensions: vp.supported_extensions.map((ext) => ext.toLowerCase()),
    logos: {
      static: {
        file: at(staticLogo.file),
        position: { kind: 'absolute', x: staticLogo.position[0], y: staticLogo.position[1] },
        height: staticLogo.height,
        width: staticLogo.width,
        opacity: staticLogo.opacity,
        scale: staticLogo.scale,
      },
      animated: {
        file: at(animatedLogo.file),
        position: animatedPosition,
        height: animatedLogo.height,
        width: animatedLogo.width,
        opacity: animatedLogo.opacity,
        scale: animatedLogo.scale,
      },
    },
    output: {
      videoCodec: file.output_settings.video_codec,
      audioCodec: file.output_settings.audio_codec,
      preserveAudio: file.output_settings.preserve_audio,
      crf: file.output_settings.crf,
      preset: file.output_settings.preset,
      bitrate: file.output_settings.bitrate,
      audioBitrate: file.output_settings.audio_bitrate,
      fps: file.output_settings.fps,
      pixelFormat: file.output_settings.pixel_format,
    },
    quality: {
      hardwareAcceleration: file.quality_settings.enable_hardware_acceleration,
      gpuCodec: file.quality_settings.gpu_codec,
      hwaccel: file.quality_settings.hwaccel,
      threads: file.quality_settings.threads,
      bufferSize: file.quality_settings.buffer_size,
    },
    performance: {
      maxConcurrentProcesses: perf.max_concurrent_processes,
      memoryLimitBytes: perf.memory_limit_mb * 1024 * 1024,
      memoryHeadroom: perf.memory_headroom,
      assumedResolution: { width: perf.assumed_resolution[0], height: perf.assumed_resolution[1] },
      parallelSegments: perf.parallel_processing,
      maxParallelSegments: perf.max_parallel_segments,
      encoderTimeoutMs: perf.encoder_timeout_ms,
    },
    files: {
      outputNaming: file.file_management.output_naming,
      sourceAction: file.file_management.source_action,
      counterFile: file.file_management.counter_file === null
        ? join(output, '.sequence.json')
        : at(file.file_management.counter_file),
    },
    retry: {
      maxRetryAttempts: adv.retry_failed_processing ? adv.max_retry_attempts : 0,
      initialDelayMs: adv.retry_initial_delay_ms,
      maxDelayMs: adv.retry_max_delay_ms,
    },
    logging: {
      level: adv.log_level,
      file: adv.log_file === null ? null : at(adv.log_file),
    },
    validation: {
      enabled: adv.validate_output,
      durationToleranceSeconds: adv.duration_tolerance_seconds,
    },
    watcher: {
      stabilityMs: adv.file_stability_ms,
    },
    keepTempFiles: adv.keep_temp_files || !perf.cleanup_temp_files,
  });
}
