/**
 * Settings Schema
 *
 * settings.json keeps the sectioned snake_case layout operators already
 * know. It is validated here and transformed into the camelCase Settings
 * model every other package consumes.
 */

import { z } from 'zod';
import { DEFAULT_VIDEO_EXTENSIONS } from '../types/video.js';

const logLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
const pixelOffset = z.tuple([z.number().int().min(0), z.number().int().min(0)]);
const opacity = z.number().min(0).max(1);
const scale = z.number().gt(0).max(10);
const logoSize = z.number().int().positive();
const bitrate = z.string().regex(/^\d+(\.\d+)?[kKmM]?$/, 'expected a bitrate such as 4000k or 4M');

const videoProcessingSchema = z.object({
  intro_duration: z.number().min(0),
  outro_duration: z.number().min(0),
  min_video_duration: z.number().min(0).default(6),
  input_dir: z.string().min(1).default('input'),
  output_dir: z.string().min(1).default('output'),
  processed_dir: z.string().min(1).default('processed'),
  failed_dir: z.string().min(1).nullable().default(null),
  temp_dir: z.string().min(1).default('temp'),
  supported_extensions: z
    .array(z.string().regex(/^\.[a-z0-9]+$/i, 'extensions start with a dot'))
    .min(1)
    .default([...DEFAULT_VIDEO_EXTENSIONS]),
}).strict();

const staticLogoSchema = z.object({
  file: z.string().min(1).default('assets/static_logo.png'),
  position: pixelOffset.default([20, 20]),
  height: logoSize.nullable().default(80),
  width: logoSize.nullable().default(null),
  opacity: opacity.default(1),
  scale: scale.default(1),
}).strict();

const animatedLogoSchema = z.object({
  file: z.string().min(1).default('assets/video_logo.mp4'),
  position: z.union([z.literal('center'), pixelOffset]).default('center'),
  bottom_margin: z.number().int().min(0).default(120),
  height: logoSize.nullable().default(100),
  width: logoSize.nullable().default(null),
  opacity: opacity.default(1),
  scale: scale.default(1),
}).strict();

const outputSettingsSchema = z.object({
  video_codec: z.string().min(1).default('libx264'),
  audio_codec: z.string().min(1).default('aac'),
  preserve_audio: z.boolean().default(true),
  crf: z.number().int().min(0).max(51).nullable().default(23),
  preset: z.string().min(1).nullable().default('medium'),
  bitrate: bitrate.nullable().default(null),
  audio_bitrate: bitrate.nullable().default(null),
  fps: z.number().positive().max(240).nullable().default(null),
  pixel_format: z.string().min(1).default('yuv420p'),
}).strict();

const qualitySettingsSchema = z.object({
  enable_hardware_acceleration: z.boolean().default(false),
  gpu_codec: z.string().min(1).default('h264_nvenc'),
  hwaccel: z.enum(['cuda', 'qsv', 'videotoolbox', 'vaapi']).nullable().default(null),
  threads: z.number().int().min(0).nullable().default(null),
  buffer_size: bitrate.nullable().default(null),
}).strict();

const performanceSettingsSchema = z.object({
  max_concurrent_processes: z.number().int().min(1).max(64).default(1),
  memory_limit_mb: z.number().int().min(64).default(2048),
  memory_headroom: z.number().min(1).max(4).default(1.25),
  assumed_resolution: z.tuple([z.number().int().positive(), z.number().int().positive()]).default([1920, 1080]),
  parallel_processing: z.boolean().default(false),
  max_parallel_segments: z.number().int().min(1).max(3).default(3),
  cleanup_temp_files: z.boolean().default(true),
  encoder_timeout_ms: z.number().int().positive().default(3600000),
}).strict();

const fileManagementSchema = z.object({
  output_naming: z.enum(['timestamp', 'sequential', 'simple']).default('timestamp'),
  source_action: z.enum(['move', 'delete']).default('move'),
  counter_file: z.string().min(1).nullable().default(null),
}).strict();

const advancedSettingsSchema = z.object({
  log_level: logLevel.default('info'),
  log_file: z.string().min(1).nullable().default('video_processor.log'),
  validate_output: z.boolean().default(true),
  duration_tolerance_seconds: z.number().min(0).default(1),
  retry_failed_processing: z.boolean().default(true),
  max_retry_attempts: z.number().int().min(0).max(20).default(3),
  retry_initial_delay_ms: z.number().int().min(0).default(1000),
  retry_max_delay_ms: z.number().int().min(0).default(30000),
  file_stability_ms: z.number().int().min(100).default(2000),
  keep_temp_files: z.boolean().default(false),
}).strict();

export const settingsFileSchema = z.object({
  video_processing: videoProcessingSchema,
  logo_configuration: z.object({
    static_logo: staticLogoSchema.default({}),
    animated_logo: animatedLogoSchema.default({}),
  }).strict().default({}),
  output_settings: outputSettingsSchema.default({}),
  quality_settings: qualitySettingsSchema.default({}),
  performance_settings: performanceSettingsSchema.default({}),
  file_management: fileManagementSchema.default({}),
  advanced_settings: advancedSettingsSchema.default({}),
}).strict().superRefine((value, ctx) => {
  if (value.advanced_settings.retry_max_delay_ms < value.advanced_settings.retry_initial_delay_ms) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['advanced_settings', 'retry_max_delay_ms'],
      message: 'must be greater than or equal to retry_initial_delay_ms',
    });
  }
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;
