/**
 * FFProbe Wrapper
 *
 * Safe wrapper for ffprobe command execution.
 * Output is requested as JSON and validated before anyone reads it.
 */

import { z } from 'zod';
import { CancelledError, TransientIOError, UnreadableVideoError } from '@brandcast/core';
import { executeCommand, type CommandRunner } from '@brandcast/utils';

const streamSchema = z.object({
  index: z.number(),
  codec_type: z.string(),
  codec_name: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  r_frame_rate: z.string().optional(),
  avg_frame_rate: z.string().optional(),
  duration: z.string().optional(),
  disposition: z.record(z.number()).optional(),
}).passthrough();

const formatSchema = z.object({
  filename: z.string().optional(),
  format_name: z.string().optional(),
  duration: z.string().optional(),
  size: z.string().optional(),
}).passthrough();

export const ffprobeOutputSchema = z.object({
  format: formatSchema.optional(),
  streams: z.array(streamSchema).default([]),
});

export type FFProbeResult = z.infer<typeof ffprobeOutputSchema>;
export type FFProbeStream = FFProbeResult['streams'][number];

export interface FFProbeOptions {
  ffprobePath?: string;
  timeout?: number;
  runner?: CommandRunner;
}

export class FFProbe {
  readonly ffprobePath: string;
  private readonly timeout: number;
  private readonly run: CommandRunner;

  constructor(options: FFProbeOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.timeout = options.timeout ?? 60000;
    this.run = options.runner ?? executeCommand;
  }

  /**
   * Probe a media file and return its format and stream metadata
   */
  async probe(filePath: string, signal?: AbortSignal): Promise<FFProbeResult> {
    const args = [
      '-v', 'error',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    const result = await this.run(this.ffprobePath, args, {
      timeout: this.timeout,
      signal,
    });

    if (result.aborted) {
      throw new CancelledError();
    }
    if (result.timedOut) {
      throw new TransientIOError(`ffprobe timed out on ${filePath}`, { timeout: this.timeout });
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().split('\n').pop() || `exit code ${result.exitCode}`;
      throw new UnreadableVideoError(filePath, detail);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout);
    } catch {
      throw new UnreadableVideoError(filePath, `unparseable ffprobe output: ${result.stdout.substring(0, 200)}`);
    }

    const parsed = ffprobeOutputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UnreadableVideoError(filePath, `unexpected ffprobe output: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.run(this.ffprobePath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}

/**
 * First real picture stream, skipping embedded cover art
 */
export function findVideoStream(result: FFProbeResult): FFProbeStream | undefined {
  return result.streams.find(
    (stream) => stream.codec_type === 'video' && stream.disposition?.['attached_pic'] !== 1
  );
}

/**
 * Parse an ffprobe rational such as "30000/1001". Returns 0 when unknown.
 */
export function parseFrameRate(frameRate: string | undefined): number {
  if (!frameRate) return 0;
  const parts = frameRate.split('/');
  if (parts.length !== 2) return 0;
  const num = parseInt(parts[0] ?? '0', 10);
  const den = parseInt(parts[1] ?? '1', 10);
  if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) return 0;
  return num / den;
}

/**
 * Parse a duration field; NaN, "N/A" and missing values give null
 */
export function parseDuration(value: string | undefined): number | null {
  if (value === undefined) return null;
  const seconds = Number.parseFloat(value);
  return Number.isFinite(seconds) ? seconds : null;
}
