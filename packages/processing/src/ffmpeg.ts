/**
 * FFmpeg Wrapper
 *
 * Safe FFmpeg command execution with logging.
 */

import { executeCommand, type CommandResult, type CommandRunner, type Logger } from '@brandcast/utils';

export interface FFmpegOptions {
  ffmpegPath?: string;
  runner?: CommandRunner;
  /** Per-invocation timeout */
  timeout?: number;
  logger?: Logger;
}

export class FFmpeg {
  readonly ffmpegPath: string;
  private readonly run: CommandRunner;
  private readonly timeout: number;
  private readonly logger?: Logger;

  constructor(options: FFmpegOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.run = options.runner ?? executeCommand;
    this.timeout = options.timeout ?? 3600000; // 1 hour default
    this.logger = options.logger;
  }

  /**
   * Execute an FFmpeg command. Output files are always overwritten.
   */
  async execute(args: string[], signal?: AbortSignal): Promise<CommandResult> {
    const fullArgs = [
      '-hide_banner',
      '-nostdin',
      // stderr holds only errors, so its tail explains a failure
      '-nostats',
      '-loglevel', 'error',
      '-y', // Overwrite output
      ...args,
    ];

    this.logger?.debug({ command: this.ffmpegPath, args: fullArgs }, 'Running ffmpeg');

    const result = await this.run(this.ffmpegPath, fullArgs, {
      timeout: this.timeout,
      signal,
    });

    this.logger?.debug(
      { exitCode: result.exitCode, duration: result.duration, timedOut: result.timedOut, aborted: result.aborted },
      'ffmpeg finished'
    );

    return result;
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.run(this.ffmpegPath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
