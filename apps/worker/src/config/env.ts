/**
 * Worker Environment
 *
 * Process-level knobs only. Everything about how videos are branded lives
 * in settings.json.
 */

import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  // Overrides advanced_settings.log_level when set
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  SETTINGS_PATH: z.string().min(1).default('./settings.json'),

  // Media tools
  FFMPEG_PATH: z.string().min(1).optional(),
  FFPROBE_PATH: z.string().min(1).optional(),
});

export type WorkerEnv = z.infer<typeof envSchema>;

export interface WorkerConfig {
  nodeEnv: WorkerEnv['NODE_ENV'];
  logLevel: WorkerEnv['LOG_LEVEL'];
  settingsPath: string;
  mediaTools: {
    ffmpeg?: string;
    ffprobe?: string;
  };
}

/**
 * Validate the environment. Relative paths resolve against `rootDir`.
 */
export function parseWorkerEnv(
  env: Record<string, string | undefined>,
  rootDir: string
): { success: true; config: WorkerConfig } | { success: false; issues: string[] } {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }

  const parsed = result.data;
  return {
    success: true,
    config: {
      nodeEnv: parsed.NODE_ENV,
      logLevel: parsed.LOG_LEVEL,
      settingsPath: isAbsolute(parsed.SETTINGS_PATH) ? parsed.SETTINGS_PATH : resolve(rootDir, parsed.SETTINGS_PATH),
      mediaTools: {
        ffmpeg: parsed.FFMPEG_PATH,
        ffprobe: parsed.FFPROBE_PATH,
      },
    },
  };
}
