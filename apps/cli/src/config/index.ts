/**
 * CLI Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';

// .env in the working directory supplies FFMPEG_PATH / FFPROBE_PATH like the worker's
dotenvConfig();

const envSchema = z.object({
  BRANDCAST_SETTINGS: z.string().min(1).optional(),
  BRANDCAST_DEBUG: z.string().optional(),
});

const env = envSchema.parse(process.env);

export const DEFAULT_SETTINGS_PATH = 'settings.json';

/**
 * Settings file to use: --settings, then BRANDCAST_SETTINGS, then ./settings.json
 */
export function resolveSettingsPath(option?: string): string {
  return resolve(option ?? env.BRANDCAST_SETTINGS ?? DEFAULT_SETTINGS_PATH);
}

export function isDebugEnabled(flag?: boolean): boolean {
  return flag === true || env.BRANDCAST_DEBUG === '1' || env.BRANDCAST_DEBUG === 'true';
}
