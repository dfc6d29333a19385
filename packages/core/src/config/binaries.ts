/**
 * Binary Configuration
 *
 * Centralized configuration for the external encoder binaries.
 *
 * Priority order:
 * 1. Explicit override (e.g. FFMPEG_PATH from the validated environment)
 * 2. Environment variable
 * 3. System PATH
 */

import { existsSync } from 'node:fs';

/**
 * Binary configuration interface
 */
export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: 'override' | 'env' | 'path';
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

/**
 * Get executable name for current OS
 */
function withExeExt(name: string): string {
  return process.platform === 'win32' ? `${name}.exe` : name;
}

function resolveBinaryPath(name: string, envVar: string, override?: string): BinaryConfig {
  if (override) {
    return { name, envVar, resolvedPath: override, source: 'override' };
  }

  const envPath = process.env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  // Let the system PATH resolve it; a missing binary fails at spawn time
  return { name, envVar, resolvedPath: withExeExt(name), source: 'path' };
}

export function getBinariesConfig(overrides: { ffmpeg?: string; ffprobe?: string } = {}): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', overrides.ffmpeg),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', overrides.ffprobe),
  };
}
