/**
 * Settings Loader
 *
 * Reads settings.json once at process start. The result is never re-read.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { ZodError } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { settingsFileSchema } from './schema.js';
import { toSettings, type Settings } from './model.js';

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate an already-parsed settings object
 */
export function parseSettings(raw: unknown, baseDir: string, source = 'settings'): Settings {
  const result = settingsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(source, formatIssues(result.error));
  }
  return toSettings(result.data, baseDir);
}

/**
 * Load and validate a settings file
 */
export async function loadSettings(settingsPath: string): Promise<Settings> {
  const absolute = resolve(settingsPath);

  let content: string;
  try {
    content = await readFile(absolute, 'utf8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : 'unknown error';
    throw new ConfigurationError(absolute, [`cannot read file (${code})`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(absolute, [`not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }

  return parseSettings(raw, dirname(absolute), absolute);
}
