/**
 * Command Context
 *
 * Settings, logger and service shared by every command.
 */

import type { Command } from 'commander';
import { loadSettings, type Settings } from '@brandcast/core';
import { BrandcastService } from '@brandcast/pipeline';
import { createRootLogger, type Logger } from '@brandcast/utils';
import { isDebugEnabled, resolveSettingsPath } from '../config/index.js';

export interface GlobalOptions {
  settings?: string;
  json?: boolean;
  debug?: boolean;
}

export interface CommandContext {
  settingsPath: string;
  settings: Settings;
  service: BrandcastService;
  logger: Logger;
  json: boolean;
}

export function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    settings: typeof opts['settings'] === 'string' ? opts['settings'] : undefined,
    json: opts['json'] === true,
    debug: opts['debug'] === true,
  };
}

export async function createContext(options: GlobalOptions): Promise<CommandContext> {
  const settingsPath = resolveSettingsPath(options.settings);
  const settings = await loadSettings(settingsPath);

  // Keep pino quiet unless asked; the spinner owns the terminal
  const logger = createRootLogger({
    level: isDebugEnabled(options.debug) ? 'debug' : 'warn',
    service: 'brandcast-cli',
  });

  const service = new BrandcastService({ settings, logger });
  return { settingsPath, settings, service, logger, json: options.json === true };
}
