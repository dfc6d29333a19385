/**
 * Worker Logger
 */

import type { Settings } from '@brandcast/core';
import { createRootLogger, type Logger } from '@brandcast/utils';
import { config } from '../config/index.js';

export function createWorkerLogger(settings: Settings): Logger {
  return createRootLogger({
    level: config.logLevel ?? settings.logging.level,
    service: 'brandcast-worker',
    env: config.nodeEnv,
    file: settings.logging.file,
  });
}
