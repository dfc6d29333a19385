/**
 * @brandcast/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Retry backoff policy
 * - Path and time helpers
 * - Serial task queue
 * - Logger
 */

// Command execution
export {
  executeCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  pathExists,
  isReadable,
  getFileSizeBytes,
  moveFile,
  removeFile,
  removeDir,
} from './file.js';

// Retry policy
export {
  computeBackoffDelay,
  canRetry,
  defaultRetryPolicy,
  type RetryPolicy,
} from './retry.js';

// Path utilities
export {
  getJobDir,
  getExtension,
  getBasename,
} from './path.js';

// Time utilities
export {
  formatDuration,
  formatSeconds,
  formatFileTimestamp,
} from './time.js';

// Serial execution
export { SerialQueue } from './serial.js';

// Logger
export {
  logger,
  createLogger,
  createRootLogger,
  isLogLevel,
  type Logger,
  type LogLevel,
  type RootLoggerOptions,
} from './logger.js';
