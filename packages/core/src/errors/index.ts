/**
 * Custom Error Classes
 *
 * One class per failure reason. The job scheduler classifies whatever a
 * stage throws into a FailureReason and decides on retries from that alone.
 */

import type { JobState } from '../stateMachine.js';

export type FailureReason =
  | 'UNREADABLE'
  | 'TOO_SHORT'
  | 'INVALID_GEOMETRY'
  | 'ASSET_MISSING'
  | 'ENCODE_FAILED'
  | 'CORRUPT'
  | 'TRANSIENT_IO'
  | 'CANCELLED';

const RECOVERABLE_REASONS: ReadonlySet<FailureReason> = new Set<FailureReason>([
  'ENCODE_FAILED',
  'CORRUPT',
  'TRANSIENT_IO',
]);

/**
 * errno codes that indicate a passing condition rather than a broken input
 */
const TRANSIENT_ERRNO = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'EIO', 'ETIMEDOUT']);

/**
 * Base error class for all brandcast errors
 */
export class BrandcastError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BrandcastError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Base for errors that end a job with a specific reason
 */
export abstract class JobFailureError extends BrandcastError {
  public abstract readonly reason: FailureReason;

  get retryable(): boolean {
    return isRecoverable(this.reason);
  }
}

/**
 * Source file is not a readable video
 */
export class UnreadableVideoError extends JobFailureError {
  public readonly reason = 'UNREADABLE';

  constructor(path: string, cause: string) {
    super(`Unreadable video ${path}: ${cause}`, 'UNREADABLE', { path, cause });
    this.name = 'UnreadableVideoError';
  }
}

/**
 * Source is shorter than the segmentation threshold
 */
export class TooShortError extends JobFailureError {
  public readonly reason = 'TOO_SHORT';

  constructor(totalDuration: number, requiredDuration: number) {
    super(
      `Video too short (${totalDuration.toFixed(2)}s), need at least ${requiredDuration}s`,
      'TOO_SHORT',
      { totalDuration, requiredDuration }
    );
    this.name = 'TooShortError';
  }
}

/**
 * Overlay would be degenerate or fall outside the output frame
 */
export class InvalidGeometryError extends JobFailureError {
  public readonly reason = 'INVALID_GEOMETRY';

  constructor(asset: string, message: string, details: Record<string, unknown> = {}) {
    super(`Invalid ${asset} logo geometry: ${message}`, 'INVALID_GEOMETRY', { asset, ...details });
    this.name = 'InvalidGeometryError';
  }
}

/**
 * A logo asset is missing or unreadable
 */
export class AssetMissingError extends JobFailureError {
  public readonly reason = 'ASSET_MISSING';

  constructor(path: string, cause?: string) {
    super(
      cause ? `Required asset not usable: ${path} (${cause})` : `Required asset not found: ${path}`,
      'ASSET_MISSING',
      { path }
    );
    this.name = 'AssetMissingError';
  }
}

/**
 * The encoder exited non-zero
 */
export class EncodeFailedError extends JobFailureError {
  public readonly reason = 'ENCODE_FAILED';

  constructor(operation: string, exitCode: number, stderr: string) {
    super(
      `${operation} failed with exit code ${exitCode}`,
      'ENCODE_FAILED',
      { operation, exitCode, stderr: stderr.slice(-1000) }
    );
    this.name = 'EncodeFailedError';
  }
}

/**
 * Joined output failed validation
 */
export class CorruptOutputError extends JobFailureError {
  public readonly reason = 'CORRUPT';

  constructor(path: string, message: string, details: Record<string, unknown> = {}) {
    super(`Output ${path} failed validation: ${message}`, 'CORRUPT', { path, ...details });
    this.name = 'CorruptOutputError';
  }
}

/**
 * Filesystem or process hiccup expected to clear on its own
 */
export class TransientIOError extends JobFailureError {
  public readonly reason = 'TRANSIENT_IO';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSIENT_IO', details);
    this.name = 'TransientIOError';
  }
}

/**
 * Job was cancelled (shutdown or explicit cancel)
 */
export class CancelledError extends JobFailureError {
  public readonly reason = 'CANCELLED';

  constructor(jobId?: string) {
    super(jobId ? `Job ${jobId} cancelled` : 'Operation cancelled', 'CANCELLED', jobId ? { jobId } : undefined);
    this.name = 'CancelledError';
  }
}

/**
 * Settings file or environment failed validation
 */
export class ConfigurationError extends BrandcastError {
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}:\n  - ${issues.join('\n  - ')}`, 'CONFIGURATION_ERROR', { source, issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends BrandcastError {
  constructor(
    jobId: string,
    fromState: JobState,
    toState: JobState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

export function isRecoverable(reason: FailureReason): boolean {
  return RECOVERABLE_REASONS.has(reason);
}

/**
 * Map anything a pipeline stage threw onto a FailureReason.
 * Unrecognised errors count as transient so they get the bounded retry.
 */
export function classifyFailure(error: unknown): FailureReason {
  if (error instanceof JobFailureError) {
    return error.reason;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    if (TRANSIENT_ERRNO.has(error.code)) return 'TRANSIENT_IO';
    if (error.code === 'ABORT_ERR') return 'CANCELLED';
  }
  return 'TRANSIENT_IO';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
