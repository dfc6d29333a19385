/**
 * Path Utilities
 */

import { join, extname, basename } from 'node:path';

/**
 * Get the working directory for one attempt of a job
 */
export function getJobDir(tempRoot: string, jobId: string, attempt?: number): string {
  const jobDir = join(tempRoot, jobId);
  return attempt === undefined ? jobDir : join(jobDir, `attempt-${attempt}`);
}

/**
 * Get file extension (lowercase, with dot)
 */
export function getExtension(filename: string): string {
  return extname(filename).toLowerCase();
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}
