/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import {
  mkdir,
  writeFile,
  readFile,
  stat,
  rename,
  rm,
  unlink,
  access,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { constants } from 'node:fs';
import { dirname, basename, join } from 'node:path';

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Write a file atomically: content goes to a sibling temp file which is then
 * renamed over the destination.
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  const tempPath = join(dirname(filePath), `.${basename(filePath)}.${process.pid}.tmp`);
  await writeFile(tempPath, content, typeof content === 'string' ? 'utf8' : undefined);
  await rename(tempPath, filePath);
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Check whether a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check whether a path exists and is readable by this process
 */
export async function isReadable(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Move a file to a new location.
 *
 * Same-filesystem moves are a single rename. Across filesystems the file is
 * copied to a hidden `.partial` sibling of the destination, renamed into
 * place, and only then is the source removed.
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  try {
    await rename(source, destination);
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') {
      throw error;
    }
    const partial = join(dirname(destination), `.${basename(destination)}.partial`);
    await fsCopyFile(source, partial);
    await rename(partial, destination);
    await unlink(source);
  }
}

/**
 * Remove a file, ignoring a missing one
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Remove a directory tree, ignoring a missing one
 */
export async function removeDir(dirPath: string): Promise<void> {
  await rm(dirPath, { recursive: true, force: true });
}
