import { extname } from 'node:path';
import { DEFAULT_VIDEO_EXTENSIONS } from './types/video.js';

/**
 * Check if a file is a supported video format (by extension, case-insensitive)
 */
export function isSupportedVideoFile(
  filePath: string,
  extensions: readonly string[] = DEFAULT_VIDEO_EXTENSIONS
): boolean {
  const ext = extname(filePath).toLowerCase();
  return ext !== '' && extensions.includes(ext);
}
