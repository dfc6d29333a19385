/**
 * Video Types
 */

/**
 * Probed metadata of a source video. Immutable once created.
 */
export interface VideoDescriptor {
  readonly path: string;
  /** Seconds, always > 0 */
  readonly duration: number;
  readonly width: number;
  readonly height: number;
  readonly frameRate: number;
  readonly hasAudio: boolean;
}

export const DEFAULT_VIDEO_EXTENSIONS: readonly string[] = [
  '.mp4',
  '.avi',
  '.mov',
  '.mkv',
  '.wmv',
  '.flv',
  '.webm',
];
