/**
 * Video Probe
 *
 * Turns raw ffprobe output into a VideoDescriptor. Anything that cannot be
 * planned (no picture, no duration, zero size) is rejected as unreadable here.
 */

import { UnreadableVideoError, type VideoDescriptor } from '@brandcast/core';
import { FFProbe, findVideoStream, parseDuration, parseFrameRate, type FFProbeResult } from './probes/ffprobe.js';

export interface VideoProbe {
  probe(path: string, signal?: AbortSignal): Promise<VideoDescriptor>;
}

export function toVideoDescriptor(path: string, result: FFProbeResult): VideoDescriptor {
  const video = findVideoStream(result);
  if (!video) {
    throw new UnreadableVideoError(path, 'no video stream');
  }

  const width = video.width ?? 0;
  const height = video.height ?? 0;
  if (width <= 0 || height <= 0) {
    throw new UnreadableVideoError(path, `invalid frame size ${width}x${height}`);
  }

  const duration = parseDuration(result.format?.duration) ?? parseDuration(video.duration);
  if (duration === null || duration <= 0) {
    throw new UnreadableVideoError(path, 'missing or non-positive duration');
  }

  const frameRate = parseFrameRate(video.r_frame_rate) || parseFrameRate(video.avg_frame_rate);

  return Object.freeze({
    path,
    duration,
    width,
    height,
    frameRate,
    hasAudio: result.streams.some((stream) => stream.codec_type === 'audio'),
  });
}

/**
 * VideoProbe backed by ffprobe
 */
export class FFProbeVideoProbe implements VideoProbe {
  constructor(private readonly ffprobe: FFProbe) {}

  async probe(path: string, signal?: AbortSignal): Promise<VideoDescriptor> {
    const result = await this.ffprobe.probe(path, signal);
    return toVideoDescriptor(path, result);
  }
}
