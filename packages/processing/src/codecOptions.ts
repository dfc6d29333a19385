/**
 * Codec Options
 *
 * Maps output and quality settings onto encoder arguments. With hardware
 * acceleration on, the configured GPU codec replaces the software one.
 */

import type { OutputSettings, QualitySettings } from '@brandcast/core';
import type { AudioCodecOptions, VideoCodecOptions } from './commandBuilder.js';

export function buildVideoCodecOptions(output: OutputSettings, quality: QualitySettings): VideoCodecOptions {
  const options: VideoCodecOptions = {
    codec: quality.hardwareAcceleration ? quality.gpuCodec : output.videoCodec,
    pixFmt: output.pixelFormat,
  };

  if (output.preset !== null) options.preset = output.preset;
  if (output.crf !== null) options.crf = output.crf;
  if (output.bitrate !== null) options.bitrate = output.bitrate;
  if (quality.bufferSize !== null) options.bufsize = quality.bufferSize;
  if (quality.threads !== null) options.threads = quality.threads;

  return options;
}

/**
 * Audio is re-encoded with the configured codec, or dropped entirely
 */
export function buildAudioCodecOptions(output: OutputSettings): AudioCodecOptions | 'none' {
  if (!output.preserveAudio) {
    return 'none';
  }
  return output.audioBitrate !== null
    ? { codec: output.audioCodec, bitrate: output.audioBitrate }
    : { codec: output.audioCodec };
}
