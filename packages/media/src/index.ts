/**
 * @brandcast/media
 *
 * Media probing layer.
 *
 * Responsibilities:
 * - Probe files with ffprobe
 * - Describe source videos (duration, frame size, frame rate, audio)
 * - Resolve logo assets and their geometry
 */

export {
  FFProbe,
  ffprobeOutputSchema,
  findVideoStream,
  parseFrameRate,
  parseDuration,
  type FFProbeResult,
  type FFProbeStream,
  type FFProbeOptions,
} from './probes/ffprobe.js';

export { FFProbeVideoProbe, toVideoDescriptor, type VideoProbe } from './videoProbe.js';

export { AssetResolver, assertAssetReadable } from './assetResolver.js';
