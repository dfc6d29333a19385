/**
 * @brandcast/processing
 *
 * Composition layer.
 *
 * Responsibilities:
 * - Build FFmpeg commands and overlay filter graphs
 * - Render branded segments, join them, validate the result
 */

// FFmpeg wrapper
export { FFmpeg, type FFmpegOptions } from './ffmpeg.js';

// Command builder
export {
  FFmpegCommandBuilder,
  formatTime,
  type InputOptions,
  type OutputOptions,
  type StreamMapping,
  type VideoCodecOptions,
  type AudioCodecOptions,
} from './commandBuilder.js';

// Filter graph and codec options
export { buildOverlayFilterGraph, buildLogoChain, logoInputArgs, FILTER_OUTPUT_LABEL } from './filterGraph.js';
export { buildVideoCodecOptions, buildAudioCodecOptions } from './codecOptions.js';

// Encoder
export {
  FFmpegEncoder,
  buildConcatList,
  quoteConcatPath,
  type MediaEncoder,
  type TranscodeRequest,
  type FFmpegEncoderOptions,
} from './encoder.js';

// Composition
export { CompositionEngine, segmentFileName, type CompositionEngineOptions } from './compositionEngine.js';
