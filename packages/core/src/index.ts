/**
 * @brandcast/core
 *
 * Core domain package containing:
 * - Job state machine
 * - Error taxonomy
 * - Settings model and loader
 * - Shared types
 */

// State machine
export {
  JOB_STATES,
  JobStateMachine,
  isValidTransition,
  type JobState,
  type JobStateTransition,
} from './stateMachine.js';

// Types
export { DEFAULT_VIDEO_EXTENSIONS, type VideoDescriptor } from './types/video.js';
export { segmentDuration, type Segment, type SegmentKind, type SegmentPlan } from './types/segment.js';
export type {
  Position,
  LogoRole,
  LogoAsset,
  ResolvedAssets,
  OverlayInstruction,
  OverlayPlan,
} from './types/overlay.js';
export type { JobReport, JobReportSink } from './types/job.js';

// Errors
export {
  BrandcastError,
  JobFailureError,
  UnreadableVideoError,
  TooShortError,
  InvalidGeometryError,
  AssetMissingError,
  EncodeFailedError,
  CorruptOutputError,
  TransientIOError,
  CancelledError,
  ConfigurationError,
  StateTransitionError,
  classifyFailure,
  isRecoverable,
  describeError,
  type FailureReason,
} from './errors/index.js';

// Settings
export * from './settings/index.js';

// Binary Configuration
export {
  getBinariesConfig,
  type BinaryConfig,
  type BinariesConfig,
} from './config/binaries.js';

export { isSupportedVideoFile } from './media.js';
