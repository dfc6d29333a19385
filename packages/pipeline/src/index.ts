/**
 * @brandcast/pipeline
 *
 * Orchestration layer.
 *
 * Responsibilities:
 * - Run one job attempt through probe, plan, render, join and validate
 * - Admit jobs under the concurrency bound and the memory budget
 * - Retry recoverable failures with backoff
 * - Wire everything together for the worker and the CLI
 */

export {
  MemoryBudget,
  estimateJobMemory,
  FRAME_BUFFER_FRAMES,
  BASE_OVERHEAD_BYTES,
  type MemoryEstimateOptions,
} from './memoryBudget.js';
export { mapBounded } from './concurrency.js';
export { Job, type JobSnapshot } from './job.js';
export {
  JobPipeline,
  JOINED_FILE_NAME,
  type AttemptContext,
  type JobRunner,
  type JobPipelineOptions,
  type PipelineSettings,
} from './jobPipeline.js';
export {
  JobScheduler,
  type JobFinalizer,
  type JobSchedulerOptions,
  type SchedulerSettings,
  type SchedulerStats,
} from './jobScheduler.js';
export { BrandcastService, type BrandcastServiceOptions, type ToolStatus } from './service.js';
