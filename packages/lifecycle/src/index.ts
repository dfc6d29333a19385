/**
 * @brandcast/lifecycle
 *
 * What happens to files once a job ends: output naming, promotion, and
 * moving or deleting the source.
 */

export { SequenceCounter, type CounterState } from './sequenceCounter.js';
export { OutputNamer, uniqueDestination, type OutputNamerOptions } from './outputNaming.js';
export {
  FileLifecycleManager,
  type FileLifecycleManagerOptions,
  type FinalizeOutcome,
  type FinalizeResult,
  type SourceDisposition,
} from './fileLifecycleManager.js';
