/**
 * Job
 *
 * Mutable record of one source file moving through the pipeline. The state
 * machine owns the state; everything else here is bookkeeping the scheduler
 * reads when it decides on admission, retries and reports.
 */

import { randomUUID } from 'node:crypto';
import {
  JobStateMachine,
  type FailureReason,
  type JobState,
  type JobStateTransition,
  type VideoDescriptor,
} from '@brandcast/core';

/**
 * Read-only view of a job for callers outside the scheduler
 */
export interface JobSnapshot {
  id: string;
  sourcePath: string;
  state: JobState;
  attempts: number;
  reason: FailureReason | null;
  message: string | null;
  outputPath: string | null;
  submittedAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  history: ReadonlyArray<JobStateTransition>;
}

export class Job {
  readonly id: string;
  readonly sourcePath: string;
  readonly machine: JobStateMachine;
  readonly submittedAt: Date;

  attempts = 0;
  startedAt: Date | null = null;
  finishedAt: Date | null = null;
  /** Probed on the first successful PROBING stage, reused for admission on retries */
  descriptor: VideoDescriptor | null = null;
  outputPath: string | null = null;
  message: string | null = null;

  /** Set while an attempt is running */
  controller: AbortController | null = null;
  /** Set while the job waits out a retry backoff */
  retryTimer: NodeJS.Timeout | null = null;
  cancelRequested = false;

  constructor(sourcePath: string, id: string = randomUUID(), submittedAt: Date = new Date()) {
    this.id = id;
    this.sourcePath = sourcePath;
    this.submittedAt = submittedAt;
    this.machine = new JobStateMachine(id);
  }

  get state(): JobState {
    return this.machine.getState();
  }

  get reason(): FailureReason | null {
    return this.state === 'FAILED' ? this.machine.getLastFailure() : null;
  }

  snapshot(): JobSnapshot {
    return {
      id: this.id,
      sourcePath: this.sourcePath,
      state: this.state,
      attempts: this.attempts,
      reason: this.reason,
      message: this.message,
      outputPath: this.outputPath,
      submittedAt: this.submittedAt,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      history: this.machine.getHistory(),
    };
  }
}
