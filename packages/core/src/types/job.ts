/**
 * Job Types
 */

import type { FailureReason } from '../errors/index.js';
import type { JobState } from '../stateMachine.js';

/**
 * Terminal outcome of a job, handed to reporting sinks
 */
export interface JobReport {
  jobId: string;
  sourcePath: string;
  state: Extract<JobState, 'SUCCEEDED' | 'FAILED'>;
  reason: FailureReason | null;
  message: string | null;
  attempts: number;
  outputPath: string | null;
  timestamps: {
    submittedAt: Date;
    startedAt: Date | null;
    finishedAt: Date;
  };
}

/**
 * One-way sink for terminal job reports
 */
export interface JobReportSink {
  report(report: JobReport): void;
}
