/**
 * Job Scheduler
 *
 * Admits submitted files in strict FIFO order, bounded by
 * `maxConcurrentProcesses` and the memory budget, drives each attempt
 * through the state machine, and decides on retries.
 *
 * Events:
 * - `transition` (jobId, JobStateTransition)
 * - `completed` (JobReport) once a job reaches a terminal state
 * - `idle` when nothing is queued, running or waiting to retry
 *
 * A job's record is dropped once its report is out; only its path is kept,
 * so the same file is not admitted twice in one run.
 */

import { EventEmitter } from 'node:events';
import { resolve } from 'node:path';
import {
  CancelledError,
  classifyFailure,
  describeError,
  isRecoverable,
  isSupportedVideoFile,
  type DirectorySettings,
  type FailureReason,
  type JobReport,
  type JobReportSink,
  type JobState,
  type Settings,
  type VideoDescriptor,
} from '@brandcast/core';
import type { FinalizeOutcome, FinalizeResult } from '@brandcast/lifecycle';
import {
  canRetry,
  computeBackoffDelay,
  createLogger,
  getJobDir,
  removeDir,
  type Logger,
} from '@brandcast/utils';
import { Job, type JobSnapshot } from './job.js';
import type { JobRunner } from './jobPipeline.js';
import { MemoryBudget, estimateJobMemory } from './memoryBudget.js';

export interface JobFinalizer {
  finalize(outcome: FinalizeOutcome): Promise<FinalizeResult>;
}

export type SchedulerSettings = Pick<Settings, 'performance' | 'retry' | 'supportedExtensions' | 'keepTempFiles'> & {
  directories: Pick<DirectorySettings, 'temp'>;
};

export interface JobSchedulerOptions {
  runner: JobRunner;
  finalizer: JobFinalizer;
  settings: SchedulerSettings;
  /** Defaults to a budget of `performance.memoryLimitBytes` */
  budget?: MemoryBudget;
  reportSink?: JobReportSink;
  logger?: Logger;
}

export interface SchedulerStats {
  queued: number;
  inFlight: number;
  retrying: number;
  succeeded: number;
  failed: number;
  committedBytes: number;
}

export class JobScheduler extends EventEmitter {
  private readonly runner: JobRunner;
  private readonly finalizer: JobFinalizer;
  private readonly settings: SchedulerSettings;
  private readonly budget: MemoryBudget;
  private readonly reportSink?: JobReportSink;
  private readonly logger: Logger;

  /** Jobs that have not reached a terminal state */
  private readonly jobs = new Map<string, Job>();
  /** Every path submitted during this run */
  private readonly submitted = new Set<string>();
  private readonly queue: Job[] = [];
  private readonly inFlight = new Set<Job>();
  private readonly retrying = new Set<Job>();
  private readonly tasks = new Set<Promise<void>>();
  private idleWaiters: Array<() => void> = [];
  private accepting = true;
  private succeeded = 0;
  private failed = 0;

  constructor(options: JobSchedulerOptions) {
    super();
    this.runner = options.runner;
    this.finalizer = options.finalizer;
    this.settings = options.settings;
    this.budget = options.budget ?? new MemoryBudget(options.settings.performance.memoryLimitBytes);
    this.reportSink = options.reportSink;
    this.logger = createLogger({ module: 'job-scheduler' }, options.logger);
  }

  /**
   * Queue a source file. Returns null when the file is ignored: unsupported
   * extension, already submitted in this run, or the scheduler is shutting down.
   */
  submit(sourcePath: string): JobSnapshot | null {
    const path = resolve(sourcePath);

    if (!this.accepting) {
      this.logger.debug({ path }, 'Scheduler is shutting down, submission ignored');
      return null;
    }
    if (!isSupportedVideoFile(path, this.settings.supportedExtensions)) {
      this.logger.debug({ path }, 'Unsupported extension, submission ignored');
      return null;
    }
    if (this.submitted.has(path)) {
      this.logger.debug({ path }, 'Duplicate submission ignored');
      return null;
    }

    const job = new Job(path);
    this.jobs.set(job.id, job);
    this.submitted.add(path);
    this.queue.push(job);
    this.logger.info({ jobId: job.id, path }, 'Job queued');

    this.pump();
    return job.snapshot();
  }

  /**
   * Cancel a job wherever it is. Returns false for unknown or finished jobs.
   */
  cancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job) return false;

    if (this.inFlight.has(job)) {
      job.cancelRequested = true;
      job.controller?.abort();
      this.logger.info({ jobId }, 'Cancelling running job');
      return true;
    }

    if (this.retrying.has(job)) {
      if (job.retryTimer) clearTimeout(job.retryTimer);
      job.retryTimer = null;
      this.retrying.delete(job);
      this.requeue(job);
    } else {
      const index = this.queue.indexOf(job);
      if (index === -1) return false;
      this.queue.splice(index, 1);
    }

    job.cancelRequested = true;
    this.failJob(job, 'CANCELLED', new CancelledError(jobId).message);
    this.track(this.settle(job, 'CANCELLED'));
    this.pump();
    return true;
  }

  /**
   * Snapshot of a job that has not finished yet
   */
  getJob(jobId: string): JobSnapshot | null {
    return this.jobs.get(jobId)?.snapshot() ?? null;
  }

  listJobs(): JobSnapshot[] {
    return Array.from(this.jobs.values(), (job) => job.snapshot());
  }

  stats(): SchedulerStats {
    return {
      queued: this.queue.length,
      inFlight: this.inFlight.size,
      retrying: this.retrying.size,
      succeeded: this.succeeded,
      failed: this.failed,
      committedBytes: this.budget.committed,
    };
  }

  /**
   * Resolves once nothing is queued, running or waiting to retry
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolveIdle) => {
      this.idleWaiters.push(resolveIdle);
    });
  }

  /**
   * Stop accepting work, cancel everything pending or running, and wait
   * for the cancellations to settle.
   */
  async shutdown(): Promise<void> {
    this.accepting = false;
    this.logger.info({ ...this.stats() }, 'Scheduler shutting down');

    for (const job of [...this.queue, ...this.retrying, ...this.inFlight]) {
      this.cancel(job.id);
    }
    await this.onIdle();
  }

  private pump(): void {
    while (this.accepting && this.inFlight.size < this.settings.performance.maxConcurrentProcesses) {
      const head = this.queue[0];
      if (head === undefined) break;

      const estimate = this.estimate(head.descriptor);
      if (!this.budget.tryReserve(head.id, estimate)) {
        // Head-of-line waits; later jobs may not overtake it
        this.logger.debug(
          { jobId: head.id, estimate, available: this.budget.available },
          'Waiting for memory budget'
        );
        break;
      }
      this.queue.shift();
      this.start(head);
    }
    this.checkIdle();
  }

  private start(job: Job): void {
    job.attempts += 1;
    job.startedAt ??= new Date();
    job.message = null;
    job.controller = new AbortController();
    this.inFlight.add(job);
    this.transition(job, 'PROBING');

    this.logger.info({ jobId: job.id, attempt: job.attempts, path: job.sourcePath }, 'Job started');
    this.track(this.execute(job, job.controller.signal));
  }

  private async execute(job: Job, signal: AbortSignal): Promise<void> {
    try {
      const joinedPath = await this.runner.run({
        jobId: job.id,
        sourcePath: job.sourcePath,
        attempt: job.attempts,
        workDir: getJobDir(this.settings.directories.temp, job.id, job.attempts),
        signal,
        advance: (state) => this.transition(job, state),
        onProbed: (descriptor) => this.onProbed(job, descriptor),
      });
      if (signal.aborted) {
        throw new CancelledError(job.id);
      }

      const result = await this.finalizer.finalize({ state: 'SUCCEEDED', sourcePath: job.sourcePath, joinedPath });
      job.outputPath = result.outputPath;
      this.transition(job, 'SUCCEEDED');
      this.releaseSlot(job);
      await this.complete(job);
    } catch (error) {
      const reason: FailureReason = job.cancelRequested ? 'CANCELLED' : classifyFailure(error);
      this.failJob(job, reason, describeError(error));
      this.releaseSlot(job);

      if (this.shouldRetry(job, reason)) {
        this.scheduleRetry(job);
        return;
      }
      await this.settle(job, reason);
    } finally {
      this.pump();
    }
  }

  private shouldRetry(job: Job, reason: FailureReason): boolean {
    return this.accepting
      && isRecoverable(reason)
      && canRetry(job.attempts, { maxRetries: this.settings.retry.maxRetryAttempts });
  }

  private scheduleRetry(job: Job): void {
    const delay = computeBackoffDelay(job.attempts, {
      initialDelay: this.settings.retry.initialDelayMs,
      maxDelay: this.settings.retry.maxDelayMs,
    });
    this.logger.warn(
      { jobId: job.id, attempt: job.attempts, reason: job.reason, delay },
      'Job failed, retrying after backoff'
    );

    this.retrying.add(job);
    job.retryTimer = setTimeout(() => {
      job.retryTimer = null;
      this.retrying.delete(job);
      this.requeue(job);
      this.queue.push(job);
      this.pump();
    }, delay);
  }

  /**
   * Terminal failure: hand the source to the lifecycle manager, then report
   */
  private async settle(job: Job, reason: FailureReason): Promise<void> {
    const outcome: FinalizeOutcome = reason === 'CANCELLED'
      ? { state: 'CANCELLED', sourcePath: job.sourcePath }
      : { state: 'FAILED', sourcePath: job.sourcePath, reason };

    try {
      await this.finalizer.finalize(outcome);
    } catch (error) {
      this.logger.error({ jobId: job.id, err: error }, 'Could not finalize source of failed job');
    }
    await this.complete(job);
  }

  private async complete(job: Job): Promise<void> {
    await this.cleanupTemp(job);
    job.finishedAt = new Date();
    this.jobs.delete(job.id);

    const report = this.toReport(job);
    const context = { jobId: job.id, path: job.sourcePath, attempts: job.attempts, outputPath: report.outputPath };
    if (report.state === 'SUCCEEDED') {
      this.succeeded++;
      this.logger.info(context, 'Job succeeded');
    } else if (report.reason === 'CANCELLED') {
      this.failed++;
      this.logger.warn(context, 'Job cancelled');
    } else {
      this.failed++;
      this.logger.error({ ...context, reason: report.reason, message: report.message }, 'Job failed');
    }

    this.reportSink?.report(report);
    this.emit('completed', report);
  }

  private async cleanupTemp(job: Job): Promise<void> {
    if (this.settings.keepTempFiles) return;
    try {
      await removeDir(getJobDir(this.settings.directories.temp, job.id));
    } catch (error) {
      this.logger.warn({ jobId: job.id, err: error }, 'Could not remove temp files');
    }
  }

  private onProbed(job: Job, descriptor: VideoDescriptor): void {
    job.descriptor = descriptor;
    const estimate = this.estimate(descriptor);
    if (!this.budget.adjust(job.id, estimate)) {
      this.logger.debug(
        { jobId: job.id, estimate, reserved: this.budget.reservationOf(job.id) },
        'Probed estimate does not fit, keeping admission reservation'
      );
    }
  }

  private estimate(descriptor: VideoDescriptor | null): number {
    const performance = this.settings.performance;
    const { width, height } = descriptor ?? performance.assumedResolution;
    return estimateJobMemory({
      width,
      height,
      concurrentSegments: performance.parallelSegments ? performance.maxParallelSegments : 1,
      headroom: performance.memoryHeadroom,
    });
  }

  private transition(job: Job, state: JobState): void {
    const transition = job.machine.transitionTo(state);
    this.logger.debug({ jobId: job.id, from: transition.from, to: transition.to }, 'Job state changed');
    this.emit('transition', job.id, transition);
  }

  private requeue(job: Job): void {
    const transition = job.machine.requeue();
    this.logger.debug({ jobId: job.id, from: transition.from, to: transition.to }, 'Job state changed');
    this.emit('transition', job.id, transition);
  }

  private failJob(job: Job, reason: FailureReason, message: string): void {
    job.message = message;
    const transition = job.machine.fail(reason, message);
    this.logger.debug({ jobId: job.id, from: transition.from, reason, message }, 'Job state changed');
    this.emit('transition', job.id, transition);
  }

  private releaseSlot(job: Job): void {
    this.inFlight.delete(job);
    this.budget.release(job.id);
    job.controller = null;
  }

  private toReport(job: Job): JobReport {
    const state = job.state === 'SUCCEEDED' ? 'SUCCEEDED' : 'FAILED';
    return {
      jobId: job.id,
      sourcePath: job.sourcePath,
      state,
      reason: job.reason,
      message: job.message,
      attempts: job.attempts,
      outputPath: job.outputPath,
      timestamps: {
        submittedAt: job.submittedAt,
        startedAt: job.startedAt,
        finishedAt: job.finishedAt ?? new Date(),
      },
    };
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'Scheduler task failed');
      })
      .finally(() => {
        this.tasks.delete(tracked);
        this.checkIdle();
      });
    this.tasks.add(tracked);
  }

  private isIdle(): boolean {
    return this.queue.length === 0
      && this.inFlight.size === 0
      && this.retrying.size === 0
      && this.tasks.size === 0;
  }

  private checkIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const wake of waiters) wake();
    this.emit('idle');
  }
}
