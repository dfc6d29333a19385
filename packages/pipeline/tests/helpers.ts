import { parseSettings, type JobReport, type Settings } from '@brandcast/core';
import type { FinalizeOutcome, FinalizeResult } from '@brandcast/lifecycle';
import type { AttemptContext, JobRunner } from '../src/jobPipeline.js';
import type { JobFinalizer, JobScheduler } from '../src/jobScheduler.js';

export function testSettings(baseDir: string, overrides: Record<string, unknown> = {}): Settings {
  const { video_processing: videoProcessing, advanced_settings: advanced, ...rest } = overrides;
  return parseSettings({
    video_processing: { intro_duration: 3, outro_duration: 3, min_video_duration: 6, ...asRecord(videoProcessing) },
    advanced_settings: {
      log_file: null,
      retry_initial_delay_ms: 0,
      retry_max_delay_ms: 0,
      ...asRecord(advanced),
    },
    ...rest,
  }, baseDir);
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : {};
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function advanceToJoining(context: AttemptContext): void {
  context.advance('PLANNING');
  context.advance('RENDERING');
  context.advance('JOINING');
}

/**
 * Runner whose behaviour per call is scripted by the test
 */
export class ScriptedRunner implements JobRunner {
  readonly calls: AttemptContext[] = [];

  constructor(private readonly behaviour: (context: AttemptContext, call: number) => Promise<string>) {}

  run(context: AttemptContext): Promise<string> {
    this.calls.push(context);
    return this.behaviour(context, this.calls.length);
  }
}

export class RecordingFinalizer implements JobFinalizer {
  readonly outcomes: FinalizeOutcome[] = [];

  async finalize(outcome: FinalizeOutcome): Promise<FinalizeResult> {
    this.outcomes.push(outcome);
    if (outcome.state === 'SUCCEEDED') {
      return { outputPath: `/out/${outcome.joinedPath.split('/').pop() ?? 'joined.mp4'}`, source: 'processed', sourceDestination: null };
    }
    return { outputPath: null, source: 'left', sourceDestination: null };
  }
}

export function collectReports(scheduler: JobScheduler): JobReport[] {
  const reports: JobReport[] = [];
  scheduler.on('completed', (report: JobReport) => reports.push(report));
  return reports;
}
