/**
 * Job Pipeline
 *
 * One attempt of one job: probe, plan, render, join, validate. Stages run
 * in order and report their state through the attempt context; whatever a
 * stage throws propagates to the scheduler, which owns failure handling.
 */

import { join } from 'node:path';
import {
  CancelledError,
  EncodeFailedError,
  JobFailureError,
  describeError,
  type JobState,
  type OverlayPlan,
  type ResolvedAssets,
  type Segment,
  type Settings,
  type VideoDescriptor,
} from '@brandcast/core';
import type { VideoProbe } from '@brandcast/media';
import { planOverlays, planSegmentsFor, renderableSegments } from '@brandcast/planning';
import type { CompositionEngine } from '@brandcast/processing';
import { createLogger, ensureDir, type Logger } from '@brandcast/utils';
import { mapBounded } from './concurrency.js';

export const JOINED_FILE_NAME = 'joined.mp4';

export interface AttemptContext {
  jobId: string;
  sourcePath: string;
  attempt: number;
  /** Fresh directory for this attempt; created only once rendering starts */
  workDir: string;
  signal: AbortSignal;
  advance(state: JobState): void;
  onProbed(descriptor: VideoDescriptor): void;
}

/**
 * Runs one attempt and resolves with the joined file, still in the work
 * directory. Promotion is the lifecycle manager's job.
 */
export interface JobRunner {
  run(context: AttemptContext): Promise<string>;
}

export type PipelineSettings = Pick<Settings, 'segments' | 'logos' | 'performance' | 'validation'>;

export interface JobPipelineOptions {
  probe: VideoProbe;
  engine: CompositionEngine;
  assets: ResolvedAssets;
  settings: PipelineSettings;
  logger?: Logger;
}

interface RenderTask {
  segment: Segment;
  overlays: OverlayPlan;
}

export class JobPipeline implements JobRunner {
  private readonly probe: VideoProbe;
  private readonly engine: CompositionEngine;
  private readonly assets: ResolvedAssets;
  private readonly settings: PipelineSettings;
  private readonly logger: Logger;

  constructor(options: JobPipelineOptions) {
    this.probe = options.probe;
    this.engine = options.engine;
    this.assets = options.assets;
    this.settings = options.settings;
    this.logger = createLogger({ module: 'job-pipeline' }, options.logger);
  }

  async run(context: AttemptContext): Promise<string> {
    const { sourcePath, workDir, signal } = context;
    const log = this.logger.child({ jobId: context.jobId, attempt: context.attempt });

    const descriptor = await this.probe.probe(sourcePath, signal);
    context.onProbed(descriptor);
    log.debug(
      { duration: descriptor.duration, width: descriptor.width, height: descriptor.height },
      'Source probed'
    );

    context.advance('PLANNING');
    const plan = planSegmentsFor(descriptor.duration, this.settings.segments);
    const tasks: RenderTask[] = renderableSegments(plan).map((segment) => ({
      segment,
      overlays: planOverlays(
        segment.kind,
        descriptor.width,
        descriptor.height,
        this.assets,
        this.settings.logos
      ),
    }));

    context.advance('RENDERING');
    await ensureDir(workDir);
    const rendered = await this.renderAll(sourcePath, tasks, workDir, signal);
    log.debug({ segments: rendered.length }, 'Segments rendered');

    context.advance('JOINING');
    const joinedPath = await this.joinSegments(rendered, join(workDir, JOINED_FILE_NAME), signal);

    if (this.settings.validation.enabled) {
      context.advance('VALIDATING');
      await this.engine.validate(joinedPath, plan.totalDuration, signal);
    }

    return joinedPath;
  }

  /**
   * Render in temporal order. With parallel segments enabled up to
   * `maxParallelSegments` run at once, and the first failure aborts the rest.
   */
  private async renderAll(
    sourcePath: string,
    tasks: readonly RenderTask[],
    workDir: string,
    signal: AbortSignal
  ): Promise<string[]> {
    const { parallelSegments, maxParallelSegments } = this.settings.performance;
    const limit = parallelSegments ? maxParallelSegments : 1;

    const siblings = new AbortController();
    const forwardAbort = (): void => siblings.abort();
    if (signal.aborted) {
      throw new CancelledError();
    }
    signal.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await mapBounded(tasks, limit, async (task) => {
        try {
          return await this.engine.render(sourcePath, task.segment, task.overlays, workDir, siblings.signal);
        } catch (error) {
          siblings.abort();
          throw error;
        }
      });
    } finally {
      signal.removeEventListener('abort', forwardAbort);
    }
  }

  private async joinSegments(files: readonly string[], outputPath: string, signal: AbortSignal): Promise<string> {
    try {
      return await this.engine.join(files, outputPath, signal);
    } catch (error) {
      if (error instanceof JobFailureError) {
        throw error;
      }
      throw new EncodeFailedError('Join', -1, describeError(error));
    }
  }
}
