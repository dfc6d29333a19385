/**
 * Composition Engine
 *
 * Renders one segment with its overlay plan, joins rendered segments in
 * temporal order, and validates the joined result. Failures propagate as
 * typed errors; retry decisions belong to the scheduler.
 */

import { join } from 'node:path';
import {
  BrandcastError,
  CancelledError,
  CorruptOutputError,
  UnreadableVideoError,
  segmentDuration,
  type OverlayPlan,
  type Segment,
  type SegmentKind,
  type VideoDescriptor,
} from '@brandcast/core';
import { assertAssetReadable } from '@brandcast/media';
import { createLogger, formatSeconds, getFileSizeBytes, pathExists, type Logger } from '@brandcast/utils';
import type { MediaEncoder } from './encoder.js';

const SEGMENT_ORDER: Record<SegmentKind, number> = {
  intro: 0,
  middle: 1,
  outro: 2,
};

export interface CompositionEngineOptions {
  encoder: MediaEncoder;
  /** Allowed drift between the joined duration and the source duration */
  durationToleranceSeconds: number;
  logger?: Logger;
}

export function segmentFileName(kind: SegmentKind): string {
  return `segment-${SEGMENT_ORDER[kind]}-${kind}.mp4`;
}

export class CompositionEngine {
  private readonly encoder: MediaEncoder;
  private readonly tolerance: number;
  private readonly logger: Logger;

  constructor(options: CompositionEngineOptions) {
    this.encoder = options.encoder;
    this.tolerance = options.durationToleranceSeconds;
    this.logger = createLogger({ module: 'composition-engine' }, options.logger);
  }

  /**
   * Render `[segment.start, segment.end)` of the source with its overlays
   * into `workDir`. Returns the rendered file.
   */
  async render(
    source: string,
    segment: Segment,
    plan: OverlayPlan,
    workDir: string,
    signal?: AbortSignal
  ): Promise<string> {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    for (const instruction of plan.instructions) {
      await assertAssetReadable(instruction.sourcePath);
    }

    const output = join(workDir, segmentFileName(segment.kind));
    this.logger.debug(
      { source, segment: segment.kind, start: segment.start, end: segment.end, overlays: plan.instructions.length },
      'Rendering segment'
    );

    await this.encoder.transcode(
      {
        source,
        start: segment.start,
        duration: segmentDuration(segment),
        overlays: plan.instructions,
        output,
      },
      signal
    );

    return output;
  }

  /**
   * Concatenate rendered segments, in the order given, without re-encoding
   */
  async join(orderedFiles: readonly string[], outputPath: string, signal?: AbortSignal): Promise<string> {
    if (orderedFiles.length === 0) {
      throw new BrandcastError('Nothing to join', 'EMPTY_JOIN');
    }
    if (signal?.aborted) {
      throw new CancelledError();
    }

    this.logger.debug({ segments: orderedFiles.length, outputPath }, 'Joining segments');
    await this.encoder.concat(orderedFiles, outputPath, signal);
    return outputPath;
  }

  /**
   * Re-probe the joined file. Missing, empty, unreadable, or off by more
   * than the tolerance means corrupt.
   */
  async validate(path: string, expectedDuration: number, signal?: AbortSignal): Promise<VideoDescriptor> {
    if (!(await pathExists(path))) {
      throw new CorruptOutputError(path, 'file was not produced');
    }
    if ((await getFileSizeBytes(path)) === 0) {
      throw new CorruptOutputError(path, 'file is empty');
    }

    let descriptor: VideoDescriptor;
    try {
      descriptor = await this.encoder.probe(path, signal);
    } catch (error) {
      if (error instanceof UnreadableVideoError) {
        throw new CorruptOutputError(path, error.message);
      }
      throw error;
    }

    const drift = Math.abs(descriptor.duration - expectedDuration);
    if (drift > this.tolerance) {
      throw new CorruptOutputError(
        path,
        `duration ${formatSeconds(descriptor.duration)}s deviates from expected ${formatSeconds(expectedDuration)}s`,
        { expectedDuration, actualDuration: descriptor.duration, tolerance: this.tolerance }
      );
    }

    return descriptor;
  }
}
