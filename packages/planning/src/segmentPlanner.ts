/**
 * Segment Planner
 *
 * Splits a source into intro, middle and outro time ranges.
 * Pure: no I/O, same inputs give the same plan.
 */

import {
  TooShortError,
  segmentDuration,
  type Segment,
  type SegmentPlan,
  type SegmentSettings,
} from '@brandcast/core';

/**
 * Plan the three segments of a source of `totalDuration` seconds.
 * Throws TooShortError when `totalDuration < max(minDuration, intro + outro)`;
 * a short source is rejected, never clamped.
 */
export function planSegments(
  totalDuration: number,
  introDuration: number,
  outroDuration: number,
  minDuration: number
): SegmentPlan {
  const required = Math.max(minDuration, introDuration + outroDuration);
  if (!(totalDuration >= required)) {
    throw new TooShortError(totalDuration, required);
  }

  const outroStart = totalDuration - outroDuration;

  return {
    totalDuration,
    segments: [
      { kind: 'intro', start: 0, end: introDuration },
      { kind: 'middle', start: introDuration, end: outroStart },
      { kind: 'outro', start: outroStart, end: totalDuration },
    ],
  };
}

export function planSegmentsFor(totalDuration: number, settings: SegmentSettings): SegmentPlan {
  return planSegments(totalDuration, settings.introDuration, settings.outroDuration, settings.minDuration);
}

/**
 * Segments worth rendering, in temporal order. Zero-length segments (a
 * zero intro/outro, or the middle when intro + outro fills the source) drop out.
 * Time arguments carry millisecond precision, so anything that rounds to
 * 0.000s counts as zero-length.
 */
export function renderableSegments(plan: SegmentPlan): Segment[] {
  return plan.segments.filter((segment) => Number(segmentDuration(segment).toFixed(3)) > 0);
}
