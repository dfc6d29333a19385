/**
 * Segment Types
 */

export type SegmentKind = 'intro' | 'middle' | 'outro';

export interface Segment {
  readonly kind: SegmentKind;
  /** Seconds from the start of the source, inclusive */
  readonly start: number;
  /** Seconds from the start of the source, exclusive */
  readonly end: number;
}

/**
 * Intro, middle and outro in temporal order. A segment may have zero length
 * (e.g. the middle when intro + outro equals the total); such segments are
 * never rendered.
 */
export interface SegmentPlan {
  readonly totalDuration: number;
  readonly segments: readonly [Segment, Segment, Segment];
}

export function segmentDuration(segment: Segment): number {
  return segment.end - segment.start;
}
