import { describe, expect, it } from 'vitest';
import { TooShortError, segmentDuration } from '@brandcast/core';
import { planSegments, renderableSegments } from '../src/segmentPlanner.js';

describe('planSegments', () => {
  it('splits a 10 second source into 0-3, 3-7 and 7-10', () => {
    const plan = planSegments(10, 3, 3, 6);

    expect(plan.segments).toEqual([
      { kind: 'intro', start: 0, end: 3 },
      { kind: 'middle', start: 3, end: 7 },
      { kind: 'outro', start: 7, end: 10 },
    ]);
    expect(renderableSegments(plan)).toHaveLength(3);
  });

  it('renders only intro and outro when they fill the source', () => {
    const plan = planSegments(6, 3, 3, 6);

    expect(plan.segments[1]).toEqual({ kind: 'middle', start: 3, end: 3 });
    expect(renderableSegments(plan).map((segment) => segment.kind)).toEqual(['intro', 'outro']);
  });

  it('rejects a source shorter than the minimum', () => {
    expect(() => planSegments(5, 3, 3, 6)).toThrow(TooShortError);
    expect(() => planSegments(5, 3, 3, 6)).toThrow('Video too short (5.00s), need at least 6s');
  });

  it('rejects a source shorter than intro plus outro even with a low minimum', () => {
    expect(() => planSegments(7, 4, 4, 1)).toThrow(TooShortError);
  });

  it('drops a middle that rounds to zero milliseconds', () => {
    const plan = planSegments(6.0004, 3, 3, 6);

    expect(plan.segments[1]?.kind).toBe('middle');
    expect(renderableSegments(plan).map((segment) => segment.kind)).toEqual(['intro', 'outro']);
    expect(renderableSegments(planSegments(6.002, 3, 3, 6)).map((segment) => segment.kind))
      .toEqual(['intro', 'middle', 'outro']);
  });

  it('skips a zero intro', () => {
    const plan = planSegments(8, 0, 2, 2);

    expect(renderableSegments(plan).map((segment) => segment.kind)).toEqual(['middle', 'outro']);
  });

  it('produces contiguous segments summing to the duration', () => {
    for (let total = 6; total <= 120; total += 0.37) {
      for (const [intro, outro] of [[3, 3], [0, 2.5], [1.2, 4.8], [6, 0]] as const) {
        const plan = planSegments(total, intro, outro, 6);
        const [first, middle, last] = plan.segments;

        expect(first.start).toBe(0);
        expect(first.end).toBe(middle.start);
        expect(middle.end).toBe(last.start);
        expect(last.end).toBe(total);
        const sum = plan.segments.reduce((acc, segment) => acc + segmentDuration(segment), 0);
        expect(sum).toBeCloseTo(total, 9);
        for (const segment of plan.segments) {
          expect(segmentDuration(segment)).toBeGreaterThanOrEqual(0);
        }
      }
    }
  });
});
