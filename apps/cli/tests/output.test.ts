import { describe, expect, it } from 'vitest';
import type { JobReport, OverlayInstruction } from '@brandcast/core';
import { formatDescriptor, formatOverlay, formatReport, formatSegment } from '../src/lib/output.js';

const overlay: OverlayInstruction = {
  asset: 'animated',
  sourcePath: '/assets/logo.mp4',
  x: 860,
  y: 860,
  width: 200,
  height: 100,
  opacity: 0.5,
  scale: 1,
  loop: true,
};

function report(overrides: Partial<JobReport>): JobReport {
  return {
    jobId: 'job-1',
    sourcePath: '/videos/clip.mp4',
    state: 'SUCCEEDED',
    reason: null,
    message: null,
    attempts: 1,
    outputPath: '/out/clip_branded.mp4',
    timestamps: {
      submittedAt: new Date(2024, 0, 15, 9, 30, 0),
      startedAt: new Date(2024, 0, 15, 9, 30, 0),
      finishedAt: new Date(2024, 0, 15, 9, 31, 5),
    },
    ...overrides,
  };
}

describe('output formatting', () => {
  it('formats a probed source', () => {
    expect(formatDescriptor({
      path: '/videos/clip.mp4', duration: 10, width: 1920, height: 1080, frameRate: 29.97, hasAudio: false,
    })).toBe('1920x1080 @ 29.97 fps, 10.000s, no audio');
  });

  it('formats a segment range', () => {
    expect(formatSegment({ kind: 'middle', start: 3, end: 7 })).toBe('middle 3.000s -> 7.000s (4.000s)');
    expect(formatSegment({ kind: 'intro', start: 0, end: 3 })).toBe('intro  0.000s -> 3.000s (3.000s)');
  });

  it('formats an overlay with its opacity and looping', () => {
    expect(formatOverlay(overlay)).toBe('animated 200x100 at (860, 860) [opacity 0.5, looped]');
    expect(formatOverlay({ ...overlay, asset: 'static', opacity: 1, loop: false, x: 20, y: 20 }))
      .toBe('static   200x100 at (20, 20)');
  });

  it('formats job reports', () => {
    expect(formatReport(report({}))).toBe('clip.mp4 -> /out/clip_branded.mp4 (1 attempt, 1m 5s)');
    expect(formatReport(report({
      state: 'FAILED',
      reason: 'TOO_SHORT',
      message: 'Video too short (5.00s), need at least 6s',
      outputPath: null,
      attempts: 2,
      timestamps: { submittedAt: new Date(0), startedAt: null, finishedAt: new Date(0) },
    }))).toBe('clip.mp4 TOO_SHORT: Video too short (5.00s), need at least 6s (2 attempts)');
  });
});
