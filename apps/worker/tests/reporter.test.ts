import { describe, expect, it } from 'vitest';
import type { JobReport } from '@brandcast/core';
import { RunSummaryReporter } from '../src/lib/reporter.js';

function report(overrides: Partial<JobReport>): JobReport {
  const at = new Date(2024, 0, 15, 9, 30, 5);
  return {
    jobId: 'job-1',
    sourcePath: '/videos/a.mp4',
    state: 'SUCCEEDED',
    reason: null,
    message: null,
    attempts: 1,
    outputPath: '/out/a_branded.mp4',
    timestamps: { submittedAt: at, startedAt: at, finishedAt: at },
    ...overrides,
  };
}

describe('RunSummaryReporter', () => {
  it('tallies outcomes and remembers failed sources', () => {
    const reporter = new RunSummaryReporter();

    reporter.report(report({}));
    reporter.report(report({ sourcePath: '/videos/b.mp4', state: 'FAILED', reason: 'TOO_SHORT', outputPath: null }));
    reporter.report(report({ sourcePath: '/videos/c.mp4', state: 'FAILED', reason: 'CANCELLED', outputPath: null }));

    expect(reporter.summary()).toEqual({
      succeeded: 1,
      failed: 1,
      cancelled: 1,
      failedSources: ['/videos/b.mp4'],
    });
  });
});
