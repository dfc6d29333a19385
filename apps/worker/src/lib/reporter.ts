/**
 * Run Summary Reporter
 *
 * Report sink that tallies terminal job outcomes for the shutdown summary.
 */

import type { JobReport, JobReportSink } from '@brandcast/core';
import type { Logger } from '@brandcast/utils';

export interface RunSummary {
  succeeded: number;
  failed: number;
  cancelled: number;
  /** Source paths of jobs that ended FAILED for a reason other than cancellation */
  failedSources: string[];
}

export class RunSummaryReporter implements JobReportSink {
  private readonly tally: RunSummary = { succeeded: 0, failed: 0, cancelled: 0, failedSources: [] };

  constructor(private readonly logger?: Logger) {}

  report(report: JobReport): void {
    if (report.state === 'SUCCEEDED') {
      this.tally.succeeded++;
    } else if (report.reason === 'CANCELLED') {
      this.tally.cancelled++;
    } else {
      this.tally.failed++;
      this.tally.failedSources.push(report.sourcePath);
    }
    this.logger?.debug({ report }, 'Job report');
  }

  summary(): RunSummary {
    return { ...this.tally, failedSources: [...this.tally.failedSources] };
  }
}
