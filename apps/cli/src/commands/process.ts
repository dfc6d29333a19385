/**
 * Process Command
 *
 * Run the full pipeline once for the given files and exit. The exit code
 * is non-zero when any job fails.
 */

import ora from 'ora';
import type { Command } from 'commander';
import { describeError, type JobReport, type ResolvedAssets } from '@brandcast/core';
import { createContext, globalOptions, type CommandContext } from '../lib/context.js';
import {
  formatReport,
  printError,
  printFailure,
  printHeader,
  printJson,
  printSuccess,
  printWarning,
} from '../lib/output.js';

export async function processCommand(files: string[], _options: unknown, command: Command): Promise<void> {
  const globals = globalOptions(command);
  const spinner = ora({ text: 'Preparing...', isSilent: globals.json === true }).start();

  let context: CommandContext;
  let assets: ResolvedAssets;
  try {
    context = await createContext(globals);
    await context.service.prepareDirectories();
    spinner.text = 'Resolving logo assets...';
    assets = await context.service.resolveAssets();
  } catch (error) {
    spinner.fail('Cannot start processing');
    if (globals.json) printJson({ ok: false, error: describeError(error) });
    else printFailure(error);
    process.exit(1);
  }

  const reports: JobReport[] = [];
  let submitted = 0;
  const scheduler = context.service.createScheduler(assets);
  scheduler.on('completed', (report: JobReport) => {
    reports.push(report);
    spinner.text = `Processed ${reports.length} of ${submitted}...`;
  });

  for (const file of files) {
    if (scheduler.submit(file)) {
      submitted++;
    } else if (!context.json) {
      printWarning(`Skipped ${file} (unsupported or duplicate)`);
    }
  }

  const { logger } = context;
  const onSigint = (): void => {
    spinner.text = 'Cancelling...';
    scheduler.shutdown().catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
    });
  };
  process.once('SIGINT', onSigint);

  spinner.text = `Processing ${submitted} file${submitted === 1 ? '' : 's'}...`;
  await scheduler.onIdle();
  process.removeListener('SIGINT', onSigint);
  spinner.stop();

  const failed = reports.filter((report) => report.state === 'FAILED');
  if (context.json) {
    printJson({ ok: failed.length === 0, reports });
  } else {
    printHeader('Results');
    for (const report of reports) {
      if (report.state === 'SUCCEEDED') printSuccess(formatReport(report));
      else printError(formatReport(report));
    }
    console.log();
    if (submitted === 0) printWarning('Nothing to process');
    else if (failed.length === 0) printSuccess(`All ${submitted} file(s) branded`);
    else printError(`${failed.length} of ${submitted} file(s) failed`);
  }

  if (failed.length > 0) process.exitCode = 1;
}
