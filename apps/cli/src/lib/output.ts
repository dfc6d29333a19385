/**
 * Output Formatter
 *
 * Consistent CLI output formatting. The `format*` helpers return plain
 * text; the `print*` helpers add colour and write to the terminal.
 */

import chalk from 'chalk';
import {
  ConfigurationError,
  describeError,
  segmentDuration,
  type JobReport,
  type OverlayInstruction,
  type Segment,
  type VideoDescriptor,
} from '@brandcast/core';
import { formatDuration, formatSeconds } from '@brandcast/utils';
import { basename } from 'node:path';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * Print an error, listing every issue of a configuration error
 */
export function printFailure(error: unknown): void {
  if (error instanceof ConfigurationError) {
    printError(error.message.split('\n')[0] ?? error.message);
    for (const issue of error.issues) {
      console.error(`    ${chalk.gray('-')} ${issue}`);
    }
    return;
  }
  printError(describeError(error));
}

export function formatDescriptor(descriptor: VideoDescriptor): string {
  const audio = descriptor.hasAudio ? 'with audio' : 'no audio';
  return `${descriptor.width}x${descriptor.height} @ ${descriptor.frameRate.toFixed(2)} fps, ` +
    `${formatSeconds(descriptor.duration)}s, ${audio}`;
}

export function formatSegment(segment: Segment): string {
  return `${segment.kind.padEnd(6)} ${formatSeconds(segment.start)}s -> ${formatSeconds(segment.end)}s ` +
    `(${formatSeconds(segmentDuration(segment))}s)`;
}

export function formatOverlay(instruction: OverlayInstruction): string {
  const extras: string[] = [];
  if (instruction.opacity < 1) extras.push(`opacity ${instruction.opacity}`);
  if (instruction.loop) extras.push('looped');
  const suffix = extras.length > 0 ? ` [${extras.join(', ')}]` : '';
  return `${instruction.asset.padEnd(8)} ${instruction.width}x${instruction.height} at ` +
    `(${instruction.x}, ${instruction.y})${suffix}`;
}

export function formatReport(report: JobReport): string {
  const name = basename(report.sourcePath);
  const attempts = `${report.attempts} attempt${report.attempts === 1 ? '' : 's'}`;
  const { startedAt, finishedAt } = report.timestamps;
  const took = startedAt ? `, ${formatDuration(finishedAt.getTime() - startedAt.getTime())}` : '';

  if (report.state === 'SUCCEEDED') {
    return `${name} -> ${report.outputPath ?? '(no output)'} (${attempts}${took})`;
  }
  return `${name} ${report.reason ?? 'FAILED'}: ${report.message ?? 'no details'} (${attempts}${took})`;
}
