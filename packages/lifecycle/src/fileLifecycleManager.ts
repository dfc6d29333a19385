/**
 * File Lifecycle Manager
 *
 * Applies the end of a job to the filesystem:
 * - SUCCEEDED: promote the joined file into the output directory, then move
 *   the source to the processed directory (or delete it). Once the output is
 *   promoted the job is done; a source that cannot be moved stays in place.
 * - FAILED: leave the source, or move it to the failed directory
 * - CANCELLED: leave everything; partial output is never promoted
 *
 * Finalisations run one at a time so name selection and the move that
 * claims the name cannot interleave between jobs.
 */

import type { DirectorySettings, FailureReason, FileManagementSettings } from '@brandcast/core';
import { createLogger, moveFile, removeFile, SerialQueue, type Logger } from '@brandcast/utils';
import { OutputNamer, uniqueDestination } from './outputNaming.js';
import { SequenceCounter } from './sequenceCounter.js';

export type FinalizeOutcome =
  | { state: 'SUCCEEDED'; sourcePath: string; joinedPath: string }
  | { state: 'FAILED'; sourcePath: string; reason: FailureReason }
  | { state: 'CANCELLED'; sourcePath: string };

export type SourceDisposition = 'processed' | 'deleted' | 'failed' | 'left' | 'missing';

export interface FinalizeResult {
  outputPath: string | null;
  source: SourceDisposition;
  /** Where the source ended up, when it moved */
  sourceDestination: string | null;
}

export interface FileLifecycleManagerOptions {
  directories: Pick<DirectorySettings, 'output' | 'processed' | 'failed'>;
  files: FileManagementSettings;
  clock?: () => Date;
  logger?: Logger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileLifecycleManager {
  private readonly directories: FileLifecycleManagerOptions['directories'];
  private readonly sourceAction: FileManagementSettings['sourceAction'];
  private readonly namer: OutputNamer;
  private readonly clock: () => Date;
  private readonly queue = new SerialQueue();
  private readonly logger: Logger;

  constructor(options: FileLifecycleManagerOptions) {
    this.directories = options.directories;
    this.sourceAction = options.files.sourceAction;
    this.clock = options.clock ?? (() => new Date());
    this.logger = createLogger({ module: 'file-lifecycle' }, options.logger);
    this.namer = new OutputNamer({
      policy: options.files.outputNaming,
      outputDir: options.directories.output,
      counter: options.files.outputNaming === 'sequential'
        ? new SequenceCounter(options.files.counterFile, options.logger)
        : undefined,
      clock: this.clock,
    });
  }

  finalize(outcome: FinalizeOutcome): Promise<FinalizeResult> {
    return this.queue.run<FinalizeResult>(async () => {
      switch (outcome.state) {
        case 'SUCCEEDED':
          return this.finalizeSuccess(outcome.sourcePath, outcome.joinedPath);
        case 'FAILED':
          return this.finalizeFailure(outcome.sourcePath, outcome.reason);
        case 'CANCELLED':
          this.logger.info({ sourcePath: outcome.sourcePath }, 'Job cancelled, source left in place');
          return { outputPath: null, source: 'left', sourceDestination: null };
      }
    });
  }

  private async finalizeSuccess(sourcePath: string, joinedPath: string): Promise<FinalizeResult> {
    const outputPath = await this.namer.resolve(sourcePath);
    await moveFile(joinedPath, outputPath);
    this.logger.info({ sourcePath, outputPath }, 'Output promoted');

    try {
      if (this.sourceAction === 'delete') {
        await removeFile(sourcePath);
        return { outputPath, source: 'deleted', sourceDestination: null };
      }

      const destination = await uniqueDestination(this.directories.processed, sourcePath, this.clock());
      await moveFile(sourcePath, destination);
      this.logger.debug({ sourcePath, destination }, 'Source moved to processed');
      return { outputPath, source: 'processed', sourceDestination: destination };
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn({ sourcePath }, 'Source vanished before it could be moved');
        return { outputPath, source: 'missing', sourceDestination: null };
      }
      // The output is already promoted, so the job stays a success
      this.logger.warn({ sourcePath, outputPath, err: error }, 'Could not dispose of source, left in place');
      return { outputPath, source: 'left', sourceDestination: null };
    }
  }

  private async finalizeFailure(sourcePath: string, reason: FailureReason): Promise<FinalizeResult> {
    const failedDir = this.directories.failed;
    if (failedDir === null) {
      return { outputPath: null, source: 'left', sourceDestination: null };
    }

    try {
      const destination = await uniqueDestination(failedDir, sourcePath, this.clock());
      await moveFile(sourcePath, destination);
      this.logger.info({ sourcePath, destination, reason }, 'Source moved to failed directory');
      return { outputPath: null, source: 'failed', sourceDestination: destination };
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      this.logger.warn({ sourcePath }, 'Source vanished before it could be moved');
      return { outputPath: null, source: 'missing', sourceDestination: null };
    }
  }
}
