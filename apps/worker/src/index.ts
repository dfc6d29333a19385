/**
 * Worker Entry Point
 *
 * Long-running process that:
 * - Loads settings.json once and configures logging
 * - Creates the working directories and resolves both logos (fatal if missing)
 * - Queues videos already waiting in the input folder
 * - Watches the input folder and queues every new, fully written video
 *
 * SIGINT/SIGTERM stop the watcher, cancel running jobs and exit.
 */

import { describeError, loadSettings, type Settings } from '@brandcast/core';
import { BrandcastService, type JobScheduler } from '@brandcast/pipeline';
import { logger as bootLogger, type Logger } from '@brandcast/utils';
import { FolderWatcher } from '@brandcast/watcher';
import { config } from './config/index.js';
import { startIntake } from './lib/intake.js';
import { createWorkerLogger } from './lib/logger.js';
import { RunSummaryReporter } from './lib/reporter.js';

const SHUTDOWN_TIMEOUT_MS = 30000;

interface Runtime {
  logger: Logger;
  scheduler: JobScheduler;
  watcher: FolderWatcher;
  reporter: RunSummaryReporter;
}

let isShuttingDown = false;

async function start(settings: Settings): Promise<Runtime> {
  const logger = createWorkerLogger(settings);
  const reporter = new RunSummaryReporter(logger);
  const service = new BrandcastService({
    settings,
    ffmpegPath: config.mediaTools.ffmpeg,
    ffprobePath: config.mediaTools.ffprobe,
    reportSink: reporter,
    logger,
  });

  await service.prepareDirectories();

  const tools = await service.checkTools();
  if (!tools.ffmpeg.available || !tools.ffprobe.available) {
    throw new Error(`Encoder binaries not available: ffmpeg=${tools.ffmpeg.path} ffprobe=${tools.ffprobe.path}`);
  }

  const assets = await service.resolveAssets();
  logger.info({ static: assets.static.path, animated: assets.animated.path }, 'Logo assets resolved');

  const scheduler = service.createScheduler(assets);
  const watcher = new FolderWatcher({
    directory: settings.directories.input,
    extensions: settings.supportedExtensions,
    stabilityThresholdMs: settings.watcher.stabilityMs,
    logger,
  });

  watcher.on('error', (event: { path: string; error: unknown }) => {
    logger.error({ path: event.path, err: event.error }, 'Watcher error');
  });

  await startIntake(watcher, scheduler, logger);

  logger.info({
    input: settings.directories.input,
    output: settings.directories.output,
    maxConcurrentProcesses: settings.performance.maxConcurrentProcesses,
    parallelSegments: settings.performance.parallelSegments,
  }, 'Worker started');

  return { logger, scheduler, watcher, reporter };
}

function installShutdownHandlers(runtime: Runtime): void {
  const { logger, scheduler, watcher, reporter } = runtime;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress');
      return;
    }
    isShuttingDown = true;

    logger.info({ signal }, 'Shutdown signal received');

    // Set a hard timeout for shutdown
    const forceExitTimeout = setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      logger.info('Stopping watcher...');
      watcher.stop();

      logger.info('Cancelling jobs...');
      await scheduler.shutdown();

      clearTimeout(forceExitTimeout);
      logger.info({ ...reporter.summary() }, 'Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      clearTimeout(forceExitTimeout);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason: describeError(reason) }, 'Unhandled rejection');
    void shutdown('unhandledRejection');
  });
}

async function main(): Promise<void> {
  const settings = await loadSettings(config.settingsPath);
  const runtime = await start(settings);
  installShutdownHandlers(runtime);
}

main().catch((error: unknown) => {
  bootLogger.fatal({ err: error, settingsPath: config.settingsPath }, 'Worker failed to start');
  process.exit(1);
});
