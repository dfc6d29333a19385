/**
 * Folder Watcher
 *
 * Monitors the input directory using native fs.watch with debouncing and
 * emits a `file` event once a new file has stopped growing.
 *
 * Features:
 * - Debounced events (prevents duplicate triggers)
 * - Ignores hidden files and partial downloads
 * - Extension filter
 * - File stability detection (wait for writes to complete)
 * - Scan of files already present at startup
 */

import { EventEmitter } from 'node:events';
import { watch, type FSWatcher } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { DEFAULT_VIDEO_EXTENSIONS } from '@brandcast/core';
import { createLogger, getExtension, type Logger } from '@brandcast/utils';

export interface WatchEvent {
  path: string;
  extension: string;
  size: number;
  timestamp: Date;
}

export interface WatcherConfig {
  // Directory to watch (not recursive)
  directory: string;

  // File extensions to accept, lowercase with dot
  extensions?: readonly string[];

  // Debounce delay in ms
  debounceMs?: number;

  // Wait for file to be stable (no writes) before emitting
  stabilityThresholdMs?: number;

  // Ignore hidden files
  ignoreHidden?: boolean;

  // Ignore partial download files
  ignorePartials?: boolean;

  logger?: Logger;
}

interface PendingFile {
  lastSize: number;
  lastModified: number;
  checkCount: number;
}

// Common partial download patterns
const PARTIAL_PATTERNS = [
  /\.part$/i,
  /\.partial$/i,
  /\.crdownload$/i,
  /\.download$/i,
  /\.tmp$/i,
  /\.temp$/i,
  /~$/,
];

export interface IgnoreOptions {
  extensions: readonly string[];
  ignoreHidden: boolean;
  ignorePartials: boolean;
}

export function shouldIgnoreFile(filename: string, options: IgnoreOptions): boolean {
  if (options.ignoreHidden && filename.startsWith('.')) {
    return true;
  }
  if (options.ignorePartials && PARTIAL_PATTERNS.some((pattern) => pattern.test(filename))) {
    return true;
  }
  if (options.extensions.length > 0 && !options.extensions.includes(getExtension(filename))) {
    return true;
  }
  return false;
}

/**
 * Events: `ready`, `file` (WatchEvent), `error` ({ path, error }), `close`
 */
export class FolderWatcher extends EventEmitter {
  private readonly directory: string;
  private readonly ignore: IgnoreOptions;
  private readonly debounceMs: number;
  private readonly stabilityThresholdMs: number;
  private readonly logger: Logger;
  private watcher: FSWatcher | null = null;
  private debounceTimers: Map<string, NodeJS.Timeout> = new Map();
  private pendingFiles: Map<string, PendingFile> = new Map();
  private stabilityCheckInterval: NodeJS.Timeout | null = null;
  private checking = false;

  constructor(config: WatcherConfig) {
    super();

    this.directory = config.directory;
    this.ignore = {
      extensions: (config.extensions ?? DEFAULT_VIDEO_EXTENSIONS).map((ext) => ext.toLowerCase()),
      ignoreHidden: config.ignoreHidden ?? true,
      ignorePartials: config.ignorePartials ?? true,
    };
    this.debounceMs = config.debounceMs ?? 500;
    this.stabilityThresholdMs = config.stabilityThresholdMs ?? 2000;
    this.logger = createLogger({ module: 'folder-watcher' }, config.logger);
  }

  /**
   * Start watching the directory
   */
  start(): void {
    if (this.watcher) {
      throw new Error('Watcher is already running');
    }

    const watcher = watch(this.directory, { recursive: false }, (_eventType, filename) => {
      if (filename) {
        this.handleFileEvent(filename);
      }
    });
    watcher.on('error', (error) => {
      this.emit('error', { path: this.directory, error });
    });
    this.watcher = watcher;

    // Two unchanged checks in a row make a file stable
    this.stabilityCheckInterval = setInterval(() => {
      this.checkFileStability().catch((error: unknown) => {
        this.emit('error', { path: this.directory, error });
      });
    }, Math.max(50, Math.floor(this.stabilityThresholdMs / 2)));

    this.logger.info({ directory: this.directory }, 'Watching for new files');
    this.emit('ready', { directory: this.directory });
  }

  /**
   * Stop watching
   */
  stop(): void {
    this.watcher?.close();
    this.watcher = null;

    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer);
    }
    this.debounceTimers.clear();
    this.pendingFiles.clear();

    if (this.stabilityCheckInterval) {
      clearInterval(this.stabilityCheckInterval);
      this.stabilityCheckInterval = null;
    }

    this.emit('close');
  }

  get running(): boolean {
    return this.watcher !== null;
  }

  /**
   * Files already in the directory that pass the filters, sorted by name
   */
  async scanExisting(): Promise<string[]> {
    const entries = await readdir(this.directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && !shouldIgnoreFile(entry.name, this.ignore))
      .map((entry) => join(this.directory, entry.name))
      .sort();
  }

  private handleFileEvent(filename: string): void {
    if (shouldIgnoreFile(filename, this.ignore)) {
      return;
    }

    const fullPath = join(this.directory, filename);
    const existingTimer = this.debounceTimers.get(fullPath);
    if (existingTimer) {
      clearTimeout(existingTimer);
    }

    const timer = setTimeout(() => {
      this.debounceTimers.delete(fullPath);
      this.trackFile(fullPath).catch((error: unknown) => {
        this.emit('error', { path: fullPath, error });
      });
    }, this.debounceMs);

    this.debounceTimers.set(fullPath, timer);
  }

  private async trackFile(fullPath: string): Promise<void> {
    const stats = await statOrNull(fullPath);
    if (!stats || !stats.isFile()) {
      // Deleted or renamed away
      this.pendingFiles.delete(fullPath);
      return;
    }

    // New or modified - (re)start the stability check
    this.pendingFiles.set(fullPath, {
      lastSize: stats.size,
      lastModified: stats.mtimeMs,
      checkCount: 0,
    });
  }

  private async checkFileStability(): Promise<void> {
    if (this.checking) return;
    this.checking = true;

    try {
      for (const [path, pending] of this.pendingFiles) {
        const stats = await statOrNull(path);

        if (!stats) {
          this.pendingFiles.delete(path);
          continue;
        }

        if (stats.size === pending.lastSize && stats.mtimeMs === pending.lastModified) {
          pending.checkCount++;

          if (pending.checkCount >= 2) {
            this.pendingFiles.delete(path);
            this.logger.debug({ path, size: stats.size }, 'File is stable');
            this.emit('file', {
              path,
              extension: getExtension(path),
              size: stats.size,
              timestamp: new Date(),
            });
          }
        } else {
          pending.lastSize = stats.size;
          pending.lastModified = stats.mtimeMs;
          pending.checkCount = 0;
        }
      }
    } finally {
      this.checking = false;
    }
  }
}

async function statOrNull(path: string) {
  try {
    return await stat(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
