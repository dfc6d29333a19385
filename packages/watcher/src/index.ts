/**
 * @brandcast/watcher
 *
 * Source of newly arrived, fully written files in the input directory.
 */

export {
  FolderWatcher,
  shouldIgnoreFile,
  type WatcherConfig,
  type WatchEvent,
  type IgnoreOptions,
} from './folderWatcher.js';
