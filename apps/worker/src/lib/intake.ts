import type { Logger } from '@brandcast/utils';
import type { FolderWatcher, WatchEvent } from '@brandcast/watcher';

export interface JobSubmitter {
  submit(path: string): unknown;
}

/**
 * Feed the scheduler from the input folder. The watcher starts before the
 * scan so a file landing in between is still seen; the scheduler ignores
 * the second submission when both report it.
 */
export async function startIntake(watcher: FolderWatcher, scheduler: JobSubmitter, logger: Logger): Promise<number> {
  watcher.on('file', (event: WatchEvent) => {
    scheduler.submit(event.path);
  });
  watcher.start();

  const existing = await watcher.scanExisting();
  if (existing.length > 0) {
    logger.info({ count: existing.length }, 'Queueing files already in the input folder');
  }
  for (const path of existing) {
    scheduler.submit(path);
  }
  return existing.length;
}
