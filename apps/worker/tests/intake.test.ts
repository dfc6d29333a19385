import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { logger } from '@brandcast/utils';
import { FolderWatcher } from '@brandcast/watcher';
import { startIntake } from '../src/lib/intake.js';

describe('startIntake', () => {
  let dir: string;
  let watcher: FolderWatcher;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'brandcast-intake-'));
    watcher = new FolderWatcher({ directory: dir, extensions: ['.mp4'] });
  });

  afterEach(async () => {
    watcher.stop();
    await rm(dir, { recursive: true, force: true });
  });

  it('starts watching before it scans the folder', async () => {
    await writeFile(join(dir, 'waiting.mp4'), 'video');
    await writeFile(join(dir, 'notes.txt'), 'text');
    const scan = watcher.scanExisting.bind(watcher);
    const runningAtScan: boolean[] = [];
    vi.spyOn(watcher, 'scanExisting').mockImplementation(() => {
      runningAtScan.push(watcher.running);
      return scan();
    });
    const submitted: string[] = [];

    const count = await startIntake(watcher, { submit: (path) => submitted.push(path) }, logger);

    expect(runningAtScan).toEqual([true]);
    expect(count).toBe(1);
    expect(submitted).toEqual([join(dir, 'waiting.mp4')]);
  });
});
