import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AssetMissingError } from '@brandcast/core';
import { pathExists, type CommandRunner } from '@brandcast/utils';
import { BrandcastService } from '../src/service.js';
import { testSettings } from './helpers.js';

const runner: CommandRunner = async (command) => ({
  exitCode: command === '/opt/ffmpeg' ? 0 : 1,
  stdout: '',
  stderr: command === '/opt/ffmpeg' ? '' : 'not found',
  duration: 1,
  timedOut: false,
  aborted: false,
});

describe('BrandcastService', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'brandcast-service-'));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('creates the configured directories', async () => {
    const settings = testSettings(baseDir, { video_processing: { failed_dir: 'failed' } });
    const service = new BrandcastService({ settings, runner });

    await service.prepareDirectories();

    for (const dir of ['input', 'output', 'processed', 'failed', 'temp']) {
      expect(await pathExists(join(baseDir, dir))).toBe(true);
    }
  });

  it('reports which encoder binaries answer', async () => {
    const service = new BrandcastService({
      settings: testSettings(baseDir),
      runner,
      ffmpegPath: '/opt/ffmpeg',
      ffprobePath: '/opt/ffprobe',
    });

    await expect(service.checkTools()).resolves.toEqual({
      ffmpeg: { path: '/opt/ffmpeg', available: true },
      ffprobe: { path: '/opt/ffprobe', available: false },
    });
  });

  it('fails asset resolution when a logo is missing', async () => {
    const service = new BrandcastService({ settings: testSettings(baseDir), runner });

    await expect(service.resolveAssets()).rejects.toBeInstanceOf(AssetMissingError);
  });
});
