import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '../src/errors/index.js';
import { loadSettings, parseSettings } from '../src/settings/loader.js';

const minimal = {
  video_processing: { intro_duration: 3, outro_duration: 3 },
};

describe('parseSettings', () => {
  it('fills defaults and resolves paths against the base directory', () => {
    const settings = parseSettings(minimal, '/srv/brand');

    expect(settings.segments).toEqual({ introDuration: 3, outroDuration: 3, minDuration: 6 });
    expect(settings.directories.input).toBe('/srv/brand/input');
    expect(settings.directories.failed).toBeNull();
    expect(settings.files.counterFile).toBe('/srv/brand/output/.sequence.json');
    expect(settings.logos.static.position).toEqual({ kind: 'absolute', x: 20, y: 20 });
    expect(settings.logos.animated.position).toEqual({ kind: 'centered', bottomMargin: 120 });
    expect(settings.performance.memoryLimitBytes).toBe(2048 * 1024 * 1024);
    expect(settings.retry.maxRetryAttempts).toBe(3);
    expect(settings.logging.file).toBe('/srv/brand/video_processor.log');
  });

  it('maps an explicit animated position to an absolute one', () => {
    const settings = parseSettings({
      ...minimal,
      logo_configuration: { animated_logo: { position: [40, 600], bottom_margin: 90 } },
    }, '/srv');

    expect(settings.logos.animated.position).toEqual({ kind: 'absolute', x: 40, y: 600 });
  });

  it('disables retries when retry_failed_processing is false', () => {
    const settings = parseSettings({
      ...minimal,
      advanced_settings: { retry_failed_processing: false, max_retry_attempts: 5 },
    }, '/srv');

    expect(settings.retry.maxRetryAttempts).toBe(0);
  });

  it('returns a frozen snapshot', () => {
    const settings = parseSettings(minimal, '/srv');
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.logos.static)).toBe(true);
  });

  it('rejects out-of-range values with their paths', () => {
    try {
      parseSettings({
        ...minimal,
        output_settings: { crf: 60 },
        logo_configuration: { static_logo: { opacity: 1.5 } },
      }, '/srv');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      const issues = error instanceof ConfigurationError ? error.issues : [];
      expect(issues.some((issue) => issue.startsWith('output_settings.crf:'))).toBe(true);
      expect(issues.some((issue) => issue.startsWith('logo_configuration.static_logo.opacity:'))).toBe(true);
    }
  });

  it('rejects a missing intro duration', () => {
    expect(() => parseSettings({ video_processing: { outro_duration: 3 } }, '/srv')).toThrow(ConfigurationError);
  });

  it('rejects unknown keys', () => {
    expect(() => parseSettings({ ...minimal, extras: true }, '/srv')).toThrow(ConfigurationError);
  });
});

describe('loadSettings', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'brandcast-settings-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('reads a settings file relative to its directory', async () => {
    const file = join(root, 'settings.json');
    await writeFile(file, JSON.stringify(minimal));

    const settings = await loadSettings(file);

    expect(settings.directories.temp).toBe(join(root, 'temp'));
  });

  it('reports malformed JSON as a configuration error', async () => {
    const file = join(root, 'settings.json');
    await writeFile(file, '{ not json');

    await expect(loadSettings(file)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('reports a missing file as a configuration error', async () => {
    await expect(loadSettings(join(root, 'absent.json'))).rejects.toThrow(/cannot read file \(ENOENT\)/);
  });

  it('accepts the example settings shipped at the repository root', async () => {
    const example = fileURLToPath(new URL('../../../settings.json', import.meta.url));

    const settings = await loadSettings(example);

    expect(settings.logos.animated.position).toEqual({ kind: 'centered', bottomMargin: 120 });
    expect(settings.files.outputNaming).toBe('timestamp');
  });
});
