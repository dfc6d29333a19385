import { describe, expect, it } from 'vitest';
import { parseWorkerEnv } from '../src/config/env.js';

describe('parseWorkerEnv', () => {
  it('applies defaults and resolves the settings path against the root', () => {
    const result = parseWorkerEnv({}, '/srv/brandcast');

    expect(result).toEqual({
      success: true,
      config: {
        nodeEnv: 'development',
        logLevel: undefined,
        settingsPath: '/srv/brandcast/settings.json',
        mediaTools: { ffmpeg: undefined, ffprobe: undefined },
      },
    });
  });

  it('keeps absolute paths and tool overrides', () => {
    const result = parseWorkerEnv({
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      SETTINGS_PATH: '/etc/brandcast/settings.json',
      FFMPEG_PATH: '/opt/bin/ffmpeg',
    }, '/srv/brandcast');

    expect(result.success && result.config).toMatchObject({
      nodeEnv: 'production',
      logLevel: 'debug',
      settingsPath: '/etc/brandcast/settings.json',
      mediaTools: { ffmpeg: '/opt/bin/ffmpeg' },
    });
  });

  it('lists invalid variables', () => {
    const result = parseWorkerEnv({ NODE_ENV: 'staging', LOG_LEVEL: 'loud' }, '/srv');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues.map((issue) => issue.split(':')[0])).toEqual(['NODE_ENV', 'LOG_LEVEL']);
    }
  });
});
