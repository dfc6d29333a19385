import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  AssetMissingError,
  BrandcastError,
  CancelledError,
  CorruptOutputError,
  UnreadableVideoError,
  type OverlayPlan,
  type VideoDescriptor,
} from '@brandcast/core';
import { CompositionEngine } from '../src/compositionEngine.js';
import type { MediaEncoder, TranscodeRequest } from '../src/encoder.js';
import { staticOverlay } from './fixtures.js';

function fakeEncoder(duration = 10): MediaEncoder & { requests: TranscodeRequest[] } {
  const requests: TranscodeRequest[] = [];
  return {
    requests,
    probe: vi.fn(async (path: string): Promise<VideoDescriptor> => ({
      path, duration, width: 1280, height: 720, frameRate: 25, hasAudio: true,
    })),
    transcode: vi.fn(async (request: TranscodeRequest) => {
      requests.push(request);
    }),
    concat: vi.fn(async () => undefined),
  };
}

describe('CompositionEngine', () => {
  let workDir: string;
  let plan: OverlayPlan;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'brandcast-compose-'));
    const logoPath = join(workDir, 'logo.png');
    await writeFile(logoPath, 'png');
    plan = { segmentKind: 'middle', instructions: [{ ...staticOverlay, sourcePath: logoPath }] };
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  describe('render', () => {
    it('transcodes the segment range into the work directory', async () => {
      const encoder = fakeEncoder();
      const engine = new CompositionEngine({ encoder, durationToleranceSeconds: 1 });

      const output = await engine.render('/in/a.mp4', { kind: 'middle', start: 3, end: 7 }, plan, workDir);

      expect(output).toBe(join(workDir, 'segment-1-middle.mp4'));
      expect(encoder.requests).toEqual([
        { source: '/in/a.mp4', start: 3, duration: 4, overlays: plan.instructions, output },
      ]);
    });

    it('refuses to render when a logo disappeared', async () => {
      const encoder = fakeEncoder();
      const engine = new CompositionEngine({ encoder, durationToleranceSeconds: 1 });
      const missing: OverlayPlan = {
        segmentKind: 'intro',
        instructions: [{ ...staticOverlay, sourcePath: join(workDir, 'gone.png') }],
      };

      await expect(engine.render('/in/a.mp4', { kind: 'intro', start: 0, end: 3 }, missing, workDir))
        .rejects.toBeInstanceOf(AssetMissingError);
      expect(encoder.transcode).not.toHaveBeenCalled();
    });

    it('does not start once cancelled', async () => {
      const encoder = fakeEncoder();
      const engine = new CompositionEngine({ encoder, durationToleranceSeconds: 1 });
      const controller = new AbortController();
      controller.abort();

      await expect(engine.render('/in/a.mp4', { kind: 'intro', start: 0, end: 3 }, plan, workDir, controller.signal))
        .rejects.toBeInstanceOf(CancelledError);
    });
  });

  describe('join', () => {
    it('passes the files through in order', async () => {
      const encoder = fakeEncoder();
      const engine = new CompositionEngine({ encoder, durationToleranceSeconds: 1 });
      const files = ['/w/segment-0-intro.mp4', '/w/segment-2-outro.mp4'];

      await expect(engine.join(files, '/w/joined.mp4')).resolves.toBe('/w/joined.mp4');
      expect(encoder.concat).toHaveBeenCalledWith(files, '/w/joined.mp4', undefined);
    });

    it('rejects an empty list', async () => {
      const engine = new CompositionEngine({ encoder: fakeEncoder(), durationToleranceSeconds: 1 });

      await expect(engine.join([], '/w/joined.mp4')).rejects.toBeInstanceOf(BrandcastError);
    });
  });

  describe('validate', () => {
    it('accepts a file within the tolerance', async () => {
      const output = join(workDir, 'joined.mp4');
      await writeFile(output, 'data');
      const engine = new CompositionEngine({ encoder: fakeEncoder(10.4), durationToleranceSeconds: 1 });

      const descriptor = await engine.validate(output, 10);

      expect(descriptor.duration).toBe(10.4);
    });

    it('flags a duration mismatch as corrupt', async () => {
      const output = join(workDir, 'joined.mp4');
      await writeFile(output, 'data');
      const engine = new CompositionEngine({ encoder: fakeEncoder(7), durationToleranceSeconds: 1 });

      await expect(engine.validate(output, 10)).rejects.toThrow(
        `Output ${output} failed validation: duration 7.000s deviates from expected 10.000s`
      );
    });

    it('flags a missing file', async () => {
      const engine = new CompositionEngine({ encoder: fakeEncoder(), durationToleranceSeconds: 1 });

      await expect(engine.validate(join(workDir, 'none.mp4'), 10)).rejects.toThrow('file was not produced');
    });

    it('flags an empty file', async () => {
      const output = join(workDir, 'joined.mp4');
      await writeFile(output, '');
      const engine = new CompositionEngine({ encoder: fakeEncoder(), durationToleranceSeconds: 1 });

      await expect(engine.validate(output, 10)).rejects.toThrow('file is empty');
    });

    it('turns an unreadable output into a corrupt one', async () => {
      const output = join(workDir, 'joined.mp4');
      await writeFile(output, 'data');
      const encoder = fakeEncoder();
      encoder.probe = async (path: string) => {
        throw new UnreadableVideoError(path, 'moov atom not found');
      };
      const engine = new CompositionEngine({ encoder, durationToleranceSeconds: 1 });

      await expect(engine.validate(output, 10)).rejects.toBeInstanceOf(CorruptOutputError);
    });
  });
});
