import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CancelledError, EncodeFailedError, type VideoDescriptor } from '@brandcast/core';
import type { VideoProbe } from '@brandcast/media';
import type { CommandRunner } from '@brandcast/utils';
import { FFmpeg } from '../src/ffmpeg.js';
import { FFmpegEncoder, buildConcatList } from '../src/encoder.js';
import { animatedOverlay, commandResult, outputSettings, qualitySettings, staticOverlay } from './fixtures.js';

const probe: VideoProbe = {
  probe: async (path: string): Promise<VideoDescriptor> => ({
    path, duration: 10, width: 1920, height: 1080, frameRate: 25, hasAudio: true,
  }),
};

const request = {
  source: '/in/a.mp4',
  start: 7,
  duration: 3,
  overlays: [staticOverlay, animatedOverlay],
  output: '/work/segment-2-outro.mp4',
};

describe('FFmpegEncoder', () => {
  it('builds a segment render command', () => {
    const encoder = new FFmpegEncoder({ ffmpeg: new FFmpeg(), probe, output: outputSettings, quality: qualitySettings });

    expect(encoder.buildTranscodeArgs(request)).toEqual([
      '-ss', '7', '-t', '3', '-i', '/in/a.mp4',
      '-loop', '1', '-i', '/assets/logo.png',
      '-stream_loop', '-1', '-i', '/assets/logo.mp4',
      '-filter_complex',
      '[1:v]scale=160:80,format=rgba[logo1];[0:v][logo1]overlay=20:20[v1];' +
        '[2:v]scale=200:100,format=rgba,colorchannelmixer=aa=0.5[logo2];[v1][logo2]overlay=860:860[vout]',
      '-map', '[vout]',
      '-map', '0:a?',
      '-c:v', 'libx264', '-preset', 'medium', '-crf', '23', '-pix_fmt', 'yuv420p',
      '-c:a', 'aac',
      '-t', '3',
      '-movflags', '+faststart',
      '/work/segment-2-outro.mp4',
    ]);
  });

  it('switches to the GPU codec and drops audio when configured', () => {
    const encoder = new FFmpegEncoder({
      ffmpeg: new FFmpeg(),
      probe,
      output: { ...outputSettings, preserveAudio: false, fps: 30, bitrate: '4M' },
      quality: { ...qualitySettings, hardwareAcceleration: true, hwaccel: 'cuda', threads: 4, bufferSize: '8M' },
    });

    const args = encoder.buildTranscodeArgs({ ...request, overlays: [staticOverlay] });

    expect(args.slice(0, 2)).toEqual(['-hwaccel', 'cuda']);
    expect(args).not.toContain('0:a?');
    const codecStart = args.indexOf('-c:v');
    expect(args.slice(codecStart, args.indexOf('/work/segment-2-outro.mp4'))).toEqual([
      '-c:v', 'h264_nvenc', '-preset', 'medium', '-crf', '23', '-b:v', '4M', '-bufsize', '8M',
      '-pix_fmt', 'yuv420p', '-threads', '4',
      '-an',
      '-r', '30', '-t', '3', '-movflags', '+faststart',
    ]);
  });

  it('builds a stream-copy concat command', () => {
    const encoder = new FFmpegEncoder({ ffmpeg: new FFmpeg(), probe, output: outputSettings, quality: qualitySettings });

    expect(encoder.buildConcatArgs('/work/concat.txt', '/work/joined.mp4')).toEqual([
      '-safe', '0', '-f', 'concat', '-i', '/work/concat.txt',
      '-map', '0:v', '-map', '0:a?',
      '-c:v', 'copy', '-c:a', 'copy',
      '-movflags', '+faststart',
      '/work/joined.mp4',
    ]);
  });

  it('raises EncodeFailedError on a non-zero exit', async () => {
    const runner: CommandRunner = async () => commandResult({ exitCode: 1, stderr: 'Conversion failed!' });
    const encoder = new FFmpegEncoder({ ffmpeg: new FFmpeg({ runner }), probe, output: outputSettings, quality: qualitySettings });

    await expect(encoder.transcode(request)).rejects.toBeInstanceOf(EncodeFailedError);
  });

  it('raises CancelledError when the run was aborted', async () => {
    const runner: CommandRunner = async () => commandResult({ exitCode: 255, aborted: true });
    const encoder = new FFmpegEncoder({ ffmpeg: new FFmpeg({ runner }), probe, output: outputSettings, quality: qualitySettings });

    await expect(encoder.transcode(request)).rejects.toBeInstanceOf(CancelledError);
  });

  it('forwards the abort signal to the runner', async () => {
    const runner = vi.fn<CommandRunner>(async () => commandResult());
    const encoder = new FFmpegEncoder({ ffmpeg: new FFmpeg({ runner, timeout: 1000 }), probe, output: outputSettings, quality: qualitySettings });
    const controller = new AbortController();

    await encoder.transcode(request, controller.signal);

    expect(runner).toHaveBeenCalledWith(
      'ffmpeg',
      expect.any(Array),
      { timeout: 1000, signal: controller.signal }
    );
    expect(runner.mock.calls[0]?.[1].slice(0, 6)).toEqual([
      '-hide_banner', '-nostdin', '-nostats', '-loglevel', 'error', '-y',
    ]);
  });

  describe('concat', () => {
    let workDir: string;

    beforeEach(async () => {
      workDir = await mkdtemp(join(tmpdir(), 'brandcast-concat-'));
    });

    afterEach(async () => {
      await rm(workDir, { recursive: true, force: true });
    });

    it('writes the segment list beside the output', async () => {
      const runner = vi.fn<CommandRunner>(async () => commandResult());
      const encoder = new FFmpegEncoder({ ffmpeg: new FFmpeg({ runner }), probe, output: outputSettings, quality: qualitySettings });

      await encoder.concat(['/work/a.mp4', "/work/it's.mp4"], join(workDir, 'joined.mp4'));

      const list = await readFile(join(workDir, 'concat.txt'), 'utf8');
      expect(list).toBe("ffconcat version 1.0\nfile '/work/a.mp4'\nfile '/work/it'\\''s.mp4'\n");
    });
  });
});

describe('buildConcatList', () => {
  it('keeps the given order', () => {
    expect(buildConcatList(['/w/2.mp4', '/w/1.mp4'])).toBe("ffconcat version 1.0\nfile '/w/2.mp4'\nfile '/w/1.mp4'\n");
  });
});
