import type { OutputSettings, OverlayInstruction, QualitySettings } from '@brandcast/core';
import type { CommandResult } from '@brandcast/utils';

export const outputSettings: OutputSettings = {
  videoCodec: 'libx264',
  audioCodec: 'aac',
  preserveAudio: true,
  crf: 23,
  preset: 'medium',
  bitrate: null,
  audioBitrate: null,
  fps: null,
  pixelFormat: 'yuv420p',
};

export const qualitySettings: QualitySettings = {
  hardwareAcceleration: false,
  gpuCodec: 'h264_nvenc',
  hwaccel: null,
  threads: null,
  bufferSize: null,
};

export const staticOverlay: OverlayInstruction = {
  asset: 'static',
  sourcePath: '/assets/logo.png',
  x: 20,
  y: 20,
  width: 160,
  height: 80,
  opacity: 1,
  scale: 1,
  loop: false,
};

export const animatedOverlay: OverlayInstruction = {
  asset: 'animated',
  sourcePath: '/assets/logo.mp4',
  x: 860,
  y: 860,
  width: 200,
  height: 100,
  opacity: 0.5,
  scale: 1,
  loop: true,
};

export function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    exitCode: 0,
    stdout: '',
    stderr: '',
    duration: 10,
    timedOut: false,
    aborted: false,
    ...overrides,
  };
}
