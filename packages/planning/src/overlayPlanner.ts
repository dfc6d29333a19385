/**
 * Overlay Planner
 *
 * Resolves logo settings and probed asset geometry into concrete overlay
 * instructions for one segment, in output-frame pixels.
 *
 * Intro and outro get the static logo then the animated one; the middle
 * gets the static logo only. Pure function of its inputs.
 */

import {
  InvalidGeometryError,
  type LogoAsset,
  type LogoSettings,
  type OverlayInstruction,
  type OverlayPlan,
  type Position,
  type ResolvedAssets,
  type SegmentKind,
} from '@brandcast/core';

export interface LogoConfiguration {
  readonly static: LogoSettings;
  readonly animated: LogoSettings;
}

interface Size {
  width: number;
  height: number;
}

/**
 * Overlay size from the configured box and the asset's aspect ratio.
 * Both dimensions set: used as-is. One set: the other follows the aspect
 * ratio. Neither: the asset's own size. Scale applies last.
 */
export function resolveOverlaySize(asset: LogoAsset, logo: LogoSettings): Size {
  const aspect = asset.width / asset.height;
  let width: number;
  let height: number;

  if (logo.width !== null && logo.height !== null) {
    width = logo.width;
    height = logo.height;
  } else if (logo.height !== null) {
    height = logo.height;
    width = height * aspect;
  } else if (logo.width !== null) {
    width = logo.width;
    height = width / aspect;
  } else {
    width = asset.width;
    height = asset.height;
  }

  return {
    width: Math.round(width * logo.scale),
    height: Math.round(height * logo.scale),
  };
}

/**
 * Top-left corner of an overlay of `size` on a `frameWidth` x `frameHeight` frame
 */
export function resolvePosition(
  position: Position,
  size: Size,
  frameWidth: number,
  frameHeight: number
): { x: number; y: number } {
  switch (position.kind) {
    case 'absolute':
      return { x: position.x, y: position.y };
    case 'centered':
      return {
        x: Math.floor((frameWidth - size.width) / 2),
        y: frameHeight - position.bottomMargin - size.height,
      };
  }
}

function planInstruction(
  asset: LogoAsset,
  logo: LogoSettings,
  frameWidth: number,
  frameHeight: number
): OverlayInstruction {
  const size = resolveOverlaySize(asset, logo);
  const details = { ...size, frameWidth, frameHeight };

  if (size.width <= 0 || size.height <= 0) {
    throw new InvalidGeometryError(asset.role, `overlay size ${size.width}x${size.height} is empty`, details);
  }
  if (size.width > frameWidth || size.height > frameHeight) {
    throw new InvalidGeometryError(
      asset.role,
      `overlay ${size.width}x${size.height} does not fit a ${frameWidth}x${frameHeight} frame`,
      details
    );
  }

  const { x, y } = resolvePosition(logo.position, size, frameWidth, frameHeight);
  if (x < 0 || y < 0 || x >= frameWidth || y >= frameHeight) {
    throw new InvalidGeometryError(asset.role, `origin (${x}, ${y}) lies outside the frame`, { ...details, x, y });
  }

  return {
    asset: asset.role,
    sourcePath: asset.path,
    x,
    y,
    width: size.width,
    height: size.height,
    opacity: logo.opacity,
    scale: logo.scale,
    loop: asset.role === 'animated',
  };
}

export function planOverlays(
  segmentKind: SegmentKind,
  outputWidth: number,
  outputHeight: number,
  assets: ResolvedAssets,
  logos: LogoConfiguration
): OverlayPlan {
  const instructions: OverlayInstruction[] = [
    planInstruction(assets.static, logos.static, outputWidth, outputHeight),
  ];

  if (segmentKind !== 'middle') {
    instructions.push(planInstruction(assets.animated, logos.animated, outputWidth, outputHeight));
  }

  return { segmentKind, instructions };
}
