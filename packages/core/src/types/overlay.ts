/**
 * Overlay Types
 */

import type { SegmentKind } from './segment.js';

/**
 * Where a logo sits on the output frame.
 * `centered` anchors horizontally in the middle, `bottomMargin` pixels above
 * the bottom edge.
 */
export type Position =
  | { readonly kind: 'absolute'; readonly x: number; readonly y: number }
  | { readonly kind: 'centered'; readonly bottomMargin: number };

export type LogoRole = 'static' | 'animated';

/**
 * Intrinsic geometry of a logo asset as probed from disk
 */
export interface LogoAsset {
  readonly role: LogoRole;
  readonly path: string;
  readonly width: number;
  readonly height: number;
  /** Seconds; only set for animated assets */
  readonly duration?: number;
}

export interface ResolvedAssets {
  readonly static: LogoAsset;
  readonly animated: LogoAsset;
}

/**
 * One overlay to composite over a segment, in output-frame pixels
 */
export interface OverlayInstruction {
  readonly asset: LogoRole;
  readonly sourcePath: string;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly opacity: number;
  readonly scale: number;
  /** Loop the asset for the whole segment (animated clips) */
  readonly loop: boolean;
}

export interface OverlayPlan {
  readonly segmentKind: SegmentKind;
  readonly instructions: readonly OverlayInstruction[];
}
