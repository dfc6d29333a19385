/**
 * Overlay Filter Graph
 *
 * Builds the -filter_complex string compositing an overlay plan onto the
 * source picture. Input 0 is the source; overlay instruction i reads from
 * input i + 1.
 */

import type { OverlayInstruction } from '@brandcast/core';

export const FILTER_OUTPUT_LABEL = 'vout';

/**
 * Filter chain preparing one logo: resize, alpha-capable pixel format, and
 * an alpha multiplier only when the logo is translucent.
 */
export function buildLogoChain(instruction: OverlayInstruction): string {
  const filters = [`scale=${instruction.width}:${instruction.height}`, 'format=rgba'];
  if (instruction.opacity < 1) {
    filters.push(`colorchannelmixer=aa=${Number(instruction.opacity.toFixed(3))}`);
  }
  return filters.join(',');
}

export function buildOverlayFilterGraph(instructions: readonly OverlayInstruction[]): string {
  if (instructions.length === 0) {
    return `[0:v]null[${FILTER_OUTPUT_LABEL}]`;
  }

  const parts: string[] = [];
  let base = '[0:v]';

  instructions.forEach((instruction, index) => {
    const input = index + 1;
    const logo = `[logo${input}]`;
    const target = index === instructions.length - 1 ? `[${FILTER_OUTPUT_LABEL}]` : `[v${input}]`;

    parts.push(`[${input}:v]${buildLogoChain(instruction)}${logo}`);
    parts.push(`${base}${logo}overlay=${instruction.x}:${instruction.y}${target}`);
    base = target;
  });

  return parts.join(';');
}

/**
 * Input arguments for a logo: still images repeat their single frame,
 * clips loop for as long as the segment runs.
 */
export function logoInputArgs(instruction: OverlayInstruction): string[] {
  return instruction.loop ? ['-stream_loop', '-1'] : ['-loop', '1'];
}
