/**
 * Plan Command
 *
 * Probe one file and show how it would be split and branded. Nothing is
 * rendered.
 */

import ora from 'ora';
import chalk from 'chalk';
import { resolve } from 'node:path';
import type { Command } from 'commander';
import { describeError, type OverlayPlan, type Segment } from '@brandcast/core';
import { planOverlays, planSegmentsFor, renderableSegments } from '@brandcast/planning';
import { createContext, globalOptions } from '../lib/context.js';
import {
  formatDescriptor,
  formatOverlay,
  formatSegment,
  printFailure,
  printHeader,
  printJson,
  printKeyValue,
} from '../lib/output.js';

interface PlannedSegment {
  segment: Segment;
  overlays: OverlayPlan;
}

export async function planCommand(file: string, _options: unknown, command: Command): Promise<void> {
  const globals = globalOptions(command);
  const spinner = ora({ text: 'Planning...', isSilent: globals.json === true }).start();
  const source = resolve(file);

  try {
    const { service, settings, json } = await createContext(globals);

    spinner.text = 'Resolving logo assets...';
    const assets = await service.resolveAssets();

    spinner.text = `Probing ${source}...`;
    const descriptor = await service.encoder.probe(source);

    const plan = planSegmentsFor(descriptor.duration, settings.segments);
    const planned: PlannedSegment[] = renderableSegments(plan).map((segment) => ({
      segment,
      overlays: planOverlays(segment.kind, descriptor.width, descriptor.height, assets, settings.logos),
    }));
    spinner.stop();

    if (json) {
      printJson({ source, descriptor, plan, renders: planned });
      return;
    }

    printHeader(`Plan for ${source}`);
    printKeyValue('Source', formatDescriptor(descriptor));
    printKeyValue('Renders', planned.length);
    console.log();
    for (const { segment, overlays } of planned) {
      console.log(`  ${chalk.cyan(formatSegment(segment))}`);
      for (const instruction of overlays.instructions) {
        console.log(`      ${formatOverlay(instruction)}`);
      }
    }
    console.log();
  } catch (error) {
    spinner.fail('Could not plan this file');
    if (globals.json) printJson({ ok: false, error: describeError(error) });
    else printFailure(error);
    process.exit(1);
  }
}
