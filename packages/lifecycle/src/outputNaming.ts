/**
 * Output Naming
 *
 * Names the promoted output under one of three policies:
 * - timestamp:  <stem>_branded_YYYYMMDD_HHMMSS.mp4, `_<n>` on collision
 * - sequential: <stem>_branded_NNN.mp4 from the durable counter
 * - simple:     <stem>_branded.mp4, replacing an earlier output
 */

import { extname, join } from 'node:path';
import type { OutputNaming } from '@brandcast/core';
import { formatFileTimestamp, getBasename, pathExists } from '@brandcast/utils';
import type { SequenceCounter } from './sequenceCounter.js';

const OUTPUT_EXTENSION = '.mp4';

export interface OutputNamerOptions {
  policy: OutputNaming;
  outputDir: string;
  /** Required for the sequential policy */
  counter?: SequenceCounter;
  clock?: () => Date;
}

export class OutputNamer {
  private readonly policy: OutputNaming;
  private readonly outputDir: string;
  private readonly counter?: SequenceCounter;
  private readonly clock: () => Date;

  constructor(options: OutputNamerOptions) {
    if (options.policy === 'sequential' && !options.counter) {
      throw new Error('Sequential output naming needs a sequence counter');
    }
    this.policy = options.policy;
    this.outputDir = options.outputDir;
    this.counter = options.counter;
    this.clock = options.clock ?? (() => new Date());
  }

  async resolve(sourcePath: string): Promise<string> {
    const stem = `${getBasename(sourcePath)}_branded`;

    switch (this.policy) {
      case 'timestamp': {
        const base = `${stem}_${formatFileTimestamp(this.clock())}`;
        let candidate = this.at(base);
        for (let n = 1; await pathExists(candidate); n++) {
          candidate = this.at(`${base}_${n}`);
        }
        return candidate;
      }
      case 'sequential': {
        const sequenced = (n: number) => this.at(`${stem}_${String(n).padStart(3, '0')}`);
        const counter = this.counter;
        if (!counter) {
          throw new Error('Sequential output naming needs a sequence counter');
        }
        const n = await counter.next((candidate) => pathExists(sequenced(candidate)));
        return sequenced(n);
      }
      case 'simple':
        return this.at(stem);
    }
  }

  private at(name: string): string {
    return join(this.outputDir, `${name}${OUTPUT_EXTENSION}`);
  }
}

/**
 * Collision-safe destination for a source moved into `dir`: the original
 * name, then `<stem>_<timestamp><ext>`, then `<stem>_<timestamp>_<n><ext>`.
 */
export async function uniqueDestination(dir: string, sourcePath: string, now: Date): Promise<string> {
  const ext = extname(sourcePath);
  const stem = getBasename(sourcePath);

  const original = join(dir, `${stem}${ext}`);
  if (!(await pathExists(original))) {
    return original;
  }

  const stamped = `${stem}_${formatFileTimestamp(now)}`;
  let candidate = join(dir, `${stamped}${ext}`);
  for (let n = 1; await pathExists(candidate); n++) {
    candidate = join(dir, `${stamped}_${n}${ext}`);
  }
  return candidate;
}
