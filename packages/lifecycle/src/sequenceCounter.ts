/**
 * Sequence Counter
 *
 * Durable counter behind sequential output naming. State lives in a small
 * JSON file (`{ "next": n }`) replaced atomically on every increment, and
 * increments are serialised so concurrent jobs never draw the same number.
 */

import { z } from 'zod';
import { createLogger, safeReadFile, safeWriteFile, SerialQueue, type Logger } from '@brandcast/utils';

const counterStateSchema = z.object({
  next: z.number().int().positive(),
});

export type CounterState = z.infer<typeof counterStateSchema>;

export class SequenceCounter {
  private readonly queue = new SerialQueue();
  private readonly logger: Logger;

  constructor(
    readonly filePath: string,
    parentLogger?: Logger
  ) {
    this.logger = createLogger({ module: 'sequence-counter' }, parentLogger);
  }

  /**
   * Next number to hand out, without consuming it
   */
  async peek(): Promise<number> {
    const content = await safeReadFile(this.filePath);
    if (content === null) {
      return 1;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      raw = null;
    }
    const parsed = counterStateSchema.safeParse(raw);
    if (!parsed.success) {
      // Numbers already on disk are skipped anyway, so restarting cannot overwrite
      this.logger.warn({ filePath: this.filePath }, 'Sequence counter file is invalid, restarting at 1');
      return 1;
    }
    return parsed.data.next;
  }

  /**
   * Draw the next number, skipping any for which `isTaken` says yes, and
   * persist the one after it.
   */
  next(isTaken: (n: number) => Promise<boolean> = async () => false): Promise<number> {
    return this.queue.run(async () => {
      let n = await this.peek();
      while (await isTaken(n)) {
        n++;
      }
      const state: CounterState = { next: n + 1 };
      await safeWriteFile(this.filePath, `${JSON.stringify(state)}\n`);
      return n;
    });
  }
}
