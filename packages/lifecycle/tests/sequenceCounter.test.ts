import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SequenceCounter } from '../src/sequenceCounter.js';

describe('SequenceCounter', () => {
  let root: string;
  let counterFile: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'brandcast-counter-'));
    counterFile = join(root, '.sequence.json');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('starts at 1 and persists the next number', async () => {
    const counter = new SequenceCounter(counterFile);

    expect(await counter.next()).toBe(1);
    expect(await readFile(counterFile, 'utf8')).toBe('{"next":2}\n');
    expect(await counter.next()).toBe(2);
  });

  it('continues from the persisted state', async () => {
    await writeFile(counterFile, '{"next":41}');

    expect(await new SequenceCounter(counterFile).next()).toBe(41);
  });

  it('skips numbers that are taken', async () => {
    const counter = new SequenceCounter(counterFile);

    const n = await counter.next(async (candidate) => candidate <= 3);

    expect(n).toBe(4);
    expect(await counter.peek()).toBe(5);
  });

  it('hands out distinct numbers to concurrent callers', async () => {
    const counter = new SequenceCounter(counterFile);

    const numbers = await Promise.all([1, 2, 3, 4, 5].map(() => counter.next()));

    expect(numbers).toEqual([1, 2, 3, 4, 5]);
  });

  it('restarts at 1 when the file is unreadable', async () => {
    await writeFile(counterFile, '{"next":"many"}');

    expect(await new SequenceCounter(counterFile).next()).toBe(1);
  });
});
