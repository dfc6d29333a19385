import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, writeFile, readdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { moveFile, pathExists, removeDir, safeReadFile, safeWriteFile } from '../src/file.js';

describe('file operations', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'brandcast-utils-'));
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('returns null when reading a missing file', async () => {
    expect(await safeReadFile(join(root, 'missing.json'))).toBeNull();
  });

  it('writes atomically without leaving temp files behind', async () => {
    const target = join(root, 'nested', 'state.json');
    await safeWriteFile(target, '{"next":4}');
    expect(await readFile(target, 'utf8')).toBe('{"next":4}');
    expect(await readdir(join(root, 'nested'))).toEqual(['state.json']);
  });

  it('moves a file into a directory that does not exist yet', async () => {
    const source = join(root, 'clip.mp4');
    await writeFile(source, 'data');
    const destination = join(root, 'processed', 'clip.mp4');

    await moveFile(source, destination);

    expect(await pathExists(source)).toBe(false);
    expect(await readFile(destination, 'utf8')).toBe('data');
  });
});
