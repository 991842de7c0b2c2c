import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { writeFileAtomic } from './atomic-write.js';

describe('writeFileAtomic', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'atomic-write-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates missing parent directories', async () => {
    const target = path.join(dir, 'a', 'b', 'out.json');
    await writeFileAtomic(target, '{"ok":true}');
    expect(await readFile(target, 'utf-8')).toBe('{"ok":true}');
  });

  it('replaces the file and leaves no temp files behind', async () => {
    const target = path.join(dir, 'out.txt');
    await writeFileAtomic(target, 'first');
    await writeFileAtomic(target, 'second');

    expect(await readFile(target, 'utf-8')).toBe('second');
    expect(await readdir(dir)).toEqual(['out.txt']);
  });
});
