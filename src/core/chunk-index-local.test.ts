import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FakeEmbedder } from '../test-utils/fakes.js';
import { decodeEmbedding, encodeEmbedding, LocalChunkIndex } from './chunk-index-local.js';
import { EmbedError } from './errors.js';

describe('embedding encoding', () => {
  it('round-trips float32 values', () => {
    expect(decodeEmbedding(encodeEmbedding([1, -2.5, 0.25]))).toEqual([1, -2.5, 0.25]);
  });

  it('rejects a payload that is not a whole number of floats', () => {
    expect(decodeEmbedding(Buffer.from([1, 2, 3]).toString('base64'))).toBeNull();
  });
});

describe('LocalChunkIndex', () => {
  let dir: string;
  let filePath: string;

  const open = (embedder = new FakeEmbedder(), chunkSize = 1000, chunkOverlap = 200) =>
    new LocalChunkIndex({ filePath, embedder, chunkSize, chunkOverlap });

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'chunk-index-'));
    filePath = path.join(dir, 'index.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports a missing store as incompatible', async () => {
    expect(await open().initialize()).toEqual({ compatible: false });
  });

  it('inserts, counts and deletes chunks per item', async () => {
    const index = open();
    await index.initialize();
    await index.insertChunks('a', ['one', 'two'], { name: 'a.txt' });
    await index.insertChunks('b', ['three']);

    expect(await index.count()).toBe(3);
    expect(await index.countBySourceId('a')).toBe(2);
    expect((await index.getChunks('a')).map((c) => [c.sequenceIndex, c.text])).toEqual([
      [0, 'one'],
      [1, 'two'],
    ]);

    expect(await index.deleteBySourceId('a')).toBe(2);
    expect(await index.deleteBySourceId('a')).toBe(0);
    expect(await index.count()).toBe(1);
  });

  it('persists on flush and reloads with the same embeddings', async () => {
    const index = open();
    await index.initialize();
    await index.insertChunks('a', ['apple', 'kiwi'], { etag: '"a-v1"' });
    await index.flush();

    const reopened = open();
    expect(await reopened.initialize()).toEqual({ compatible: true });
    const chunks = await reopened.getChunks('a');
    expect(chunks.map((c) => c.embedding)).toEqual([
      [5, 2, 1],
      [4, 2, 1],
    ]);
    expect(chunks[0].metadata).toEqual({ etag: '"a-v1"' });
  });

  it('writes the store file even when empty so it is compatible next time', async () => {
    const index = open();
    await index.initialize();
    await index.flush();

    expect(await open().initialize()).toEqual({ compatible: true });
  });

  it('is incompatible when the model or chunk parameters change', async () => {
    const index = open();
    await index.initialize();
    await index.insertChunks('a', ['apple']);
    await index.flush();

    expect(await open(new FakeEmbedder('old-model')).initialize()).toEqual({ compatible: false });
    expect(await open(new FakeEmbedder(), 500, 200).initialize()).toEqual({ compatible: false });
  });

  it('treats a corrupt file as incompatible', async () => {
    await writeFile(filePath, '{"version":1');
    expect(await open().initialize()).toEqual({ compatible: false });
  });

  it('stores nothing for an item whose embedding fails', async () => {
    const embedder = new FakeEmbedder();
    embedder.failOn = 'boom';
    const index = open(embedder);
    await index.initialize();

    await expect(index.insertChunks('a', ['fine', 'boom'])).rejects.toBeInstanceOf(EmbedError);
    expect(await index.countBySourceId('a')).toBe(0);
  });

  it('ranks search results by cosine similarity', async () => {
    const index = open();
    await index.initialize();
    await index.insertChunks('vowels', ['aaaa']);
    await index.insertChunks('consonants', ['xyzw']);

    const results = await index.search([1, 0, 0], 2);
    expect(results.map((r) => r.sourceItemId)).toEqual(['consonants', 'vowels']);
    expect(results[0].score).toBeCloseTo(4 / Math.sqrt(17));
  });

  it('clears every item', async () => {
    const index = open();
    await index.initialize();
    await index.insertChunks('a', ['one']);
    await index.clear();
    await index.flush();

    expect(await index.count()).toBe(0);
    expect(JSON.parse(await readFile(filePath, 'utf-8')).chunks).toEqual([]);
  });
});
