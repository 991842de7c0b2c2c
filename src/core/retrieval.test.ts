import os from 'os';
import path from 'path';
import { beforeEach, describe, expect, it } from 'vitest';

import { FakeEmbedder } from '../test-utils/fakes.js';
import { IndexVersion } from './chunk-index.js';
import { LocalChunkIndex } from './chunk-index-local.js';
import { Retriever } from './retrieval.js';

describe('Retriever', () => {
  let embedder: FakeEmbedder;
  let index: LocalChunkIndex;
  let version: IndexVersion;

  beforeEach(async () => {
    embedder = new FakeEmbedder();
    // Never flushed, so nothing is written
    index = new LocalChunkIndex({
      filePath: path.join(os.tmpdir(), 'retrieval-test-unused.json'),
      embedder,
      chunkSize: 1000,
      chunkOverlap: 200,
    });
    await index.insertChunks('vowels', ['aaaa']);
    await index.insertChunks('consonants', ['xyzw']);
    version = new IndexVersion();
  });

  it('returns the closest chunks first', async () => {
    const retriever = new Retriever({ index, embedder, version });
    const results = await retriever.search('eeee', 1);
    expect(results.map((r) => r.sourceItemId)).toEqual(['vowels']);
  });

  it('answers repeated queries from the cache', async () => {
    const retriever = new Retriever({ index, embedder, version });
    const first = await retriever.search('eeee');
    const callsAfterFirst = embedder.calls;

    const second = await retriever.search('eeee');

    expect(second).toBe(first);
    expect(embedder.calls).toBe(callsAfterFirst);
    expect(retriever.cacheSize()).toBe(1);
  });

  it('drops cached answers when the index version moves', async () => {
    const retriever = new Retriever({ index, embedder, version });
    await retriever.search('eeee');
    const callsAfterFirst = embedder.calls;

    version.bump();
    expect(retriever.cacheSize()).toBe(0);
    await retriever.search('eeee');

    expect(embedder.calls).toBe(callsAfterFirst + 1);
  });

  it('evicts the oldest entry at capacity', async () => {
    const retriever = new Retriever({ index, embedder, version, maxCacheEntries: 2 });
    await retriever.search('one');
    await retriever.search('two');
    await retriever.search('three');

    expect(retriever.cacheSize()).toBe(2);
  });
});
