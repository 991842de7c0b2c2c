import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { IndexVersion } from '../core/chunk-index.js';
import { LocalChunkIndex } from '../core/chunk-index-local.js';
import { TransientError } from '../core/errors.js';
import type { ChangeRecord } from '../core/types.js';
import {
  del,
  FakeEmbedder,
  LineChunker,
  MapFetcher,
  MemoryCursorStore,
  page,
  upsert,
} from '../test-utils/fakes.js';
import { toChangeRecord } from './change-feed.js';
import { dedupeRecords, Reconciler, type ReconcilerOptions } from './reconciler.js';

describe('dedupeRecords', () => {
  it('keeps the last record per id at the position of the first', () => {
    expect(dedupeRecords([upsert('a'), upsert('b'), del('a')])).toEqual([del('a'), upsert('b')]);
  });
});

describe('Reconciler', () => {
  let dir: string;
  let embedder: FakeEmbedder;
  let index: LocalChunkIndex;
  let fetcher: MapFetcher;
  let cursorStore: MemoryCursorStore;
  let version: IndexVersion;

  const reconciler = (overrides: Partial<ReconcilerOptions> = {}) =>
    new Reconciler({
      index,
      fetcher,
      chunker: new LineChunker(),
      cursorStore,
      version,
      ...overrides,
    });

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'reconciler-'));
    embedder = new FakeEmbedder();
    index = new LocalChunkIndex({ filePath: path.join(dir, 'index.json'), embedder, chunkSize: 1000, chunkOverlap: 200 });
    await index.initialize();
    fetcher = new MapFetcher();
    cursorStore = new MemoryCursorStore();
    version = new IndexVersion();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('adds new items and commits the cursor', async () => {
    fetcher.set('a', 'a1\na2').set('b', 'b1');

    const result = await reconciler().applyPage(page([upsert('a'), upsert('b')], 'c1'));

    expect(result).toMatchObject({ added: 2, updated: 0, failed: 0, cursorAdvanced: true, cancelled: false });
    expect(await index.countBySourceId('a')).toBe(2);
    expect(cursorStore.saved).toEqual(['c1']);
  });

  it('replaces the chunks of an updated item', async () => {
    fetcher.set('a', 'a1\na2\na3');
    await reconciler().applyPage(page([upsert('a')], 'c1'));

    fetcher.set('a', 'new');
    const result = await reconciler().applyPage(page([upsert('a', { etag: '"a-v2"' })], 'c2'));

    expect(result.updated).toBe(1);
    const chunks = await index.getChunks('a');
    expect(chunks.map((c) => c.text)).toEqual(['new']);
    expect(chunks[0].metadata.etag).toBe('"a-v2"');
  });

  it('counts deletes of unknown items as deleted', async () => {
    const result = await reconciler().applyPage(page([del('ghost')], 'c1'));
    expect(result).toMatchObject({ deleted: 1, failed: 0, cursorAdvanced: true });
  });

  it('treats content that vanished before the fetch as a delete', async () => {
    fetcher.set('a', 'a1');
    await reconciler().applyPage(page([upsert('a')], 'c1'));
    fetcher.content.delete('a');

    const result = await reconciler().applyPage(page([upsert('a')], 'c2'));

    expect(result).toMatchObject({ deleted: 1, failed: 0 });
    expect(await index.countBySourceId('a')).toBe(0);
  });

  it('skips items without text and drops their stale chunks', async () => {
    fetcher.set('a', 'a1\na2');
    await reconciler().applyPage(page([upsert('a')], 'c1'));
    fetcher.set('a', '  \n');

    const result = await reconciler().applyPage(page([upsert('a')], 'c2'));

    expect(result.skipped).toBe(1);
    expect(await index.countBySourceId('a')).toBe(0);
  });

  it('withholds the cursor when an item fails and keeps the rest of the page', async () => {
    embedder.failOn = 'bad';
    fetcher.set('a', 'a1').set('b', 'bad');

    const result = await reconciler().applyPage(page([upsert('a'), upsert('b')], 'c1'));

    expect(result.added).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.failures).toEqual([{ id: 'b', error: 'Embedding failed for "bad"' }]);
    expect(result.cursorAdvanced).toBe(false);
    expect(cursorStore.saved).toEqual([]);
    expect(await index.countBySourceId('b')).toBe(0);
  });

  it('flushes the index before saving the cursor', async () => {
    const order: string[] = [];
    const flush = index.flush.bind(index);
    const save = cursorStore.save.bind(cursorStore);
    vi.spyOn(index, 'flush').mockImplementation(async () => {
      order.push('flush');
      await flush();
    });
    vi.spyOn(cursorStore, 'save').mockImplementation(async (cursor) => {
      order.push('save');
      await save(cursor);
    });
    fetcher.set('a', 'a1');

    await reconciler().applyPage(page([upsert('a')], 'c1'));

    expect(order).toEqual(['flush', 'save']);
  });

  it('retries transient failures with backoff', async () => {
    const sleeps: number[] = [];
    fetcher.set('a', new TransientError('503'));
    fetcher.onFetch = () => {
      if (fetcher.fetched.length === 2) fetcher.set('a', 'a1');
    };

    const result = await reconciler({
      itemRetries: 2,
      retryBaseDelayMs: 5,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    }).applyPage(page([upsert('a')], 'c1'));

    expect(result).toMatchObject({ added: 1, failed: 0 });
    expect(sleeps).toEqual([10]);
    expect(fetcher.fetched).toEqual(['a', 'a']);
  });

  it('applies a delete that follows an upsert of the same item in one page', async () => {
    fetcher.set('a', 'a1');
    await reconciler().applyPage(page([upsert('a')], 'c1'));

    const result = await reconciler().applyPage(page([upsert('a'), del('a')], 'c2'));

    expect(result).toMatchObject({ deleted: 1, added: 0, updated: 0 });
    expect(fetcher.fetched).toEqual(['a']);
    expect(await index.countBySourceId('a')).toBe(0);
  });

  it('removes the chunks of a file moved out of the scan folders', async () => {
    const recordIn = (folder: string): ChangeRecord => {
      const record = toChangeRecord(
        {
          id: 'f1',
          name: 'Leave.txt',
          eTag: '"f1-v1"',
          file: { mimeType: 'text/plain' },
          parentReference: { path: `/drives/d/root:/${folder}` },
        },
        ['Policies']
      );
      if (!record) throw new Error('expected a change record');
      return record;
    };
    fetcher.set('f1', 'p1\np2');

    await reconciler().applyPage(page([recordIn('Policies')], 'c1'));
    expect(await index.countBySourceId('f1')).toBe(2);

    const result = await reconciler().applyPage(page([recordIn('Archive')], 'c2'));

    expect(result.deleted).toBe(1);
    expect(await index.countBySourceId('f1')).toBe(0);
  });

  it('ignores deletes during a full enumeration', async () => {
    fetcher.set('a', 'a1');
    await reconciler().applyPage(page([upsert('a')], 'c1'));

    const result = await reconciler().applyPage(page([del('a')], 'c2'), { dropDeletes: true });

    expect(result.deleted).toBe(0);
    expect(await index.countBySourceId('a')).toBe(1);
  });

  it('bumps the index version after applying items', async () => {
    fetcher.set('a', 'a1');
    await reconciler().applyPage(page([upsert('a')], 'c1'));
    expect(version.current).toBe(1);

    await reconciler().applyPage(page([], 'c2'));
    expect(version.current).toBe(1);
  });

  it('keeps concurrently processed items intact', async () => {
    fetcher.delayMs = 5;
    fetcher.set('a', 'a1\na2').set('b', 'b1\nb2\nb3').set('c', 'c1');

    await reconciler({ concurrency: 2 }).applyPage(page([upsert('a'), upsert('b'), upsert('c')], 'c1'));

    expect(fetcher.maxInFlight).toBe(2);
    expect(await index.countBySourceId('a')).toBe(2);
    expect(await index.countBySourceId('b')).toBe(3);
    expect(await index.countBySourceId('c')).toBe(1);
  });

  it('does not advance the cursor when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    fetcher.set('a', 'a1');

    const result = await reconciler().applyPage(page([upsert('a')], 'c1'), { signal: controller.signal });

    expect(result).toMatchObject({ added: 0, cancelled: true, cursorAdvanced: false });
    expect(fetcher.fetched).toEqual([]);
    expect(cursorStore.saved).toEqual([]);
  });
});
