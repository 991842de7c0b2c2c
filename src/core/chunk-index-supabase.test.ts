import { describe, expect, it } from 'vitest';

import { FakeEmbedder } from '../test-utils/fakes.js';
import { createSupabaseClient, SupabaseChunkIndex } from './chunk-index-supabase.js';
import { StorageError } from './errors.js';

interface Captured {
  method: string;
  url: URL;
  body: string | null;
}

/** A Supabase client whose PostgREST calls are answered in process. */
function fakeSupabase(respond: (request: Captured) => Response) {
  const requests: Captured[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const request: Captured = {
      method: init?.method ?? 'GET',
      url: new URL(String(input)),
      body: typeof init?.body === 'string' ? init.body : null,
    };
    requests.push(request);
    return respond(request);
  };
  const client = createSupabaseClient('http://localhost:54321', 'test-key', fetchImpl);
  const index = new SupabaseChunkIndex({
    url: 'http://localhost:54321',
    serviceKey: 'test-key',
    embedder: new FakeEmbedder(),
    chunkSize: 1000,
    chunkOverlap: 200,
    client,
  });
  return { index, requests };
}

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('SupabaseChunkIndex', () => {
  it('builds its own client when none is injected', () => {
    const build = () =>
      new SupabaseChunkIndex({
        url: 'http://localhost:54321',
        serviceKey: 'test-key',
        embedder: new FakeEmbedder(),
        chunkSize: 1000,
        chunkOverlap: 200,
      });
    expect(build).not.toThrow();
  });

  it('treats an empty table as compatible', async () => {
    const { index, requests } = fakeSupabase(() => json([]));

    expect(await index.initialize()).toEqual({ compatible: true });
    expect(requests[0].url.pathname).toBe('/rest/v1/document_chunks');
    expect(requests[0].url.searchParams.get('limit')).toBe('1');
  });

  it('treats unreadable build columns as incompatible', async () => {
    const { index } = fakeSupabase(() => json([{ embedding_model: null }]));
    expect(await index.initialize()).toEqual({ compatible: false });
  });

  it('is compatible when stored rows match the model and chunk settings', async () => {
    const { index } = fakeSupabase(() => json([{ embedding_model: 'fake-embed', chunk_size: 1000, chunk_overlap: 200 }]));
    expect(await index.initialize()).toEqual({ compatible: true });
  });

  it('is incompatible when rows were built with another model', async () => {
    const { index } = fakeSupabase(() => json([{ embedding_model: 'other', chunk_size: 1000, chunk_overlap: 200 }]));
    expect(await index.initialize()).toEqual({ compatible: false });
  });

  it('raises StorageError when the table cannot be read', async () => {
    const { index } = fakeSupabase(() => json({ message: 'db down', code: 'XX000' }, 500));

    const error = await index.initialize().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ message: "Could not reach table 'document_chunks': db down" });
  });

  it('inserts one row per chunk with its build settings', async () => {
    const { index, requests } = fakeSupabase(() => new Response(null, { status: 201 }));

    await index.insertChunks('a', ['one', 'three'], { name: 'a.txt' });

    expect(requests[0].method).toBe('POST');
    const rows: unknown = JSON.parse(requests[0].body ?? '[]');
    expect(rows).toMatchObject([
      {
        source_item_id: 'a',
        sequence_index: 0,
        content: 'one',
        embedding: [3, 2, 1],
        metadata: { name: 'a.txt' },
        embedding_model: 'fake-embed',
        chunk_size: 1000,
        chunk_overlap: 200,
      },
      { source_item_id: 'a', sequence_index: 1, content: 'three', embedding: [5, 2, 1] },
    ]);
  });

  it('maps match_document_chunks rows to search results', async () => {
    const { index, requests } = fakeSupabase(() =>
      json([
        {
          source_item_id: 'a',
          sequence_index: 2,
          content: 'chunk text',
          metadata: { name: 'a.txt', folderPath: 'Memos' },
          similarity: 0.91,
        },
      ])
    );

    const results = await index.search([0.1, 0.2], 3);

    expect(requests[0].url.pathname).toBe('/rest/v1/rpc/match_document_chunks');
    expect(JSON.parse(requests[0].body ?? '{}')).toEqual({ query_embedding: [0.1, 0.2], match_count: 3 });
    expect(results).toEqual([
      {
        sourceItemId: 'a',
        sequenceIndex: 2,
        text: 'chunk text',
        score: 0.91,
        metadata: { name: 'a.txt', folderPath: 'Memos' },
      },
    ]);
  });
});
