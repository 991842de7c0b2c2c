/**
 * In-process stand-ins for the remote library, the parser and the embedder.
 */

import type { Embedder } from '../core/embedder.js';
import { EmbedError, NotFoundError } from '../core/errors.js';
import type { ChangePage, ChangeRecord, RemoteItem, SyncCursor } from '../core/types.js';
import type { ChangeFeedClient, FeedSession, OpenFeedOptions } from '../sync/change-feed.js';
import type { ContentFetcher } from '../sync/content-fetch.js';
import type { CursorStore } from '../sync/cursor-store.js';
import type { ContentChunker } from '../sync/processors.js';

export function remoteItem(id: string, overrides: Partial<RemoteItem> = {}): RemoteItem {
  return {
    id,
    etag: `"${id}-v1"`,
    lastModified: '2026-01-01T00:00:00Z',
    name: `${id}.txt`,
    contentType: 'text/plain',
    size: 10,
    folderPath: '',
    ...overrides,
  };
}

export function upsert(id: string, overrides: Partial<RemoteItem> = {}): ChangeRecord {
  return { kind: 'upsert', item: remoteItem(id, overrides) };
}

export function del(id: string): ChangeRecord {
  return { kind: 'delete', sourceItemId: id };
}

export function page(records: ChangeRecord[], token: string, hasMore = false): ChangePage {
  return { records, nextCursor: { token, createdAt: '2026-01-01T00:00:00Z' }, hasMore };
}

// ============================================================================
// Feed
// ============================================================================

/**
 * `respond(cursor)` decides what a session yields. An Error thrown from
 * respond fails open(); an Error inside the returned list fails the session
 * when iteration reaches it.
 */
export class ScriptedFeed implements ChangeFeedClient {
  readonly opened: Array<SyncCursor | null> = [];

  constructor(private respond: (cursor: SyncCursor | null) => Array<ChangePage | Error>) {}

  setResponder(respond: (cursor: SyncCursor | null) => Array<ChangePage | Error>): void {
    this.respond = respond;
  }

  async open(cursor: SyncCursor | null, _options?: OpenFeedOptions): Promise<FeedSession> {
    this.opened.push(cursor);
    const steps = this.respond(cursor);
    const first = steps[0];
    if (first instanceof Error) throw first;

    return (async function* () {
      for (const step of steps) {
        if (step instanceof Error) throw step;
        yield step;
      }
    })();
  }
}

// ============================================================================
// Content
// ============================================================================

/** Item content keyed by id; ids without content are NotFound. */
export class MapFetcher implements ContentFetcher {
  readonly content = new Map<string, string | Error>();
  readonly fetched: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  delayMs = 0;
  onFetch?: (item: RemoteItem) => void;

  set(id: string, value: string | Error): this {
    this.content.set(id, value);
    return this;
  }

  async fetch(item: RemoteItem): Promise<Buffer> {
    this.fetched.push(item.id);
    this.onFetch?.(item);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      const value = this.content.get(item.id);
      if (value === undefined) throw new NotFoundError(`No content for ${item.id}`);
      if (value instanceof Error) throw value;
      return Buffer.from(value, 'utf-8');
    } finally {
      this.inFlight--;
    }
  }
}

/** One chunk per non-empty line. */
export class LineChunker implements ContentChunker {
  async chunk(content: Buffer): Promise<string[]> {
    return content
      .toString('utf-8')
      .split('\n')
      .filter((line) => line.trim() !== '');
  }
}

// ============================================================================
// Embedding
// ============================================================================

/** [length, vowels, 1]; texts containing `failOn` make the batch fail. */
export class FakeEmbedder implements Embedder {
  readonly modelName: string;
  failOn: string | null = null;
  calls = 0;

  constructor(modelName = 'fake-embed') {
    this.modelName = modelName;
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls++;
    if (this.failOn && texts.some((t) => t.includes(this.failOn ?? ''))) {
      throw new EmbedError(`Embedding failed for "${this.failOn}"`);
    }
    return texts.map((t) => [t.length, (t.match(/[aeiou]/g) ?? []).length, 1]);
  }
}

// ============================================================================
// Cursor
// ============================================================================

export class MemoryCursorStore implements CursorStore {
  cursor: SyncCursor | null = null;
  readonly saved: string[] = [];
  clears = 0;
  failSave: Error | null = null;

  async load(): Promise<SyncCursor | null> {
    return this.cursor;
  }

  async save(cursor: SyncCursor): Promise<void> {
    if (this.failSave) throw this.failSave;
    this.cursor = cursor;
    this.saved.push(cursor.token);
  }

  async clear(): Promise<void> {
    this.clears++;
    this.cursor = null;
  }
}
