/**
 * corpus-sync - Reconciler
 *
 * Applies one change page to the chunk index and commits its cursor:
 *
 *   1. Deduplicate by item id (last record in the page wins)
 *   2. Deletes, one at a time
 *   3. Upserts through the worker pool: fetch → chunk → delete → insert
 *   4. If nothing failed and nothing was cancelled: flush the index, then
 *      save the page's cursor
 *
 * Item failures never abort the page. A page with any failure keeps the old
 * cursor, so the whole page is replayed next cycle; delete-then-insert makes
 * the replay idempotent.
 */

import type { ChunkIndex, IndexVersion } from '../core/chunk-index.js';
import { errorMessage, NotFoundError } from '../core/errors.js';
import type { SyncLogger } from '../core/logger.js';
import {
  changeRecordId,
  type ChangePage,
  type ChangeRecord,
  type ItemOutcome,
  type PageResult,
  type RemoteItem,
} from '../core/types.js';
import type { ContentFetcher } from './content-fetch.js';
import type { CursorStore } from './cursor-store.js';
import { runPool } from './pool.js';
import type { ContentChunker } from './processors.js';
import { withRetry } from './retry.js';

export const DEFAULT_CONCURRENCY = 4;

export interface ReconcilerOptions {
  index: ChunkIndex;
  fetcher: ContentFetcher;
  chunker: ContentChunker;
  cursorStore: CursorStore;
  version: IndexVersion;
  concurrency?: number;
  itemRetries?: number;
  retryBaseDelayMs?: number;
  logger?: SyncLogger;
  /** Injected for tests. */
  sleep?: (ms: number) => Promise<void>;
}

export interface ApplyPageOptions {
  signal?: AbortSignal;
  /** Full enumerations are upsert-only. */
  dropDeletes?: boolean;
}

/** Last record per id wins; ids keep the position of their first appearance. */
export function dedupeRecords(records: ChangeRecord[]): ChangeRecord[] {
  const byId = new Map<string, ChangeRecord>();
  for (const record of records) {
    byId.set(changeRecordId(record), record);
  }
  return [...byId.values()];
}

function emptyPageResult(): PageResult {
  return {
    added: 0,
    updated: 0,
    deleted: 0,
    skipped: 0,
    failed: 0,
    failures: [],
    cursorAdvanced: false,
    cancelled: false,
  };
}

function countOutcome(result: PageResult, outcome: Exclude<ItemOutcome, 'failed'>): void {
  result[outcome] += 1;
}

export class Reconciler {
  private readonly concurrency: number;

  constructor(private readonly options: ReconcilerOptions) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  }

  async applyPage(page: ChangePage, options: ApplyPageOptions = {}): Promise<PageResult> {
    const { index, cursorStore, version, logger } = this.options;
    const { signal } = options;
    const result = emptyPageResult();

    let records = dedupeRecords(page.records);
    if (options.dropDeletes) {
      records = records.filter((r) => r.kind === 'upsert');
    }

    const deletes: string[] = [];
    const upserts: RemoteItem[] = [];
    for (const record of records) {
      if (record.kind === 'delete') deletes.push(record.sourceItemId);
      else upserts.push(record.item);
    }

    let attempted = 0;

    // Deletes
    for (const id of deletes) {
      if (signal?.aborted) break;
      attempted++;
      try {
        const removed = await index.deleteBySourceId(id);
        result.deleted += 1;
        logger?.('DEBUG', `Deleted ${id} (${removed} chunks)`);
      } catch (error) {
        this.recordFailure(result, id, error);
      }
    }

    // Upserts
    if (!signal?.aborted && upserts.length > 0) {
      const outcomes = await runPool(
        upserts,
        this.concurrency,
        (item) => this.upsertWithRetry(item, signal),
        signal
      );

      outcomes.forEach((outcome, i) => {
        const item = upserts[i];
        if (outcome.status === 'not-started') return;
        attempted++;
        if (outcome.status === 'fulfilled') {
          countOutcome(result, outcome.value);
        } else {
          this.recordFailure(result, item.id, outcome.reason);
        }
      });
    }

    result.cancelled = Boolean(signal?.aborted);

    if (attempted > 0) {
      version.bump();
    }

    if (result.failed === 0 && !result.cancelled) {
      // Index first: a saved cursor must never point past unflushed chunks
      await index.flush();
      await cursorStore.save(page.nextCursor);
      result.cursorAdvanced = true;
    } else if (result.cancelled) {
      logger?.('WARN', 'Page interrupted, cursor not advanced');
    } else {
      logger?.('WARN', `${result.failed} item(s) failed, cursor not advanced; the page will be retried next cycle`);
    }

    return result;
  }

  private async upsertWithRetry(item: RemoteItem, signal?: AbortSignal): Promise<Exclude<ItemOutcome, 'failed'>> {
    return withRetry(() => this.upsert(item), {
      retries: this.options.itemRetries ?? 0,
      baseDelayMs: this.options.retryBaseDelayMs ?? 1000,
      signal,
      sleep: this.options.sleep,
      onRetry: (attempt, error, delayMs) =>
        this.options.logger?.('WARN', `Retrying ${item.name} (attempt ${attempt}) in ${delayMs}ms: ${errorMessage(error)}`),
    });
  }

  private async upsert(item: RemoteItem): Promise<Exclude<ItemOutcome, 'failed'>> {
    const { index, fetcher, chunker, logger } = this.options;

    let content: Buffer;
    try {
      content = await fetcher.fetch(item);
    } catch (error) {
      if (error instanceof NotFoundError) {
        // Gone between the feed and the fetch; a later page carries its delete
        const removed = await index.deleteBySourceId(item.id);
        logger?.('DEBUG', `${item.name} no longer exists, removed ${removed} chunks`);
        return 'deleted';
      }
      throw error;
    }

    const chunks = await chunker.chunk(content, item.contentType, {
      name: item.name,
      folderPath: item.folderPath,
    });

    const removed = await index.deleteBySourceId(item.id);

    if (chunks.length === 0) {
      logger?.('DEBUG', `Skipped ${item.name}: no indexable text`);
      return 'skipped';
    }

    await index.insertChunks(item.id, chunks, {
      name: item.name,
      etag: item.etag,
      lastModified: item.lastModified,
      webUrl: item.webUrl,
      folderPath: item.folderPath,
    });

    logger?.('DEBUG', `Indexed ${item.name}: ${chunks.length} chunks`);
    return removed > 0 ? 'updated' : 'added';
  }

  private recordFailure(result: PageResult, id: string, error: unknown): void {
    result.failed += 1;
    result.failures.push({ id, error: errorMessage(error) });
    this.options.logger?.('WARN', `Failed ${id}: ${errorMessage(error)}`);
  }
}
