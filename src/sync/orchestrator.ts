/**
 * corpus-sync - Sync Orchestrator
 *
 * Owns the cycle lock and decides between Delta and Full:
 *
 *   delta: load cursor → open feed → drain pages through the reconciler
 *   full:  clear index → clear cursor → open feed with no cursor → drain
 *
 * Delta falls back to Full when there is no cursor, when the index is
 * incompatible, or when the remote rejects the cursor. Draining stops after
 * any page with failures so no later page can move the cursor past it.
 */

import type { ChunkIndex } from '../core/chunk-index.js';
import { CursorExpiredError, errorMessage } from '../core/errors.js';
import type { SyncLogger } from '../core/logger.js';
import type { PageResult, SyncCursor, SyncCycleResult, SyncMode } from '../core/types.js';
import type { ChangeFeedClient, FeedSession } from './change-feed.js';
import type { CursorStore } from './cursor-store.js';
import type { Reconciler } from './reconciler.js';

export interface SyncOrchestratorOptions {
  feed: ChangeFeedClient;
  reconciler: Reconciler;
  index: ChunkIndex;
  cursorStore: CursorStore;
  logger?: SyncLogger;
  now?: () => Date;
}

export interface RunCycleOptions {
  signal?: AbortSignal;
}

type CycleTotals = Omit<SyncCycleResult, 'mode' | 'fellBackToFull' | 'startedAt' | 'finishedAt'>;

function emptyTotals(): CycleTotals {
  return {
    added: 0,
    updated: 0,
    deleted: 0,
    skipped: 0,
    failed: 0,
    failures: [],
    pages: 0,
    cursorAdvanced: false,
    cancelled: false,
  };
}

function accumulate(totals: CycleTotals, page: PageResult): void {
  totals.added += page.added;
  totals.updated += page.updated;
  totals.deleted += page.deleted;
  totals.skipped += page.skipped;
  totals.failed += page.failed;
  totals.failures.push(...page.failures);
  totals.pages += 1;
  totals.cursorAdvanced ||= page.cursorAdvanced;
  totals.cancelled ||= page.cancelled;
}

export function summarizeResult(result: SyncCycleResult): string {
  const parts = [
    `${result.added} added`,
    `${result.updated} updated`,
    `${result.deleted} deleted`,
    `${result.skipped} skipped`,
    `${result.failed} failed`,
  ];
  const mode = result.fellBackToFull ? 'full (fallback)' : result.mode;
  return `${mode} sync: ${parts.join(', ')} across ${result.pages} page(s)`;
}

export class SyncOrchestrator {
  private running = false;
  private compatible: boolean | null = null;
  private readonly now: () => Date;

  constructor(private readonly options: SyncOrchestratorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one cycle. Returns null without doing anything when a cycle is
   * already running. StorageError and other cycle-level faults are thrown
   * after the lock is released.
   */
  async runCycle(mode: SyncMode = 'delta', options: RunCycleOptions = {}): Promise<SyncCycleResult | null> {
    const log = this.options.logger;
    if (this.running) {
      log?.('WARN', 'Sync already in progress, request rejected');
      return null;
    }

    this.running = true;
    try {
      return await this.execute(mode, options.signal);
    } finally {
      this.running = false;
    }
  }

  private async execute(requested: SyncMode, signal?: AbortSignal): Promise<SyncCycleResult> {
    const { index, cursorStore, feed, logger } = this.options;
    const startedAt = this.now().toISOString();
    const totals = emptyTotals();

    if (this.compatible === null) {
      this.compatible = (await index.initialize()).compatible;
    }

    let mode: SyncMode = requested;
    let fellBackToFull = false;
    let session: FeedSession | null = null;

    if (requested === 'delta') {
      const cursor = await cursorStore.load();
      const reason = this.fallbackReason(cursor);
      if (reason) {
        logger?.('INFO', `${reason}, running a full sync`);
        mode = 'full';
        fellBackToFull = true;
      } else {
        try {
          session = await feed.open(cursor, { signal });
        } catch (error) {
          if (!(error instanceof CursorExpiredError)) throw error;
          logger?.('WARN', `${errorMessage(error)}, running a full sync`);
          mode = 'full';
          fellBackToFull = true;
        }
      }
    }

    if (mode === 'full') {
      session = await this.beginFull(signal);
    }

    if (session) {
      try {
        await this.drain(session, mode === 'full', totals, signal);
      } catch (error) {
        // Cursor went stale while paging a delta; restart from scratch
        if (!(error instanceof CursorExpiredError) || mode === 'full') throw error;
        logger?.('WARN', `${errorMessage(error)} mid-stream, running a full sync`);
        mode = 'full';
        fellBackToFull = true;
        await this.drain(await this.beginFull(signal), true, totals, signal);
      }
    }

    const result: SyncCycleResult = {
      mode,
      fellBackToFull,
      ...totals,
      startedAt,
      finishedAt: this.now().toISOString(),
    };
    logger?.('INFO', summarizeResult(result));
    return result;
  }

  private fallbackReason(cursor: SyncCursor | null): string | null {
    if (!cursor) return 'No stored cursor';
    if (!this.compatible) return 'Chunk index is missing or was built with different settings';
    return null;
  }

  private async beginFull(signal?: AbortSignal): Promise<FeedSession> {
    const { index, cursorStore, feed } = this.options;
    await index.clear();
    await cursorStore.clear();
    // From here on the index is being rebuilt with the current settings
    this.compatible = true;
    return feed.open(null, { signal });
  }

  private async drain(
    session: FeedSession,
    full: boolean,
    totals: CycleTotals,
    signal?: AbortSignal
  ): Promise<void> {
    const { reconciler, logger } = this.options;

    for await (const page of session) {
      if (signal?.aborted) {
        totals.cancelled = true;
        break;
      }

      const pageResult = await reconciler.applyPage(page, { signal, dropDeletes: full });
      accumulate(totals, pageResult);
      logger?.(
        'DEBUG',
        `Page ${totals.pages}: ${page.records.length} records, cursor ${pageResult.cursorAdvanced ? 'advanced' : 'held'}`
      );

      if (pageResult.cancelled) break;
      if (pageResult.failed > 0) {
        logger?.('WARN', 'Stopping after a page with failures; remaining pages wait for the next cycle');
        break;
      }
    }
  }
}
