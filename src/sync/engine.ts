/**
 * corpus-sync - Engine Wiring
 *
 * Builds every collaborator from a resolved config. This is the only place
 * concrete implementations are chosen; everything below takes interfaces.
 */

import { ClientCredentialsTokenProvider } from '../core/auth.js';
import { IndexVersion, type ChunkIndex } from '../core/chunk-index.js';
import { LocalChunkIndex } from '../core/chunk-index-local.js';
import { SupabaseChunkIndex } from '../core/chunk-index-supabase.js';
import type { ResolvedConfig } from '../core/config.js';
import { OpenAIEmbedder, type Embedder } from '../core/embedder.js';
import { GraphClient } from '../core/graph-client.js';
import { createConsoleLogger, type SyncLogger } from '../core/logger.js';
import { Retriever } from '../core/retrieval.js';
import { GraphChangeFeed, type ChangeFeedClient } from './change-feed.js';
import { GraphContentFetcher, type ContentFetcher } from './content-fetch.js';
import { FileCursorStore, type CursorStore } from './cursor-store.js';
import { SyncOrchestrator } from './orchestrator.js';
import { createDefaultChunker, type ContentChunker } from './processors.js';
import { Reconciler } from './reconciler.js';
import { hoursToMs, SyncScheduler, type SyncSchedulerOptions } from './scheduler.js';

export interface SyncEngine {
  orchestrator: SyncOrchestrator;
  index: ChunkIndex;
  cursorStore: CursorStore;
  version: IndexVersion;
  retriever: Retriever;
  createScheduler(options?: SyncSchedulerOptions): SyncScheduler;
}

/** Collaborators a caller may supply instead of the configured defaults. */
export interface SyncEngineOverrides {
  logger?: SyncLogger;
  embedder?: Embedder;
  index?: ChunkIndex;
  feed?: ChangeFeedClient;
  fetcher?: ContentFetcher;
  chunker?: ContentChunker;
  cursorStore?: CursorStore;
}

function requireSetting(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`${name} is not configured. Set it in the environment or with 'corpus-sync config set'.`);
  }
  return value;
}

export function createEmbedder(config: ResolvedConfig): OpenAIEmbedder {
  return new OpenAIEmbedder({
    apiKey: config.openaiApiKey,
    model: config.embeddingModel,
    timeoutMs: config.fetchTimeoutMs,
  });
}

export function createChunkIndex(config: ResolvedConfig, embedder: Embedder, logger?: SyncLogger): ChunkIndex {
  const common = {
    embedder,
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    logger,
  };

  if (config.indexBackend === 'supabase') {
    return new SupabaseChunkIndex({
      ...common,
      url: requireSetting(config.supabaseUrl, 'SUPABASE_URL'),
      serviceKey: requireSetting(config.supabaseServiceKey, 'SUPABASE_SERVICE_KEY'),
      table: config.supabaseTable,
    });
  }
  return new LocalChunkIndex({ ...common, filePath: config.indexPath });
}

export function createGraphClient(config: ResolvedConfig, logger?: SyncLogger): GraphClient {
  const { graph } = config;
  const tokenProvider = new ClientCredentialsTokenProvider(
    {
      tenantId: requireSetting(graph.tenantId, 'SP_TENANT_ID'),
      clientId: requireSetting(graph.clientId, 'SP_CLIENT_ID'),
      clientSecret: requireSetting(graph.clientSecret, 'SP_CLIENT_SECRET'),
    },
    { timeoutMs: config.fetchTimeoutMs }
  );

  return new GraphClient({
    tokenProvider,
    siteHostname: requireSetting(graph.siteHostname, 'SP_SITE_HOSTNAME'),
    sitePath: requireSetting(graph.sitePath, 'SP_SITE_PATH'),
    driveName: graph.driveName ?? 'Documents',
    timeoutMs: config.fetchTimeoutMs,
    logger,
  });
}

export function createSyncEngine(config: ResolvedConfig, overrides: SyncEngineOverrides = {}): SyncEngine {
  const logger = overrides.logger ?? createConsoleLogger(config.verbose);
  const embedder = overrides.embedder ?? createEmbedder(config);
  const index = overrides.index ?? createChunkIndex(config, embedder, logger);
  const cursorStore = overrides.cursorStore ?? new FileCursorStore(config.cursorPath, logger);
  const version = new IndexVersion();

  let feed = overrides.feed;
  let fetcher = overrides.fetcher;
  if (!feed || !fetcher) {
    const client = createGraphClient(config, logger);
    feed ??= new GraphChangeFeed(client, { scanFolders: config.graph.scanFolders });
    fetcher ??= new GraphContentFetcher(client);
  }

  const chunker =
    overrides.chunker ??
    createDefaultChunker({ chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap, logger });

  const reconciler = new Reconciler({
    index,
    fetcher,
    chunker,
    cursorStore,
    version,
    concurrency: config.concurrency,
    itemRetries: config.itemRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
    logger,
  });

  const orchestrator = new SyncOrchestrator({ feed, reconciler, index, cursorStore, logger });
  const retriever = new Retriever({ index, embedder, version });

  return {
    orchestrator,
    index,
    cursorStore,
    version,
    retriever,
    createScheduler: (options = {}) =>
      new SyncScheduler(orchestrator, hoursToMs(config.syncIntervalHours), { logger, ...options }),
  };
}
