/**
 * corpus-sync - Delta Synchronization Engine
 *
 * Keeps a chunk-level semantic index in step with a remote document library:
 * 1. Change feed: pages of changes since the stored cursor
 * 2. Reconciler: delete/replace each item's chunks, then commit the cursor
 * 3. Orchestrator & scheduler: one cycle at a time, Delta or Full
 */

export * from './change-feed.js';
export * from './content-fetch.js';
export * from './cursor-store.js';
export * from './engine.js';
export * from './orchestrator.js';
export * from './pool.js';
export * from './processors.js';
export * from './reconciler.js';
export * from './retry.js';
export * from './scheduler.js';
export * from './splitter.js';

export * from '../core/chunk-index.js';
export * from '../core/chunk-index-local.js';
export * from '../core/chunk-index-supabase.js';
export * from '../core/config.js';
export * from '../core/embedder.js';
export * from '../core/errors.js';
export * from '../core/logger.js';
export * from '../core/retrieval.js';
export * from '../core/types.js';
