/**
 * corpus-sync - Chunk Index Contract
 *
 * The index owns chunk storage. The reconciler is the only writer; the
 * retriever reads concurrently and watches IndexVersion to know when its
 * cached answers are stale.
 */

import { EventEmitter } from 'events';

import type { ChunkMetadata, ChunkSearchResult, StoredChunk } from './types.js';

export interface IndexInitResult {
  /** False when the persisted store was built with another model or chunking setup. */
  compatible: boolean;
}

export interface ChunkIndex {
  readonly backend: string;

  initialize(): Promise<IndexInitResult>;

  /** Idempotent; returns how many chunks were removed (0 if the item was never indexed). */
  deleteBySourceId(sourceItemId: string): Promise<number>;

  /**
   * Embed and store the ordered chunk texts for one item. The caller has
   * already removed the item's previous chunks. Embedding failure: EmbedError.
   */
  insertChunks(sourceItemId: string, texts: string[], metadata?: ChunkMetadata): Promise<void>;

  count(): Promise<number>;
  countBySourceId(sourceItemId: string): Promise<number>;
  getChunks(sourceItemId: string): Promise<StoredChunk[]>;
  clear(): Promise<void>;

  /** Make every mutation so far durable. Runs before each cursor commit. */
  flush(): Promise<void>;

  search(queryEmbedding: number[], limit: number): Promise<ChunkSearchResult[]>;
}

// ============================================================================
// Index Version
// ============================================================================

/**
 * Monotonic counter bumped after every committed mutation batch. Readers
 * compare versions or listen for 'change'.
 */
export class IndexVersion extends EventEmitter {
  private value = 0;

  get current(): number {
    return this.value;
  }

  bump(): number {
    this.value += 1;
    this.emit('change', this.value);
    return this.value;
  }
}

// ============================================================================
// Similarity
// ============================================================================

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
