/**
 * corpus-sync - Local Chunk Index
 *
 * In-memory chunk map persisted to one JSON file. Embeddings are stored as
 * base64-encoded little-endian float32. The file carries the embedding model
 * and chunk parameters; a mismatch on load makes the store incompatible and
 * the next cycle rebuilds it from a full enumeration.
 *
 * Each item's chunk array is swapped in a single assignment, so concurrent
 * searches see the old set, no set, or the new set.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';

import { writeFileAtomic } from './atomic-write.js';
import { cosineSimilarity, type ChunkIndex, type IndexInitResult } from './chunk-index.js';
import type { Embedder } from './embedder.js';
import { EmbedError, errorMessage, isErrno, StorageError } from './errors.js';
import type { SyncLogger } from './logger.js';
import type { ChunkMetadata, ChunkSearchResult, StoredChunk } from './types.js';

const STORE_VERSION = 1;

const ChunkMetadataSchema = z.object({
  name: z.string().optional(),
  etag: z.string().optional(),
  lastModified: z.string().optional(),
  webUrl: z.string().optional(),
  folderPath: z.string().optional(),
});

const StoreFileSchema = z.object({
  version: z.literal(STORE_VERSION),
  meta: z.object({
    modelName: z.string(),
    chunkSize: z.number(),
    chunkOverlap: z.number(),
    savedAt: z.string().optional(),
  }),
  chunks: z.array(
    z.object({
      sourceItemId: z.string(),
      sequenceIndex: z.number().int().nonnegative(),
      text: z.string(),
      metadata: ChunkMetadataSchema.default({}),
      emb: z.string(),
    })
  ),
});

type StoreFile = z.infer<typeof StoreFileSchema>;

export function encodeEmbedding(embedding: number[]): string {
  const arr = Float32Array.from(embedding);
  return Buffer.from(arr.buffer, arr.byteOffset, arr.byteLength).toString('base64');
}

export function decodeEmbedding(encoded: string): number[] | null {
  const buf = Buffer.from(encoded, 'base64');
  if (buf.byteLength % 4 !== 0) return null;
  // Copy into an aligned buffer before viewing as float32
  const aligned = new Uint8Array(buf).buffer;
  return Array.from(new Float32Array(aligned));
}

export interface LocalChunkIndexOptions {
  filePath: string;
  embedder: Embedder;
  chunkSize: number;
  chunkOverlap: number;
  logger?: SyncLogger;
}

export class LocalChunkIndex implements ChunkIndex {
  readonly backend = 'local';

  private readonly items = new Map<string, StoredChunk[]>();
  private dirty = false;
  private persisted = false;

  constructor(private readonly options: LocalChunkIndexOptions) {}

  getPath(): string {
    return this.options.filePath;
  }

  async initialize(): Promise<IndexInitResult> {
    const { filePath, logger } = this.options;
    this.items.clear();
    this.dirty = false;
    this.persisted = false;

    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrno(error, 'ENOENT')) {
        // Nothing persisted yet: whatever a stored cursor says, the index is empty
        return { compatible: false };
      }
      throw new StorageError(`Could not read chunk index at ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    let store: StoreFile;
    try {
      store = StoreFileSchema.parse(JSON.parse(raw));
    } catch {
      logger?.('WARN', `Chunk index at ${filePath} is unreadable, it will be rebuilt`);
      return { compatible: false };
    }

    const { meta } = store;
    if (
      meta.modelName !== this.options.embedder.modelName ||
      meta.chunkSize !== this.options.chunkSize ||
      meta.chunkOverlap !== this.options.chunkOverlap
    ) {
      logger?.('WARN', 'Stored index incompatible (model/chunk params differ), it will be rebuilt');
      return { compatible: false };
    }

    for (const entry of store.chunks) {
      const embedding = decodeEmbedding(entry.emb);
      if (!embedding) continue;
      const list = this.items.get(entry.sourceItemId) ?? [];
      list.push({
        sourceItemId: entry.sourceItemId,
        sequenceIndex: entry.sequenceIndex,
        text: entry.text,
        embedding,
        metadata: entry.metadata,
      });
      this.items.set(entry.sourceItemId, list);
    }
    for (const list of this.items.values()) {
      list.sort((a, b) => a.sequenceIndex - b.sequenceIndex);
    }

    this.persisted = true;
    logger?.('DEBUG', `Loaded chunk index: ${store.chunks.length} chunks from ${filePath}`);
    return { compatible: true };
  }

  async deleteBySourceId(sourceItemId: string): Promise<number> {
    const existing = this.items.get(sourceItemId);
    if (!existing) return 0;
    this.items.delete(sourceItemId);
    this.dirty = true;
    return existing.length;
  }

  async insertChunks(sourceItemId: string, texts: string[], metadata: ChunkMetadata = {}): Promise<void> {
    if (texts.length === 0) return;

    let embeddings: number[][];
    try {
      embeddings = await this.options.embedder.embed(texts);
    } catch (error) {
      if (error instanceof EmbedError) throw error;
      throw new EmbedError(`Embedding failed for ${sourceItemId}: ${errorMessage(error)}`, { cause: error });
    }
    if (embeddings.length !== texts.length) {
      throw new EmbedError(`Expected ${texts.length} embeddings for ${sourceItemId}, received ${embeddings.length}`);
    }

    const chunks: StoredChunk[] = texts.map((text, i) => ({
      sourceItemId,
      sequenceIndex: i,
      text,
      embedding: embeddings[i],
      metadata: { ...metadata },
    }));
    this.items.set(sourceItemId, chunks);
    this.dirty = true;
  }

  async count(): Promise<number> {
    let total = 0;
    for (const list of this.items.values()) total += list.length;
    return total;
  }

  async countBySourceId(sourceItemId: string): Promise<number> {
    return this.items.get(sourceItemId)?.length ?? 0;
  }

  async getChunks(sourceItemId: string): Promise<StoredChunk[]> {
    return [...(this.items.get(sourceItemId) ?? [])];
  }

  async clear(): Promise<void> {
    this.items.clear();
    this.dirty = true;
  }

  async flush(): Promise<void> {
    if (!this.dirty && this.persisted) return;

    const { filePath, embedder, chunkSize, chunkOverlap } = this.options;
    const chunks: StoreFile['chunks'] = [];
    for (const list of this.items.values()) {
      for (const chunk of list) {
        chunks.push({
          sourceItemId: chunk.sourceItemId,
          sequenceIndex: chunk.sequenceIndex,
          text: chunk.text,
          metadata: chunk.metadata,
          emb: encodeEmbedding(chunk.embedding),
        });
      }
    }

    const store: StoreFile = {
      version: STORE_VERSION,
      meta: { modelName: embedder.modelName, chunkSize, chunkOverlap, savedAt: new Date().toISOString() },
      chunks,
    };

    try {
      await writeFileAtomic(filePath, JSON.stringify(store));
    } catch (error) {
      throw new StorageError(`Could not persist chunk index to ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
    this.dirty = false;
    this.persisted = true;
    this.options.logger?.('DEBUG', `Persisted ${chunks.length} chunks to ${filePath}`);
  }

  async search(queryEmbedding: number[], limit: number): Promise<ChunkSearchResult[]> {
    const scored: ChunkSearchResult[] = [];
    for (const list of this.items.values()) {
      for (const chunk of list) {
        scored.push({
          sourceItemId: chunk.sourceItemId,
          sequenceIndex: chunk.sequenceIndex,
          text: chunk.text,
          score: cosineSimilarity(queryEmbedding, chunk.embedding),
          metadata: chunk.metadata,
        });
      }
    }
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, limit);
  }
}
