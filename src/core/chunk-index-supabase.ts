/**
 * corpus-sync - Supabase Chunk Index
 *
 * Chunks live in a pgvector table (see sql/document_chunks.sql). Writes are
 * durable when the request returns, so flush() has nothing to do. Every row
 * records the embedding model and chunk parameters it was built with; rows
 * built differently make the store incompatible.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import WebSocket from 'ws';
import { z } from 'zod';

import type { ChunkIndex, IndexInitResult } from './chunk-index.js';
import type { Embedder } from './embedder.js';
import { EmbedError, errorMessage, StorageError } from './errors.js';
import type { SyncLogger } from './logger.js';
import type { ChunkMetadata, ChunkSearchResult, StoredChunk } from './types.js';

export const DEFAULT_CHUNK_TABLE = 'document_chunks';

const MetadataSchema = z
  .object({
    name: z.string().optional(),
    etag: z.string().optional(),
    lastModified: z.string().optional(),
    webUrl: z.string().optional(),
    folderPath: z.string().optional(),
  })
  .catch({});

// pgvector columns come back as "[0.1,0.2,...]" strings through PostgREST
const EmbeddingSchema = z.union([
  z.array(z.number()),
  z.string().transform((s, ctx): number[] => {
    try {
      return z.array(z.number()).parse(JSON.parse(s));
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Malformed embedding' });
      return z.NEVER;
    }
  }),
]);

const ChunkRowSchema = z.object({
  source_item_id: z.string(),
  sequence_index: z.number(),
  content: z.string(),
  embedding: EmbeddingSchema,
  metadata: MetadataSchema,
});

const MatchRowSchema = z.object({
  source_item_id: z.string(),
  sequence_index: z.number(),
  content: z.string(),
  metadata: MetadataSchema,
  similarity: z.number(),
});

const BuildRowSchema = z.object({
  embedding_model: z.string(),
  chunk_size: z.number(),
  chunk_overlap: z.number(),
});

export interface SupabaseChunkIndexOptions {
  url: string;
  serviceKey: string;
  table?: string;
  embedder: Embedder;
  chunkSize: number;
  chunkOverlap: number;
  logger?: SyncLogger;
  /** Injected for tests. */
  client?: SupabaseClient;
}

/**
 * Server-side client: no session persistence, and `ws` as the realtime
 * transport since Node.js 20 has no global WebSocket.
 */
export function createSupabaseClient(url: string, serviceKey: string, fetchImpl?: typeof fetch): SupabaseClient {
  return createClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    realtime: { transport: WebSocket },
    global: fetchImpl ? { fetch: fetchImpl } : undefined,
  });
}

export class SupabaseChunkIndex implements ChunkIndex {
  readonly backend = 'supabase';

  private readonly client: SupabaseClient;
  private readonly table: string;

  constructor(private readonly options: SupabaseChunkIndexOptions) {
    // Service key bypasses RLS; the sync engine is the only writer
    this.client = options.client ?? createSupabaseClient(options.url, options.serviceKey);
    this.table = options.table ?? DEFAULT_CHUNK_TABLE;
  }

  async initialize(): Promise<IndexInitResult> {
    const { data, error } = await this.client
      .from(this.table)
      .select('embedding_model, chunk_size, chunk_overlap')
      .limit(1);

    if (error) {
      throw new StorageError(`Could not reach table '${this.table}': ${error.message}`);
    }

    const rows = z.array(BuildRowSchema).safeParse(data);
    if (!rows.success) {
      return { compatible: false };
    }
    // Empty table: no rows were built with other settings
    if (rows.data.length === 0) {
      return { compatible: true };
    }

    const row = rows.data[0];
    const compatible =
      row.embedding_model === this.options.embedder.modelName &&
      row.chunk_size === this.options.chunkSize &&
      row.chunk_overlap === this.options.chunkOverlap;

    if (!compatible) {
      this.options.logger?.('WARN', 'Stored index incompatible (model/chunk params differ), it will be rebuilt');
    }
    return { compatible };
  }

  async deleteBySourceId(sourceItemId: string): Promise<number> {
    const { count, error } = await this.client
      .from(this.table)
      .delete({ count: 'exact' })
      .eq('source_item_id', sourceItemId);

    if (error) {
      throw new StorageError(`Delete failed for ${sourceItemId}: ${error.message}`);
    }
    return count ?? 0;
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

    const rows = texts.map((content, i) => ({
      source_item_id: sourceItemId,
      sequence_index: i,
      content,
      embedding: embeddings[i],
      metadata,
      embedding_model: this.options.embedder.modelName,
      chunk_size: this.options.chunkSize,
      chunk_overlap: this.options.chunkOverlap,
      indexed_at: new Date().toISOString(),
    }));

    const { error } = await this.client.from(this.table).insert(rows);
    if (error) {
      throw new StorageError(`Insert failed for ${sourceItemId}: ${error.message}`);
    }
  }

  async count(): Promise<number> {
    const { count, error } = await this.client.from(this.table).select('*', { count: 'exact', head: true });
    if (error) {
      throw new StorageError(`Count failed: ${error.message}`);
    }
    return count ?? 0;
  }

  async countBySourceId(sourceItemId: string): Promise<number> {
    const { count, error } = await this.client
      .from(this.table)
      .select('*', { count: 'exact', head: true })
      .eq('source_item_id', sourceItemId);
    if (error) {
      throw new StorageError(`Count failed for ${sourceItemId}: ${error.message}`);
    }
    return count ?? 0;
  }

  async getChunks(sourceItemId: string): Promise<StoredChunk[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select('source_item_id, sequence_index, content, embedding, metadata')
      .eq('source_item_id', sourceItemId)
      .order('sequence_index', { ascending: true });

    if (error) {
      throw new StorageError(`Lookup failed for ${sourceItemId}: ${error.message}`);
    }

    return z
      .array(ChunkRowSchema)
      .parse(data ?? [])
      .map((row) => ({
        sourceItemId: row.source_item_id,
        sequenceIndex: row.sequence_index,
        text: row.content,
        embedding: row.embedding,
        metadata: row.metadata,
      }));
  }

  async clear(): Promise<void> {
    const { error } = await this.client.from(this.table).delete().not('source_item_id', 'is', null);
    if (error) {
      throw new StorageError(`Clear failed: ${error.message}`);
    }
  }

  async flush(): Promise<void> {
    // Every write above is committed when its request returns
  }

  async search(queryEmbedding: number[], limit: number): Promise<ChunkSearchResult[]> {
    const { data, error } = await this.client.rpc('match_document_chunks', {
      query_embedding: queryEmbedding,
      match_count: limit,
    });

    if (error) {
      throw new StorageError(`Search failed: ${error.message}`);
    }

    return z
      .array(MatchRowSchema)
      .parse(data ?? [])
      .map((row) => ({
        sourceItemId: row.source_item_id,
        sequenceIndex: row.sequence_index,
        text: row.content,
        score: row.similarity,
        metadata: row.metadata,
      }));
  }
}
