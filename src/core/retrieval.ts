/**
 * corpus-sync - Retrieval
 *
 * Read side of the index: embed a query, return the closest chunks. Results
 * are cached per (query, limit) until the index version moves.
 */

import type { ChunkIndex, IndexVersion } from './chunk-index.js';
import type { Embedder } from './embedder.js';
import type { ChunkSearchResult } from './types.js';

export interface RetrieverOptions {
  index: ChunkIndex;
  embedder: Embedder;
  version: IndexVersion;
  maxCacheEntries?: number;
}

export class Retriever {
  private readonly cache = new Map<string, ChunkSearchResult[]>();
  private cachedVersion: number;
  private readonly maxCacheEntries: number;
  private readonly onChange = () => this.cache.clear();

  constructor(private readonly options: RetrieverOptions) {
    this.cachedVersion = options.version.current;
    this.maxCacheEntries = options.maxCacheEntries ?? 100;
    options.version.on('change', this.onChange);
  }

  async search(query: string, limit = 5): Promise<ChunkSearchResult[]> {
    const { index, embedder, version } = this.options;
    if (version.current !== this.cachedVersion) {
      this.cache.clear();
      this.cachedVersion = version.current;
    }

    const key = `${limit}\u0000${query}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const versionAtStart = version.current;
    const [queryEmbedding] = await embedder.embed([query]);
    const results = await index.search(queryEmbedding, limit);

    // Don't cache an answer computed across a version change
    if (version.current === versionAtStart) {
      if (this.cache.size >= this.maxCacheEntries) {
        const oldest = this.cache.keys().next();
        if (!oldest.done) this.cache.delete(oldest.value);
      }
      this.cache.set(key, results);
    }
    return results;
  }

  cacheSize(): number {
    return this.cache.size;
  }

  close(): void {
    this.options.version.off('change', this.onChange);
    this.cache.clear();
  }
}
