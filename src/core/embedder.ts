/**
 * corpus-sync - Embedding Generation
 *
 * Generates embeddings for chunk text and search queries using OpenAI's API,
 * with retry logic and batching.
 */

import OpenAI from 'openai';

import { EmbedError, errorMessage } from './errors.js';

export interface Embedder {
  readonly modelName: string;
  /** One vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

// Embedding models have token limits; chunks are far below this in practice
const MAX_INPUT_CHARS = 8000;

/** The slice of the OpenAI client this module calls. */
export interface EmbeddingsApi {
  create(params: { model: string; input: string[] }): Promise<{
    data: Array<{ index: number; embedding: number[] }>;
  }>;
}

export interface OpenAIEmbedderOptions {
  apiKey?: string;
  model?: string;
  batchSize?: number;
  maxRetries?: number;
  timeoutMs?: number;
  /** Injected for tests. */
  embeddings?: EmbeddingsApi;
}

function isRetryableOpenAIError(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) return true;
  if (error instanceof OpenAI.APIError) {
    return error.status === 429 || (error.status !== undefined && error.status >= 500);
  }
  const message = errorMessage(error);
  return (
    message.includes('Connection') ||
    message.includes('timeout') ||
    message.includes('ECONNRESET') ||
    message.includes('rate limit')
  );
}

export class OpenAIEmbedder implements Embedder {
  readonly modelName: string;
  private embeddings: EmbeddingsApi | null;
  private readonly batchSize: number;
  private readonly maxRetries: number;

  constructor(private readonly options: OpenAIEmbedderOptions) {
    this.modelName = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.batchSize = options.batchSize ?? 100;
    this.maxRetries = options.maxRetries ?? 3;
    this.embeddings = options.embeddings ?? null;
  }

  private getEmbeddings(): EmbeddingsApi {
    if (!this.embeddings) {
      const { apiKey, timeoutMs } = this.options;
      if (!apiKey) {
        throw new EmbedError(
          "OPENAI_API_KEY is not configured. Set it in the environment or with 'corpus-sync config set openai_api_key'."
        );
      }
      // Retries are handled here so the SDK's own retry loop is disabled
      this.embeddings = new OpenAI({ apiKey, maxRetries: 0, timeout: timeoutMs }).embeddings;
    }
    return this.embeddings;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const results: number[][] = [];

    // Process in batches
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize).map((t) => t.substring(0, MAX_INPUT_CHARS));
      results.push(...(await this.embedBatch(batch)));
    }

    return results;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    const embeddings = this.getEmbeddings();
    for (let attempt = 1; ; attempt++) {
      try {
        const response = await embeddings.create({
          model: this.modelName,
          input: batch,
        });

        // Sort by index to maintain order
        const sorted = [...response.data].sort((a, b) => a.index - b.index);
        if (sorted.length !== batch.length) {
          throw new EmbedError(`Expected ${batch.length} embeddings, received ${sorted.length}`);
        }
        return sorted.map((item) => item.embedding);
      } catch (error) {
        if (error instanceof EmbedError) throw error;
        if (isRetryableOpenAIError(error) && attempt < this.maxRetries) {
          const delay = Math.pow(2, attempt) * 1000;
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }
        throw new EmbedError(`Embedding request failed: ${errorMessage(error)}`, { cause: error });
      }
    }
  }
}
