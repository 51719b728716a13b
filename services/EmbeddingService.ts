import { GoogleGenerativeAI } from '@google/generative-ai';
import { EmbeddingUnavailableError, errorMessage } from '../utils/errors';
import { RetryPolicy, withRetry } from '../utils/retry';

/**
 * Maps text (a chunk or a question) to a fixed-length vector.
 */
export interface Embedder {
  readonly modelName: string;
  getDimension(): number;
  embedText(text: string): Promise<number[]>;
  /** All-or-nothing: resolves with one vector per text, in order, or rejects. */
  embedTexts(texts: string[]): Promise<number[][]>;
}

/**
 * The single remote call the embedder depends on.
 */
export interface EmbeddingClient {
  embedContent(text: string, signal?: AbortSignal): Promise<number[]>;
}

export function createGeminiEmbeddingClient(apiKey: string, model: string): EmbeddingClient {
  const genAI = new GoogleGenerativeAI(apiKey);
  // Pre-instantiate model for reuse across calls
  const modelInstance = genAI.getGenerativeModel({ model });

  return {
    async embedContent(text: string, signal?: AbortSignal): Promise<number[]> {
      const result = await modelInstance.embedContent(text, { signal });
      if (!result.embedding || !Array.isArray(result.embedding.values)) {
        throw new Error('Unexpected embedding response format');
      }
      return result.embedding.values;
    }
  };
}

export interface EmbeddingServiceOptions {
  model: string;
  dimension: number;
  retryPolicy: RetryPolicy;
  timeoutMs: number;
  maxConcurrent?: number;
}

const MAX_CACHE_ENTRIES = 1000;

export class EmbeddingService implements Embedder {
  readonly modelName: string;
  private client: EmbeddingClient;
  private configuredDimension: number;
  private dimensionWarned: boolean = false;
  private retryPolicy: RetryPolicy;
  private timeoutMs: number;
  private maxConcurrent: number;
  private embeddingCache: Map<string, number[]> = new Map();

  constructor(client: EmbeddingClient, options: EmbeddingServiceOptions) {
    this.client = client;
    this.modelName = options.model;
    this.configuredDimension = options.dimension;
    this.retryPolicy = options.retryPolicy;
    this.timeoutMs = options.timeoutMs;
    this.maxConcurrent = options.maxConcurrent ?? 10;
  }

  async embedText(text: string): Promise<number[]> {
    const cached = this.embeddingCache.get(text);
    if (cached) {
      return [...cached];
    }

    let embedding: number[];
    try {
      embedding = await withRetry(
        signal => this.client.embedContent(text, signal),
        this.retryPolicy,
        { label: 'Embedding request', timeoutMs: this.timeoutMs }
      );
    } catch (error) {
      console.error(`[EmbeddingService] ERROR: Failed to generate embedding:`, errorMessage(error));
      throw new EmbeddingUnavailableError(
        `Failed to generate embedding after ${this.retryPolicy.maxAttempts} attempts: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    embedding = this.fitDimension(embedding);

    if (this.embeddingCache.size >= MAX_CACHE_ENTRIES) {
      const firstKey = this.embeddingCache.keys().next().value;
      if (firstKey !== undefined) this.embeddingCache.delete(firstKey);
    }
    this.embeddingCache.set(text, embedding);

    return [...embedding];
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    const embeddings = new Array<number[]>(texts.length);
    const errors: Array<{ index: number; error: unknown }> = [];

    // Process in windows of maxConcurrent parallel requests
    for (let i = 0; i < texts.length; i += this.maxConcurrent) {
      const window = texts.slice(i, i + this.maxConcurrent);
      await Promise.all(window.map(async (text, offset) => {
        try {
          embeddings[i + offset] = await this.embedText(text);
        } catch (error) {
          errors.push({ index: i + offset, error });
        }
      }));

      if (errors.length > 0) {
        break;
      }
    }

    if (errors.length > 0) {
      console.error(`[EmbeddingService] ${errors.length}/${texts.length} embeddings failed`);
      const first = errors.sort((a, b) => a.index - b.index)[0].error;
      if (first instanceof EmbeddingUnavailableError) {
        throw first;
      }
      throw new EmbeddingUnavailableError(`Embedding failed: ${errorMessage(first)}`, { cause: first });
    }

    return embeddings;
  }

  getDimension(): number {
    return this.configuredDimension;
  }

  private fitDimension(embedding: number[]): number[] {
    if (embedding.length === this.configuredDimension) {
      return embedding;
    }

    if (!this.dimensionWarned) {
      console.warn(`[EmbeddingService] Dimension mismatch: ${this.configuredDimension} vs ${embedding.length}`);
      this.dimensionWarned = true;
    }

    if (embedding.length > this.configuredDimension) {
      return embedding.slice(0, this.configuredDimension);
    }
    const padding = new Array<number>(this.configuredDimension - embedding.length).fill(0);
    return [...embedding, ...padding];
  }
}
