import { GoogleGenerativeAI } from '@google/generative-ai';
import { EMBEDDING_DIMENSION, PLACEHOLDER_EMBEDDING_VALUE } from '../config/scoringPolicy';

/**
 * The slice of the encoder client we rely on. `GenerativeModel` from
 * @google/generative-ai satisfies it; tests pass a fake.
 */
export interface EmbeddingModel {
  embedContent(text: string): Promise<{ embedding: { values: number[] } }>;
}

export interface EmbeddingServiceOptions {
  apiKey?: string;
  model?: string;
  dimension?: number;
  maxConcurrent?: number;
  cacheSize?: number;
  initialRetryDelayMs?: number;
  // overrides the client built from apiKey
  embeddingModel?: EmbeddingModel | null;
}

export type EmbeddingMode = 'ready' | 'degraded';

export interface EmbeddingStatus {
  mode: EmbeddingMode;
  model: string;
  dimension: number;
}

export class EmbeddingService {
  private model: string;
  private configuredDimension: number;
  private actualDimension: number | null = null;
  private dimensionWarned: boolean = false;
  private degradedWarned: boolean = false;
  private readonly MAX_RETRIES = 3;
  private readonly initialRetryDelayMs: number;
  private readonly maxConcurrent: number;
  private readonly cacheSize: number;
  private embeddingCache: Map<string, number[]> = new Map();
  private modelInstance: EmbeddingModel | null = null;

  constructor(options: EmbeddingServiceOptions = {}) {
    this.model = options.model || 'text-embedding-004';
    this.configuredDimension = options.dimension ?? EMBEDDING_DIMENSION;
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? 30);
    this.cacheSize = options.cacheSize ?? 1000;
    this.initialRetryDelayMs = options.initialRetryDelayMs ?? 1000;

    if (options.embeddingModel !== undefined) {
      this.modelInstance = options.embeddingModel;
    } else if (options.apiKey) {
      try {
        const genAI = new GoogleGenerativeAI(options.apiKey);
        this.modelInstance = genAI.getGenerativeModel({ model: this.model });
      } catch (error) {
        console.error('[EmbeddingService] Failed to load embedding model:', error);
        this.modelInstance = null;
      }
    }

    if (!this.modelInstance) {
      this.warnDegraded('no embedding model available');
    }
  }

  getStatus(): EmbeddingStatus {
    return {
      mode: this.modelInstance ? 'ready' : 'degraded',
      model: this.model,
      dimension: this.configuredDimension
    };
  }

  getDimension(): number {
    return this.configuredDimension;
  }

  placeholderVector(): number[] {
    return new Array<number>(this.configuredDimension).fill(PLACEHOLDER_EMBEDDING_VALUE);
  }

  /**
   * Embed one text. Never rejects: an unavailable encoder or an exhausted
   * retry budget yields the placeholder vector.
   */
  async embed(text: string): Promise<number[]> {
    if (!this.modelInstance) {
      this.warnDegraded('no embedding model available');
      return this.placeholderVector();
    }

    const cached = this.embeddingCache.get(text);
    if (cached) {
      return [...cached]; // copy, callers may mutate
    }

    try {
      const embedding = await this.embedWithRetry(this.modelInstance, text, 0);
      this.remember(text, embedding);
      return [...embedding];
    } catch (error) {
      console.error('[EmbeddingService] ERROR: Falling back to placeholder embedding:', error instanceof Error ? error.message : error);
      return this.placeholderVector();
    }
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    const results: number[][] = new Array(texts.length);

    for (let i = 0;i < texts.length;i += this.maxConcurrent) {
      const chunk = texts.slice(i, i + this.maxConcurrent);
      const embeddings = await Promise.all(chunk.map(text => this.embed(text)));
      embeddings.forEach((embedding, chunkIdx) => {
        results[i + chunkIdx] = embedding;
      });
    }

    return results;
  }

  private async embedWithRetry(model: EmbeddingModel, text: string, retryCount: number): Promise<number[]> {
    try {
      if (retryCount > 0) {
        console.log(`[EmbeddingService] Retry ${retryCount}/${this.MAX_RETRIES}...`);
      }

      const result = await model.embedContent(text);
      const values = result?.embedding?.values;
      if (!Array.isArray(values) || values.length === 0) {
        throw new Error('Unexpected embedding response format');
      }

      return this.fitDimension(values);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const isNetworkError = err.message.includes('fetch failed') ||
        err.message.includes('ECONNRESET') ||
        err.message.includes('ETIMEDOUT') ||
        err.message.includes('network');

      if (isNetworkError && retryCount < this.MAX_RETRIES) {
        const delay = this.initialRetryDelayMs * Math.pow(2, retryCount);
        console.warn(`[EmbeddingService] Network error (attempt ${retryCount + 1}/${this.MAX_RETRIES + 1}), retrying in ${delay}ms:`, err.message);
        await new Promise(resolve => setTimeout(resolve, delay));
        return this.embedWithRetry(model, text, retryCount + 1);
      }

      throw new Error(`Failed to generate embedding after ${retryCount} retries: ${err.message}`);
    }
  }

  private fitDimension(values: number[]): number[] {
    if (this.actualDimension === null) {
      this.actualDimension = values.length;
      if (this.actualDimension !== this.configuredDimension && !this.dimensionWarned) {
        console.warn(`[EmbeddingService] Dimension mismatch: ${this.configuredDimension} vs ${this.actualDimension}`);
        this.dimensionWarned = true;
      }
    }

    if (values.length > this.configuredDimension) {
      return values.slice(0, this.configuredDimension);
    }
    if (values.length < this.configuredDimension) {
      const padding = new Array<number>(this.configuredDimension - values.length).fill(0);
      return [...values, ...padding];
    }
    return [...values];
  }

  private remember(cacheKey: string, embedding: number[]): void {
    if (this.cacheSize === 0 || this.embeddingCache.has(cacheKey)) return;
    if (this.embeddingCache.size >= this.cacheSize) {
      const firstKey = this.embeddingCache.keys().next().value;
      if (firstKey !== undefined) this.embeddingCache.delete(firstKey);
    }
    this.embeddingCache.set(cacheKey, embedding);
  }

  private warnDegraded(reason: string): void {
    if (this.degradedWarned) return;
    this.degradedWarned = true;
    console.warn(`[EmbeddingService] Degraded mode (${reason}): returning placeholder vectors of ${this.configuredDimension} x ${PLACEHOLDER_EMBEDDING_VALUE}`);
  }
}
