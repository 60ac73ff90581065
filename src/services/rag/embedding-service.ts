/**
 * Embedding Service
 * Generates text embeddings using OpenAI or OpenRouter embedding models
 */

import OpenAI from 'openai';
import pino from 'pino';
import {
  DEFAULT_EMBEDDING_CONFIG,
  type Embedder,
  type EmbeddingConfig,
  type EmbeddingProviderName,
} from '../../types/vector-db.js';
import { ProviderError } from '../../types/errors.js';

const logger = pino({
  name: 'embedding-service',
  level: process.env.LOG_LEVEL || 'info',
});

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export interface EmbeddingServiceOptions {
  apiKey?: string;
  /** Pause between batches, in milliseconds */
  batchDelayMs?: number;
}

export class EmbeddingService implements Embedder {
  private client: OpenAI;
  private config: EmbeddingConfig;
  private provider: EmbeddingProviderName;
  private batchDelayMs: number;

  constructor(config?: Partial<EmbeddingConfig>, options: EmbeddingServiceOptions = {}) {
    this.config = { ...DEFAULT_EMBEDDING_CONFIG, ...config };
    this.provider = this.config.provider;
    this.batchDelayMs = options.batchDelayMs ?? 100;

    const { apiKey, baseURL } = this.getClientConfig(options.apiKey);

    if (!apiKey) {
      throw new Error(
        this.provider === 'openrouter'
          ? 'OpenRouter API key required for embedding service (set OPENROUTER_API_KEY)'
          : 'OpenAI API key required for embedding service (set OPENAI_API_KEY)'
      );
    }

    this.client = new OpenAI({
      apiKey,
      baseURL,
      defaultHeaders: this.provider === 'openrouter' ? {
        'HTTP-Referer': process.env.APP_URL || 'http://localhost',
        'X-Title': 'Transcript Retrieval Core',
      } : undefined,
    });

    logger.info({ provider: this.provider, model: this.getModelId() }, 'Embedding service initialized');
  }

  private getClientConfig(explicitKey?: string): { apiKey: string | undefined; baseURL: string | undefined } {
    if (this.provider === 'openrouter') {
      return {
        apiKey: explicitKey ?? process.env.OPENROUTER_API_KEY,
        baseURL: OPENROUTER_BASE_URL,
      };
    }
    return {
      apiKey: explicitKey ?? process.env.OPENAI_API_KEY,
      baseURL: process.env.OPENAI_BASE_URL || undefined,
    };
  }

  /**
   * Get the full model ID (with provider prefix for OpenRouter)
   */
  private getModelId(): string {
    if (this.provider === 'openrouter' && !this.config.model.includes('/')) {
      // OpenRouter requires provider prefix (e.g., openai/text-embedding-3-small)
      return `openai/${this.config.model}`;
    }
    return this.config.model;
  }

  /**
   * Generate embedding for a single text
   */
  async embed(text: string): Promise<number[]> {
    try {
      const response = await this.client.embeddings.create({
        model: this.getModelId(),
        input: text,
        dimensions: this.config.dimensions,
      });

      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw new ProviderError(`No embedding returned from ${this.provider}`, 'empty_response', 'embedding', true);
      }
      return embedding;
    } catch (error) {
      const providerError = ProviderError.fromError(error, 'embedding');
      logger.error({ code: providerError.code, retryable: providerError.retryable, provider: this.provider }, 'Failed to generate embedding');
      throw providerError;
    }
  }

  /**
   * Generate embeddings for multiple texts, in input order.
   * Any failed batch fails the whole call.
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const embeddings: number[][] = [];
    const modelId = this.getModelId();

    for (let i = 0; i < texts.length; i += this.config.batchSize) {
      const batch = texts.slice(i, i + this.config.batchSize);

      try {
        const response = await this.client.embeddings.create({
          model: modelId,
          input: batch,
          dimensions: this.config.dimensions,
        });

        if (response.data.length !== batch.length) {
          throw new ProviderError(
            `Expected ${batch.length} embeddings from ${this.provider}, got ${response.data.length}`,
            'empty_response',
            'embedding',
            true
          );
        }

        // The API tags each vector with its input index
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        for (const data of ordered) {
          embeddings.push(data.embedding);
        }

        logger.debug(
          { batchNum: Math.floor(i / this.config.batchSize) + 1, provider: this.provider },
          'Processed embedding batch'
        );

        // Small delay between batches to avoid rate limiting
        if (this.batchDelayMs > 0 && i + this.config.batchSize < texts.length) {
          await new Promise(resolve => setTimeout(resolve, this.batchDelayMs));
        }
      } catch (error) {
        const providerError = ProviderError.fromError(error, 'embedding');
        logger.error(
          { code: providerError.code, batchIndex: i, provider: this.provider },
          'Failed to generate batch embeddings'
        );
        throw providerError;
      }
    }

    logger.info({ count: embeddings.length, provider: this.provider }, 'Generated embeddings');
    return embeddings;
  }

  getModel(): string {
    return this.getModelId();
  }
}
