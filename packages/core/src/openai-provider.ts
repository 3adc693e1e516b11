/**
 * OpenAI embedding provider
 *
 * Adapter from the `openai` SDK to EmbeddingProvider. The client is created
 * on first use, so constructing the provider never needs an API key; the SDK
 * itself reads OPENAI_API_KEY.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type { Embedding } from './types.js';
import type { EmbeddingProvider } from './neural.js';
import { EmbeddingProviderError } from './errors.js';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

/** The slice of the SDK client the provider calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: {
      model: string;
      input: string;
      dimensions?: number;
    }): PromiseLike<{ data: Array<{ embedding: number[] }> }>;
  };
}

export interface OpenAIEmbeddingConfig {
  model: string;
  /** Requested output dimension (text-embedding-3 models only) */
  dimensions?: number;
  timeout?: number;
  maxRetries?: number;
}

const EmbeddingEnvSchema = z.object({
  HEXGATE_EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
  HEXGATE_EMBEDDING_DIM: z.coerce.number().int().positive().optional(),
});

export function embeddingConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): OpenAIEmbeddingConfig {
  const parsed = EmbeddingEnvSchema.parse(env);
  return {
    model: parsed.HEXGATE_EMBEDDING_MODEL,
    dimensions: parsed.HEXGATE_EMBEDDING_DIM,
  };
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private config: OpenAIEmbeddingConfig;
  private client: EmbeddingsClient | undefined;

  constructor(config: Partial<OpenAIEmbeddingConfig> = {}, client?: EmbeddingsClient) {
    this.config = { model: DEFAULT_EMBEDDING_MODEL, ...config };
    this.model = this.config.model;
    this.client = client;
  }

  async embed(text: string): Promise<Embedding> {
    const response = await this.getClient().embeddings.create({
      model: this.model,
      input: text,
      ...(this.config.dimensions !== undefined ? { dimensions: this.config.dimensions } : {}),
    });

    const first = response.data[0];
    if (!first) {
      throw new EmbeddingProviderError(`Model ${this.model} returned no embedding`);
    }

    return {
      vector: Float32Array.from(first.embedding),
      dimension: first.embedding.length,
      model: this.model,
      timestamp: Date.now(),
    };
  }

  private getClient(): EmbeddingsClient {
    if (!this.client) {
      const { timeout, maxRetries } = this.config;
      this.client = new OpenAI({
        ...(timeout !== undefined ? { timeout } : {}),
        ...(maxRetries !== undefined ? { maxRetries } : {}),
      });
    }
    return this.client;
  }
}
