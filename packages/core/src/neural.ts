/**
 * Neural layer primitives
 *
 * - Embedding: text → unit-normalized vectors
 * - Similarity: dot product over unit vectors
 */

import type { Embedding } from './types.js';
import {
  DegenerateVectorError,
  DimensionMismatchError,
  EmbeddingProviderError,
  GroundingError,
} from './errors.js';

// =============================================================================
// Embedding
// =============================================================================

export interface EmbeddingProvider {
  embed(text: string): Promise<Embedding>;
  model: string;
}

export function normalize(embedding: Embedding): Embedding {
  let norm = 0;
  for (let i = 0; i < embedding.dimension; i++) {
    norm += embedding.vector[i] * embedding.vector[i];
  }
  norm = Math.sqrt(norm);

  if (norm === 0 || !Number.isFinite(norm)) {
    throw new DegenerateVectorError();
  }

  const vector = new Float32Array(embedding.dimension);
  for (let i = 0; i < embedding.dimension; i++) {
    vector[i] = embedding.vector[i] / norm;
  }

  return { ...embedding, vector };
}

/**
 * Embed `text` and normalize the result.
 *
 * Provider failures are rethrown as EmbeddingProviderError with the original
 * error as `cause`. A zero-norm result throws DegenerateVectorError.
 */
export async function embedUnit(provider: EmbeddingProvider, text: string): Promise<Embedding> {
  let embedding: Embedding;
  try {
    embedding = await provider.embed(text);
  } catch (error) {
    if (error instanceof GroundingError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new EmbeddingProviderError(`Embedding provider ${provider.model} failed: ${reason}`, {
      cause: error,
    });
  }

  if (embedding.dimension !== embedding.vector.length || embedding.dimension === 0) {
    throw new EmbeddingProviderError(
      `Embedding provider ${provider.model} returned a malformed vector (dimension ${embedding.dimension}, length ${embedding.vector.length})`
    );
  }

  return normalize(embedding);
}

// =============================================================================
// Similarity
// =============================================================================

/**
 * Cosine similarity between two unit-normalized embeddings.
 */
export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.dimension !== b.dimension) {
    throw new DimensionMismatchError(a.dimension, b.dimension);
  }

  let dot = 0;
  for (let i = 0; i < a.dimension; i++) {
    dot += a.vector[i] * b.vector[i];
  }

  return dot;
}
