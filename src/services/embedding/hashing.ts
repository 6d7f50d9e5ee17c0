/**
 * HashingEmbedder - deterministic feature-hashing embeddings
 *
 * Each lowercase [a-z0-9]+ token is hashed with md5 into one of `dimensions`
 * buckets; the bucket counts are L2-normalized. Identical text always yields
 * the identical vector, on every machine, with no model download.
 *
 * @module services/embedding/hashing
 */

import crypto from 'crypto';
import type { Embedder } from '../search/sources.js';

export type EmbeddingErrorCode = 'INVALID_DIMENSIONS' | 'EMBEDDING_FAILED';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}

export const DEFAULT_EMBEDDING_DIM = 384;
export const HASHING_EMBEDDER_PREFIX = 'hashing-md5';

const TOKEN_PATTERN = /[a-z0-9]+/g;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Bucket of a token: the full 128-bit md5 digest modulo `dimensions`
 */
export function tokenBucket(token: string, dimensions: number): number {
  const digest = crypto.createHash('md5').update(token, 'utf-8').digest('hex');
  return Number(BigInt(`0x${digest}`) % BigInt(dimensions));
}

/**
 * Scale to unit length. The zero vector is returned unchanged.
 */
export function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (norm === 0) return vector;
  return vector.map((v) => v / norm);
}

export class HashingEmbedder implements Embedder {
  readonly dimensions: number;
  readonly name: string;

  constructor(dimensions: number = DEFAULT_EMBEDDING_DIM) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new EmbeddingError(`Embedding dimensions must be a positive integer, got ${dimensions}`, 'INVALID_DIMENSIONS', {
        dimensions,
      });
    }
    this.dimensions = dimensions;
    this.name = `${HASHING_EMBEDDER_PREFIX}-${dimensions}`;
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      vector[tokenBucket(token, this.dimensions)] += 1;
    }
    return l2Normalize(vector);
  }

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text);
  }
}
