/**
 * Embedding Service Module
 *
 * @module services/embedding
 */

export {
  HashingEmbedder,
  EmbeddingError,
  DEFAULT_EMBEDDING_DIM,
  HASHING_EMBEDDER_PREFIX,
  tokenize,
  tokenBucket,
  l2Normalize,
} from './hashing.js';

export type { EmbeddingErrorCode } from './hashing.js';
