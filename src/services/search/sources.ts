/**
 * Collaborator interfaces
 *
 * The fusion core never touches an index, a vector store or a model directly.
 * Everything it needs arrives through these interfaces; the shipped
 * implementations live in services/search/bm25.ts, services/storage/vector.ts,
 * services/embedding and services/search/reranker.ts.
 *
 * @module services/search/sources
 */

import type { RankedList } from '../../models/search.js';

export interface LexicalSource {
  /**
   * @param fieldWeights - Per-field boost, e.g. { title: 3, body: 1, tags: 2 }
   * @param topK - Maximum number of documents to return
   */
  search(query: string, fieldWeights: Readonly<Record<string, number>>, topK: number): Promise<RankedList>;
}

export interface VectorSource {
  search(queryVector: readonly number[], topK: number): Promise<RankedList>;
}

export interface Embedder {
  readonly dimensions: number;
  /** Identifier stored alongside the vectors it produced */
  readonly name: string;
  embed(text: string): Promise<number[]>;
}

export interface CrossEncoder {
  /** Relevance of `docText` to `query`; higher is more relevant */
  score(query: string, docText: string): Promise<number>;
}

/** Pairwise scoring function consumed by the reranker */
export type ScoreFn = (query: string, docText: string) => Promise<number>;

/** Resolves a doc_id to the text handed to the cross-encoder */
export type ResolveText = (docId: string) => string | Promise<string>;
