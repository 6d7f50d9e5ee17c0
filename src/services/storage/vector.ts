/**
 * Vector storage and KNN search over the sqlite-vec vec_documents table
 *
 * Distances are L2; a hit's raw score is 1 / (1 + distance), so closer
 * documents score higher and every score lies in (0, 1].
 *
 * @module services/storage/vector
 */

import type Database from 'better-sqlite3';
import type { RankedList } from '../../models/search.js';
import { VECTOR_SOURCE } from '../../models/search.js';
import type { VectorSource } from '../search/sources.js';
import { buildRankedList } from '../search/ranked-list.js';
import { ConfigurationError } from '../search/errors.js';
import { readMetadata } from './database/static-operations.js';

export interface VectorHit {
  doc_id: string;
  distance: number;
}

/** Raw vector score for an L2 distance */
export function distanceToScore(distance: number): number {
  return 1 / (1 + distance);
}

function toBlob(vector: readonly number[] | Float32Array): Buffer {
  const floats = vector instanceof Float32Array ? vector : Float32Array.from(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

export class VectorService implements VectorSource {
  readonly dimensions: number;

  constructor(private readonly db: Database.Database) {
    this.dimensions = readMetadata(db).embedding_dimensions;
  }

  private assertDimensions(vector: readonly number[] | Float32Array, context: string): void {
    if (vector.length !== this.dimensions) {
      throw new ConfigurationError(
        `${context} has ${vector.length} dimensions, database stores ${this.dimensions}`,
        { expected: this.dimensions, actual: vector.length }
      );
    }
  }

  /**
   * Insert or replace the vector for a document
   * @throws ConfigurationError on a dimension mismatch
   */
  storeVector(docId: string, vector: readonly number[] | Float32Array): void {
    this.assertDimensions(vector, `Vector for "${docId}"`);
    // vec0 has no upsert
    this.db.prepare('DELETE FROM vec_documents WHERE doc_id = ?').run(docId);
    this.db.prepare('INSERT INTO vec_documents (doc_id, embedding) VALUES (?, ?)').run(docId, toBlob(vector));
  }

  /**
   * @returns true when a vector was deleted
   */
  deleteVector(docId: string): boolean {
    return this.db.prepare('DELETE FROM vec_documents WHERE doc_id = ?').run(docId).changes > 0;
  }

  getVectorCount(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM vec_documents').get();
    return row?.count ?? 0;
  }

  /**
   * KNN search, nearest first
   * @throws ConfigurationError on a dimension mismatch
   */
  searchSimilar(queryVector: readonly number[] | Float32Array, options: { limit: number }): VectorHit[] {
    this.assertDimensions(queryVector, 'Query vector');
    return this.db
      .prepare<[Buffer, number], VectorHit>(
        `
      SELECT doc_id, distance
      FROM vec_documents
      WHERE embedding MATCH ? AND k = ?
      ORDER BY distance
    `
      )
      .all(toBlob(queryVector), options.limit);
  }

  async search(queryVector: readonly number[], topK: number): Promise<RankedList> {
    const hits = this.searchSimilar(queryVector, { limit: topK });
    return buildRankedList(
      VECTOR_SOURCE,
      hits.map((hit) => ({ doc_id: hit.doc_id, score: distanceToScore(hit.distance) }))
    );
  }
}
