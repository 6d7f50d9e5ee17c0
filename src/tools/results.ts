/**
 * Search result presentation shared by the search tool and the CLI
 *
 * @module tools/results
 */

import type { ScoredDocument, SearchResponse } from '../models/search.js';
import { snippet } from '../models/document.js';
import type { DatabaseService } from '../services/storage/database/service.js';

export interface SearchResultItem {
  rank: number;
  doc_id: string;
  score: number;
  raw_scores: Readonly<Record<string, number>>;
  title: string | null;
  snippet: string | null;
}

/**
 * Attach titles and body snippets to ranked results. A doc_id with no stored
 * document keeps null fields.
 */
export function presentResults(db: DatabaseService, results: readonly ScoredDocument[]): SearchResultItem[] {
  const docs = db.getDocuments(results.map((r) => r.doc_id));
  return results.map((result, index) => {
    const doc = docs.get(result.doc_id);
    return {
      rank: index + 1,
      doc_id: result.doc_id,
      score: result.score,
      raw_scores: result.raw_scores,
      title: doc ? doc.title : null,
      snippet: doc ? snippet(doc.body) : null,
    };
  });
}

export function presentResponse(
  db: DatabaseService,
  response: SearchResponse
): Omit<SearchResponse, 'results'> & { results: SearchResultItem[] } {
  return { ...response, results: presentResults(db, response.results) };
}
