/**
 * RankedList construction and ordering
 *
 * Every list that leaves a source, the normalizer or the fusion engine is
 * sorted with compareScored: score descending, then doc_id ascending by
 * code unit. Because doc_ids are unique within a list this is a total order.
 *
 * @module services/search/ranked-list
 */

import type { RankedList, ScoredDocument, SourceName } from '../../models/search.js';
import { ScoringError, assertFiniteScore } from './errors.js';

/** A raw hit as returned by a lexical or vector backend */
export interface SourceHit {
  doc_id: string;
  score: number;
}

/**
 * Comparator for descending score with doc_id tie-break.
 * Plain `<` comparison keeps the order independent of locale.
 */
export function compareScored(a: ScoredDocument, b: ScoredDocument): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.doc_id < b.doc_id) return -1;
  if (a.doc_id > b.doc_id) return 1;
  return 0;
}

/**
 * Return a sorted, frozen copy
 */
export function sortScored(documents: readonly ScoredDocument[]): readonly ScoredDocument[] {
  return Object.freeze([...documents].sort(compareScored));
}

/**
 * Build a RankedList from a source's raw hits.
 *
 * FAIL FAST: non-finite scores and duplicate doc_ids throw ScoringError.
 * The source's raw score is recorded under raw_scores[source].
 */
export function buildRankedList(source: SourceName, hits: readonly SourceHit[]): RankedList {
  const seen = new Set<string>();
  const documents: ScoredDocument[] = [];

  for (const hit of hits) {
    assertFiniteScore(hit.score, { source, doc_id: hit.doc_id });
    if (seen.has(hit.doc_id)) {
      throw new ScoringError(`Source "${source}" returned doc_id "${hit.doc_id}" more than once`, {
        source,
        doc_id: hit.doc_id,
      });
    }
    seen.add(hit.doc_id);
    documents.push(
      Object.freeze({
        doc_id: hit.doc_id,
        score: hit.score,
        raw_scores: Object.freeze({ [source]: hit.score }),
      })
    );
  }

  return Object.freeze({ source, documents: sortScored(documents) });
}

/**
 * The explicit empty list handed to fusion when a source produced nothing
 * or was unavailable.
 */
export function emptyRankedList(source: SourceName): RankedList {
  return Object.freeze({ source, documents: Object.freeze([]) });
}
