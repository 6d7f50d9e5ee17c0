/**
 * Score normalization.
 * Makes scores from different sources comparable before weighted fusion.
 *
 * @module services/search/normalizer
 */

import type { RankedList, ScoredDocument } from '../../models/search.js';
import { assertFiniteScore } from './errors.js';
import { sortScored } from './ranked-list.js';

/**
 * Score given to every entry of a list that cannot discriminate between its
 * documents (empty, single entry, or all raw scores equal).
 *
 * Uniform-winner policy: a source with no spread keeps full influence in the
 * blend instead of collapsing to 0. The complementary policy lives in fusion:
 * a document a source did not return at all scores 0 for that source.
 */
export const DEGENERATE_NORMALIZED_SCORE = 1.0;

/**
 * Normalize scores to [0, 1] using min-max scaling.
 *
 * @param list - One source's ranked list
 * @returns A new list with rescaled scores; raw_scores are carried over unchanged
 *
 * @example
 * // BM25 scores 12.0, 6.0, 3.0 → 1.0, 0.333..., 0.0
 */
export function normalize(list: RankedList): RankedList {
  const { source, documents } = list;
  if (documents.length === 0) return list;

  let min = Infinity;
  let max = -Infinity;
  for (const doc of documents) {
    assertFiniteScore(doc.score, { source, doc_id: doc.doc_id });
    if (doc.score < min) min = doc.score;
    if (doc.score > max) max = doc.score;
  }

  const rescaled: ScoredDocument[] = documents.map((doc) =>
    Object.freeze({
      doc_id: doc.doc_id,
      score: max === min ? DEGENERATE_NORMALIZED_SCORE : rescale(doc.score, min, max),
      raw_scores: doc.raw_scores,
    })
  );

  return Object.freeze({ source, documents: sortScored(rescaled) });
}

/**
 * (score - min) / (max - min), clamped to [0, 1].
 * A spread wider than Number.MAX_VALUE overflows to Infinity, so that case
 * works on halved values; halving is exact for normal floats.
 */
function rescale(score: number, min: number, max: number): number {
  const range = max - min;
  const value = Number.isFinite(range) ? (score - min) / range : (score / 2 - min / 2) / (max / 2 - min / 2);
  return Math.min(1, Math.max(0, value));
}
