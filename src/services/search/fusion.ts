/**
 * Fusion Engine for Hybrid Search
 *
 * Merges per-source ranked lists into one list with one of two strategies:
 * - weighted_sum: final = sum(weight[s] * normalized_score[s])
 * - rrf:          final = sum(1 / (k + rank[s])), rank is 1-based position
 *
 * Both strategies share one fold: each source's list is folded in turn into a
 * doc_id -> accumulator map, in sorted source-name order so floating-point
 * sums are reproducible. A document a source did not return simply receives no
 * contribution from it, which is the missing-score-is-0 policy. The normalizer
 * applies the complementary uniform-winner policy to degenerate lists.
 *
 * @module services/search/fusion
 */

import type { FusionConfig, RankedList, ScoredDocument, SourceName } from '../../models/search.js';
import { ConfigurationError, ScoringError, assertFiniteScore } from './errors.js';
import { createFusionConfig } from './config.js';
import { normalize } from './normalizer.js';
import { compareScored, sortScored } from './ranked-list.js';

/** Per-document accumulator used during the fold */
interface FusedEntry {
  score: number;
  raw_scores: Record<SourceName, number>;
}

/** Contribution of one document at 1-based `rank` within one source */
type Contribution = (doc: ScoredDocument, rank: number, source: SourceName) => number;

class FusionBuilder {
  private readonly entries = new Map<string, FusedEntry>();

  /**
   * @throws ScoringError if the list repeats a doc_id or is not in ranked order
   */
  fold(list: RankedList, contribution: Contribution): void {
    const seen = new Set<string>();
    list.documents.forEach((doc, index) => {
      if (seen.has(doc.doc_id)) {
        throw new ScoringError(`Ranked list for source "${list.source}" repeats doc_id "${doc.doc_id}"`, {
          source: list.source,
          doc_id: doc.doc_id,
        });
      }
      seen.add(doc.doc_id);
      const previous = index > 0 ? list.documents[index - 1] : undefined;
      if (previous && compareScored(previous, doc) > 0) {
        throw new ScoringError(`Ranked list for source "${list.source}" is out of order at doc_id "${doc.doc_id}"`, {
          source: list.source,
          doc_id: doc.doc_id,
          rank: index + 1,
        });
      }

      const added = contribution(doc, index + 1, list.source);
      const existing = this.entries.get(doc.doc_id);
      const raw = doc.raw_scores[list.source] ?? doc.score;

      if (existing) {
        existing.score += added;
        existing.raw_scores[list.source] = raw;
      } else {
        this.entries.set(doc.doc_id, { score: added, raw_scores: { [list.source]: raw } });
      }
    });
  }

  build(): readonly ScoredDocument[] {
    const documents: ScoredDocument[] = [];
    for (const [doc_id, entry] of this.entries) {
      assertFiniteScore(entry.score, { doc_id, stage: 'fusion' });
      documents.push(Object.freeze({ doc_id, score: entry.score, raw_scores: Object.freeze(entry.raw_scores) }));
    }
    return sortScored(documents);
  }
}

/**
 * Reciprocal Rank Fusion contribution: 1 / (k + rank)
 */
export function rrfContribution(k: number, rank: number): number {
  return 1 / (k + rank);
}

/**
 * Fuse per-source ranked lists into one list.
 *
 * @param lists - Ranked lists keyed by source name
 * @param config - Validated again here; an invalid config throws ConfigurationError
 * @returns Documents strictly ordered by score descending, doc_id ascending on ties.
 *          Every doc_id of every input list appears exactly once.
 */
export function fuse(lists: Readonly<Record<SourceName, RankedList>>, config: FusionConfig): readonly ScoredDocument[] {
  const validated = createFusionConfig(config);
  const sources = Object.keys(lists).sort();
  const builder = new FusionBuilder();

  if (validated.strategy === 'weighted_sum') {
    for (const source of sources) {
      const weight = validated.weights[source];
      if (weight === undefined) {
        throw new ConfigurationError(`No weight configured for source "${source}"`, {
          source,
          configured: Object.keys(validated.weights),
        });
      }
      builder.fold(normalize(listFor(lists, source)), (doc) => weight * doc.score);
    }
  } else {
    const k = validated.rrf_k;
    for (const source of sources) {
      builder.fold(listFor(lists, source), (_doc, rank) => rrfContribution(k, rank));
    }
  }

  return builder.build();
}

function listFor(lists: Readonly<Record<SourceName, RankedList>>, source: SourceName): RankedList {
  const list = lists[source];
  if (list === undefined) {
    throw new ConfigurationError(`Missing ranked list for source "${source}"`, { source });
  }
  if (list.source !== source) {
    throw new ConfigurationError(`Ranked list keyed "${source}" belongs to source "${list.source}"`, {
      source,
      list_source: list.source,
    });
  }
  return list;
}
