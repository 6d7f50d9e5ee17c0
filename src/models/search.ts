/**
 * Search data model
 *
 * Per-query value types shared by the normalizer, fusion engine, reranker,
 * evaluator and pipeline. Instances are built fresh for every query and are
 * never mutated once sorted.
 *
 * @module models/search
 */

/** Name of a retrieval source (e.g. "lexical", "vector"). Opaque string. */
export type SourceName = string;

export const LEXICAL_SOURCE: SourceName = 'lexical';
export const VECTOR_SOURCE: SourceName = 'vector';

/**
 * One document's score as produced by a source, a fusion pass or a rerank.
 * `doc_id` is the join key across sources and is only ever compared by
 * code-unit order.
 */
export interface ScoredDocument {
  readonly doc_id: string;
  readonly score: number;
  readonly raw_scores: Readonly<Record<SourceName, number>>;
}

/**
 * Ordered output of exactly one source: descending score, `doc_id`
 * ascending on ties, each `doc_id` at most once.
 */
export interface RankedList {
  readonly source: SourceName;
  readonly documents: readonly ScoredDocument[];
}

export const FUSION_STRATEGIES = ['weighted_sum', 'rrf'] as const;
export type FusionStrategy = (typeof FUSION_STRATEGIES)[number];

export const DEFAULT_RRF_K = 60;

/**
 * Blend configuration. Weights are relative and need not sum to 1.
 * Loaded once and shared read-only across concurrent queries.
 */
export interface FusionConfig {
  readonly strategy: FusionStrategy;
  readonly weights: Readonly<Record<SourceName, number>>;
  readonly rrf_k: number;
}

export interface RelevanceJudgment {
  readonly query: string;
  readonly relevant_doc_ids: ReadonlySet<string>;
}

/** A judgment line that could not be parsed. Kept so it can be flagged in place. */
export interface MalformedJudgment {
  readonly malformed: true;
  readonly line: number;
  readonly reason: string;
  /** Query text when the record carried a usable one */
  readonly query?: string;
}

export type JudgmentRecord = RelevanceJudgment | MalformedJudgment;

export type EvalFlag = 'empty_relevant_set' | 'malformed_judgment' | 'pipeline_error';

export interface QueryEvaluation {
  query: string;
  /** Reciprocal rank of the first relevant document in the top-n (0 if none) */
  mrr: number;
  /** null when the query is excluded from the recall aggregate */
  recall: number | null;
  /** doc_ids of the top-n results, in rank order */
  retrieved: string[];
  flags: EvalFlag[];
  error?: string;
}

export interface EvalAggregate {
  mrr_at_n: number;
  recall_at_n: number;
  n: number;
  /** Queries that contributed to mrr_at_n */
  mrr_queries: number;
  /** Queries that contributed to recall_at_n */
  recall_queries: number;
  flagged_queries: number;
}

export interface EvalResult {
  per_query: QueryEvaluation[];
  aggregate: EvalAggregate;
}

/** A retrieval source that was replaced by an empty list for this query */
export interface SourceFailure {
  source: SourceName;
  reason: string;
  timed_out: boolean;
}

export interface SearchResponse {
  query: string;
  strategy: FusionStrategy;
  results: ScoredDocument[];
  reranked: boolean;
  degraded_sources: SourceFailure[];
}

export function isMalformedJudgment(record: JudgmentRecord): record is MalformedJudgment {
  return 'malformed' in record && record.malformed;
}
