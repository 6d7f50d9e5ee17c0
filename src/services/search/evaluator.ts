/**
 * Retrieval Evaluator
 *
 * Replays a search pipeline over labeled queries and reports MRR@n and
 * Recall@n per query and in aggregate.
 *
 * Flags and aggregate membership:
 * - empty_relevant_set: recall is null and left out of recall_at_n; the
 *   query's reciprocal rank (always 0) still counts toward mrr_at_n
 * - malformed_judgment: left out of both aggregates
 * - pipeline_error: left out of both aggregates; the batch continues
 *
 * An aggregate with no contributing query is 0, with its count at 0.
 *
 * @module services/search/evaluator
 */

import type {
  EvalAggregate,
  EvalFlag,
  EvalResult,
  JudgmentRecord,
  MalformedJudgment,
  QueryEvaluation,
  RelevanceJudgment,
  ScoredDocument,
} from '../../models/search.js';
import { isMalformedJudgment } from '../../models/search.js';
import { ConfigurationError, EvaluationInputError } from './errors.js';
import { mapInBatches } from '../../utils/batches.js';
import { readJsonl, isJsonlError } from '../../utils/files.js';
import { JudgmentLine, formatZodError } from '../../utils/validation.js';

/** Anything that turns a query into a ranked list of documents */
export type SearchFn = (query: string) => Promise<readonly ScoredDocument[]>;

export interface EvaluateOptions {
  /** Judgments evaluated in parallel (default 1). Output order is unaffected. */
  concurrency?: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// METRICS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * 1/position of the first relevant doc_id, 0 when none is relevant
 */
export function reciprocalRank(retrieved: readonly string[], relevant: ReadonlySet<string>): number {
  const index = retrieved.findIndex((docId) => relevant.has(docId));
  return index === -1 ? 0 : 1 / (index + 1);
}

/**
 * |relevant ∩ retrieved| / |relevant|, null for an empty relevant set
 */
export function recallAt(retrieved: readonly string[], relevant: ReadonlySet<string>): number | null {
  if (relevant.size === 0) return null;
  const hits = new Set(retrieved.filter((docId) => relevant.has(docId)));
  return hits.size / relevant.size;
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

const EXCLUDED_FROM_AGGREGATES: readonly EvalFlag[] = ['malformed_judgment', 'pipeline_error'];

export function aggregate(perQuery: readonly QueryEvaluation[], n: number): EvalAggregate {
  const counted = perQuery.filter((q) => !q.flags.some((flag) => EXCLUDED_FROM_AGGREGATES.includes(flag)));
  const recalls = counted.flatMap((q) => (q.recall === null ? [] : [q.recall]));

  return {
    mrr_at_n: mean(counted.map((q) => q.mrr)),
    recall_at_n: mean(recalls),
    n,
    mrr_queries: counted.length,
    recall_queries: recalls.length,
    flagged_queries: perQuery.filter((q) => q.flags.length > 0).length,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════════════════════

function evaluateMalformed(record: MalformedJudgment): QueryEvaluation {
  return {
    query: record.query ?? `<line ${record.line}>`,
    mrr: 0,
    recall: null,
    retrieved: [],
    flags: ['malformed_judgment'],
    error: record.reason,
  };
}

async function evaluateOne(judgment: RelevanceJudgment, pipeline: SearchFn, n: number): Promise<QueryEvaluation> {
  let results: readonly ScoredDocument[];
  try {
    results = await pipeline(judgment.query);
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[WARN] Evaluation query failed: "${judgment.query}": ${message}`);
    return { query: judgment.query, mrr: 0, recall: null, retrieved: [], flags: ['pipeline_error'], error: message };
  }

  const retrieved = results.slice(0, n).map((doc) => doc.doc_id);
  const recall = recallAt(retrieved, judgment.relevant_doc_ids);
  return {
    query: judgment.query,
    mrr: reciprocalRank(retrieved, judgment.relevant_doc_ids),
    recall,
    retrieved,
    flags: recall === null ? ['empty_relevant_set'] : [],
  };
}

/**
 * Run every judgment through `pipeline` and score its top-n.
 *
 * @throws ConfigurationError for a non-positive n, or when the pipeline reports one
 */
export async function evaluate(
  judgments: readonly JudgmentRecord[],
  pipeline: SearchFn,
  n: number,
  options: EvaluateOptions = {}
): Promise<EvalResult> {
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigurationError(`n must be a positive integer, got ${n}`, { n });
  }

  const perQuery = await mapInBatches(judgments, options.concurrency ?? 1, async (record) =>
    isMalformedJudgment(record) ? evaluateMalformed(record) : evaluateOne(record, pipeline, n)
  );

  return { per_query: perQuery, aggregate: aggregate(perQuery, n) };
}

/**
 * Evaluate the same judgments against several named pipelines
 * (e.g. weighted vs rrf, rerank on vs off). Variants run one after another.
 */
export async function evaluateVariants(
  judgments: readonly JudgmentRecord[],
  variants: Readonly<Record<string, SearchFn>>,
  n: number,
  options: EvaluateOptions = {}
): Promise<Record<string, EvalResult>> {
  const results: Record<string, EvalResult> = {};
  for (const [name, pipeline] of Object.entries(variants)) {
    results[name] = await evaluate(judgments, pipeline, n, options);
  }
  return results;
}

// ═══════════════════════════════════════════════════════════════════════════════
// JUDGMENT LOADING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Turn one parsed JSONL value into a judgment.
 * Accepts `relevant` or `relevant_doc_ids`; both are merged when present.
 *
 * @throws EvaluationInputError when the record does not match the judgment shape
 */
export function parseJudgment(value: unknown, line: number): RelevanceJudgment {
  const result = JudgmentLine.safeParse(value);
  if (!result.success) {
    throw new EvaluationInputError(formatZodError(result.error), line);
  }
  const { query, relevant, relevant_doc_ids } = result.data;
  const ids = [...(relevant ?? []), ...(relevant_doc_ids ?? [])].map((id) => String(id));
  return { query, relevant_doc_ids: new Set(ids) };
}

function queryOf(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'query' in value && typeof value.query === 'string') {
    const query = value.query.trim();
    return query.length > 0 ? query : undefined;
  }
  return undefined;
}

/**
 * Load a JSONL judgment file. Bad lines become malformed records in place so
 * the evaluator can flag them without aborting the run.
 *
 * @throws PathNotFoundError if the file cannot be read
 */
export async function loadJudgments(filePath: string): Promise<JudgmentRecord[]> {
  const entries = await readJsonl(filePath);
  return entries.map((entry): JudgmentRecord => {
    if (isJsonlError(entry)) {
      return { malformed: true, line: entry.line, reason: `Invalid JSON: ${entry.error}` };
    }
    try {
      return parseJudgment(entry.value, entry.line);
    } catch (error) {
      if (!(error instanceof EvaluationInputError)) throw error;
      const query = queryOf(entry.value);
      return query === undefined
        ? { malformed: true, line: entry.line, reason: error.message }
        : { malformed: true, line: entry.line, reason: error.message, query };
    }
  });
}
