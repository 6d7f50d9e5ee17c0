/**
 * Pairwise Re-ranker
 *
 * Scores every fused candidate against the query with a cross-encoder and
 * reorders by that score. The reranker never adds candidates; it only
 * reorders the pool it is given. A single failed or non-finite score fails
 * the whole call, so callers never see a partially reordered list.
 *
 * The shipped cross-encoder asks Gemini (GeminiClient.fast(), JSON output) for
 * a relevance score per pair.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/search/reranker
 */

import { SchemaType, type ResponseSchema } from '@google/generative-ai';
import { z } from 'zod';

import type { ScoredDocument } from '../../models/search.js';
import type { CrossEncoder, ResolveText, ScoreFn } from './sources.js';
import { ScoringError, assertFiniteScore } from './errors.js';
import { sortScored } from './ranked-list.js';
import { mapInBatches } from '../../utils/batches.js';
import { formatZodError } from '../../utils/validation.js';

export const DEFAULT_RERANK_CONCURRENCY = 4;

/** raw_scores key under which the pre-rerank score is kept */
export const FUSED_SCORE_KEY = 'fused';

export interface RerankOptions {
  /** Max cross-encoder calls in flight (default 4) */
  concurrency?: number;
}

/**
 * Re-rank candidates with a pairwise scoring function.
 *
 * @returns Candidates with `score` replaced by the cross-encoder score, the
 *          previous score kept in raw_scores.fused, sorted with the doc_id tie-break
 * @throws ScoringError if any call fails or returns a non-finite score
 */
export async function rerank(
  query: string,
  candidates: readonly ScoredDocument[],
  scoreFn: ScoreFn,
  resolveText: ResolveText,
  options: RerankOptions = {}
): Promise<readonly ScoredDocument[]> {
  if (candidates.length === 0) return Object.freeze([]);

  const concurrency = options.concurrency ?? DEFAULT_RERANK_CONCURRENCY;
  let scores: number[];
  try {
    scores = await mapInBatches(candidates, concurrency, async (doc) =>
      scoreFn(query, await resolveText(doc.doc_id))
    );
  } catch (error) {
    if (error instanceof ScoringError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new ScoringError(`Rerank failed: ${message}`, { query, candidates: candidates.length }, { cause: error });
  }

  const rescored = candidates.map((doc, i) => {
    const score = scores[i];
    assertFiniteScore(score, { doc_id: doc.doc_id, stage: 'rerank' });
    return Object.freeze({
      doc_id: doc.doc_id,
      score,
      raw_scores: Object.freeze({ ...doc.raw_scores, [FUSED_SCORE_KEY]: doc.score }),
    });
  });

  return sortScored(rescored);
}

// ═══════════════════════════════════════════════════════════════════════════════
// RERANK STAGE
// ═══════════════════════════════════════════════════════════════════════════════

export interface RerankStageResult {
  documents: readonly ScoredDocument[];
  reranked: boolean;
}

/** Last stage of the search pipeline: identity or a real rerank */
export type RerankStage = (query: string, fused: readonly ScoredDocument[]) => Promise<RerankStageResult>;

export const identityRerank: RerankStage = async (_query, fused) => ({ documents: fused, reranked: false });

/**
 * Build a stage that reranks the top `candidatePool` fused documents
 */
export function createRerankStage(
  scoreFn: ScoreFn,
  resolveText: ResolveText,
  candidatePool: number,
  concurrency: number = DEFAULT_RERANK_CONCURRENCY
): RerankStage {
  return async (query, fused) => ({
    documents: await rerank(query, fused.slice(0, candidatePool), scoreFn, resolveText, { concurrency }),
    reranked: true,
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// GEMINI CROSS-ENCODER
// ═══════════════════════════════════════════════════════════════════════════════

/** Document text beyond this many characters is cut from the prompt */
export const MAX_PROMPT_DOC_CHARS = 2000;

const RELEVANCE_SCHEMA: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    relevance_score: { type: SchemaType.NUMBER },
  },
  required: ['relevance_score'],
};

const RelevanceResponse = z.object({
  relevance_score: z.number().min(0).max(1),
});

/** The part of GeminiClient the cross-encoder needs */
export interface JsonGenerator {
  fast(prompt: string, schema?: ResponseSchema): Promise<{ text: string }>;
}

/**
 * Build the pair-scoring prompt (exported for testing without API calls).
 */
export function buildRerankPrompt(query: string, docText: string): string {
  return `You are a search relevance judge. Given a search query and one document, rate how well the document answers the query.

Query: "${query}"

Document:
${docText.slice(0, MAX_PROMPT_DOC_CHARS)}

Return a JSON object with "relevance_score": a number from 0 (irrelevant) to 1 (exactly what the query asks for).`;
}

/**
 * Parse a model reply into a relevance score
 *
 * @throws ScoringError if the reply is not JSON or the score is missing or out of [0, 1]
 */
export function parseRelevanceResponse(text: string): number {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ScoringError('Cross-encoder returned non-JSON output', { output: text.slice(0, 200) });
  }
  const result = RelevanceResponse.safeParse(raw);
  if (!result.success) {
    throw new ScoringError(`Cross-encoder returned an invalid score: ${formatZodError(result.error)}`, {
      output: text.slice(0, 200),
    });
  }
  return result.data.relevance_score;
}

export class GeminiCrossEncoder implements CrossEncoder {
  constructor(private readonly client: JsonGenerator) {}

  async score(query: string, docText: string): Promise<number> {
    const response = await this.client.fast(buildRerankPrompt(query, docText), RELEVANCE_SCHEMA);
    return parseRelevanceResponse(response.text);
  }

  /** Bound scoring function for rerank() */
  asScoreFn(): ScoreFn {
    return (query, docText) => this.score(query, docText);
  }
}
