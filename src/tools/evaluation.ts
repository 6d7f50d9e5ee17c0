/**
 * Retrieval Evaluation MCP Tools
 *
 * Tools: search_evaluate
 *
 * Replays labeled queries (JSONL) against the selected database and reports
 * MRR@n and Recall@n, optionally for several pipeline variants side by side.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/evaluation
 */

import { z } from 'zod';
import { getConfig, requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import { loadJudgments, evaluateVariants } from '../services/search/evaluator.js';
import {
  configForRequest,
  createEvaluationVariants,
  type HybridSearchOptions,
} from '../services/search/hybrid.js';
import { validateInput, EvaluateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

/**
 * Build the search_evaluate handler. The cross-encoder can be injected; by
 * default reranking calls Gemini.
 */
export function createEvaluateHandler(
  rerankOptions: Omit<HybridSearchOptions, 'rerank'> = {}
): (params: Record<string, unknown>) => Promise<ToolResponse> {
  return async (params) => {
    try {
      const input = validateInput(EvaluateInput, params);
      const services = requireDatabase();
      const config = configForRequest(getConfig(), input);

      const judgments = await loadJudgments(input.queries_path);
      const variants = createEvaluationVariants(services, config, { ...rerankOptions, compare: input.compare });
      const results = await evaluateVariants(judgments, variants, config.topN, { concurrency: input.concurrency });

      console.error(
        `[INFO] Evaluated ${judgments.length} judgment(s) across ${Object.keys(results).length} variant(s) at n=${config.topN}`
      );
      return formatResponse(
        successResult({
          queries_path: input.queries_path,
          n: config.topN,
          judgments: judgments.length,
          variants: results,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  };
}

export const handleEvaluate = createEvaluateHandler();

/**
 * Evaluation tools collection for MCP server registration
 */
export const evaluationTools: Record<string, ToolDefinition> = {
  search_evaluate: {
    description:
      'Evaluate retrieval quality (MRR@n, Recall@n) on a JSONL file of {query, relevant} judgments against the selected database',
    inputSchema: {
      queries_path: z.string().min(1).describe('Path to the labeled queries JSONL file'),
      blend: z.enum(['weighted', 'rrf']).optional().describe('Fusion strategy (ignored with compare)'),
      top_n: z.number().int().min(1).max(100).optional().describe('Cutoff n for MRR@n and Recall@n'),
      candidate_pool: z.number().int().min(1).max(1000).optional().describe('Per-source candidates (k)'),
      rerank: z.boolean().optional().describe('Rerank with a cross-encoder'),
      compare: z.boolean().default(false).describe('Evaluate weighted and rrf side by side'),
      concurrency: z.number().int().min(1).max(16).default(1).describe('Queries evaluated in parallel'),
    },
    handler: handleEvaluate,
  },
};
