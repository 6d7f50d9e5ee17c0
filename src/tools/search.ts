/**
 * Search MCP Tools
 *
 * Tools: search_query
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/search
 */

import { z } from 'zod';
import { getConfig, requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import { configForRequest, createHybridSearch, type HybridSearchOptions } from '../services/search/hybrid.js';
import { validateInput, SearchQueryInput } from '../utils/validation.js';
import { presentResponse } from './results.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

/**
 * Build the search_query handler. The cross-encoder can be injected; by
 * default reranking calls Gemini.
 */
export function createSearchQueryHandler(
  rerankOptions: Omit<HybridSearchOptions, 'rerank'> = {}
): (params: Record<string, unknown>) => Promise<ToolResponse> {
  return async (params) => {
    try {
      const input = validateInput(SearchQueryInput, params);
      const services = requireDatabase();
      const config = configForRequest(getConfig(), input);

      const pipeline = createHybridSearch(services, config, rerankOptions);
      const response = await pipeline(input.query);

      return formatResponse(successResult(presentResponse(services.db, response)));
    } catch (error) {
      return handleError(error);
    }
  };
}

export const handleSearchQuery = createSearchQueryHandler();

/**
 * Search tools collection for MCP server registration
 */
export const searchTools: Record<string, ToolDefinition> = {
  search_query: {
    description:
      'Hybrid search over the selected database: BM25 and vector retrieval fused by weighted sum or reciprocal rank fusion, optionally reranked',
    inputSchema: {
      query: z.string().min(1).max(1000).describe('Search query'),
      blend: z.enum(['weighted', 'rrf']).optional().describe('Fusion strategy (default from config)'),
      top_n: z.number().int().min(1).max(100).optional().describe('Number of results'),
      candidate_pool: z.number().int().min(1).max(1000).optional().describe('Per-source candidates (k)'),
      rerank: z.boolean().optional().describe('Rerank the fused candidates with a cross-encoder'),
      lexical_weight: z.number().min(0).max(10).optional().describe('Weight of the lexical source (weighted blend)'),
      vector_weight: z.number().min(0).max(10).optional().describe('Weight of the vector source (weighted blend)'),
      rrf_k: z.number().int().min(1).max(1000).optional().describe('RRF constant k'),
    },
    handler: handleSearchQuery,
  },
};
