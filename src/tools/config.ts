/**
 * Configuration MCP Tools
 *
 * Tools: search_config_get
 *
 * The configuration is loaded once at start-up and is read-only here.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { getConfig, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import type { SearchConfig } from '../services/search/config.js';
import { validateInput, ConfigGetInput, type ConfigKey } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

/**
 * Config keys as exposed to clients
 */
export function configValues(config: SearchConfig): Record<ConfigKey, unknown> {
  return {
    storage_path: config.storagePath,
    database: config.database,
    blend: config.fusion.strategy,
    weights: config.fusion.weights,
    rrf_k: config.fusion.rrf_k,
    candidate_pool: config.candidatePool,
    top_n: config.topN,
    field_weights: config.fieldWeights,
    embedding_dimensions: config.embedding.dimensions,
    source_timeout_ms: config.sourceTimeoutMs,
    rerank: config.rerank,
  };
}

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const values = configValues(getConfig());

    if (input.key) {
      return formatResponse(successResult({ key: input.key, value: values[input.key] }));
    }

    return formatResponse(
      successResult({
        ...values,
        current_database: state.currentDatabaseName,
        hash_algorithm: 'sha256',
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Config tools collection for MCP server registration
 */
export const configTools: Record<string, ToolDefinition> = {
  search_config_get: {
    description: 'Get the loaded search configuration',
    inputSchema: {
      key: z
        .enum([
          'storage_path',
          'database',
          'blend',
          'weights',
          'rrf_k',
          'candidate_pool',
          'top_n',
          'field_weights',
          'embedding_dimensions',
          'source_timeout_ms',
          'rerank',
        ])
        .optional()
        .describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
};
