/**
 * Hybrid search wiring
 *
 * Builds a search pipeline over an opened corpus database from a loaded
 * SearchConfig. Shared by the CLI and the MCP tools.
 *
 * @module services/search/hybrid
 */

import type { SourceName } from '../../models/search.js';
import { FUSION_STRATEGIES, LEXICAL_SOURCE, VECTOR_SOURCE } from '../../models/search.js';
import type { DatabaseService } from '../storage/database/service.js';
import { GeminiClient } from '../gemini/client.js';
import type { BlendMode } from '../../utils/validation.js';
import type { CrossEncoder, Embedder, LexicalSource, VectorSource } from './sources.js';
import type { SearchConfig, SearchConfigLayer } from './config.js';
import { strategyFromBlend, withOverrides } from './config.js';
import { createDocumentTextResolver } from './bm25.js';
import { GeminiCrossEncoder } from './reranker.js';
import { asSearchFn, createSearchPipeline, pipelineOptionsFromConfig, type SearchPipeline } from './pipeline.js';
import type { SearchFn } from './evaluator.js';

export interface HybridSearchServices {
  db: DatabaseService;
  lexical: LexicalSource;
  vector: VectorSource;
  embedder: Embedder;
}

export interface HybridSearchOptions {
  /** Defaults to config.rerank.enabled */
  rerank?: boolean;
  /** Defaults to Gemini with config.rerank.model */
  crossEncoder?: CrossEncoder;
}

/** Per-request search knobs as spelled by the CLI and the tools */
export interface SearchOverrides {
  blend?: BlendMode;
  top_n?: number;
  candidate_pool?: number;
  lexical_weight?: number;
  vector_weight?: number;
  rrf_k?: number;
  rerank?: boolean;
}

/**
 * Turn request knobs into a config layer
 */
export function overridesLayer(overrides: SearchOverrides): SearchConfigLayer {
  const weights: Record<SourceName, number> = {};
  if (overrides.lexical_weight !== undefined) weights[LEXICAL_SOURCE] = overrides.lexical_weight;
  if (overrides.vector_weight !== undefined) weights[VECTOR_SOURCE] = overrides.vector_weight;

  return {
    fusion: {
      strategy: overrides.blend === undefined ? undefined : strategyFromBlend(overrides.blend),
      weights,
      rrf_k: overrides.rrf_k,
    },
    topN: overrides.top_n,
    candidatePool: overrides.candidate_pool,
    rerank: { enabled: overrides.rerank },
  };
}

/**
 * Apply request knobs to a loaded config
 * @throws ConfigurationError if the result is invalid
 */
export function configForRequest(config: SearchConfig, overrides: SearchOverrides): SearchConfig {
  return withOverrides(config, overridesLayer(overrides));
}

/**
 * Build the retrieve -> fuse -> rerank pipeline over a corpus database
 *
 * @throws ConfigurationError for an invalid config, or when rerank is on and
 *         GEMINI_API_KEY is missing
 */
export function createHybridSearch(
  services: HybridSearchServices,
  config: SearchConfig,
  options: HybridSearchOptions = {}
): SearchPipeline {
  const rerankEnabled = options.rerank ?? config.rerank.enabled;

  let rerank: Parameters<typeof pipelineOptionsFromConfig>[1];
  if (rerankEnabled) {
    const crossEncoder = options.crossEncoder ?? new GeminiCrossEncoder(new GeminiClient({ model: config.rerank.model }));
    rerank = {
      scoreFn: (query, docText) => crossEncoder.score(query, docText),
      resolveText: createDocumentTextResolver(services.db),
    };
  }

  return createSearchPipeline(
    { lexical: services.lexical, vector: services.vector, embedder: services.embedder },
    pipelineOptionsFromConfig(config, rerank)
  );
}

export interface EvaluationVariantOptions extends HybridSearchOptions {
  /** Run weighted and rrf side by side instead of the configured strategy alone */
  compare?: boolean;
}

/**
 * Named pipelines for an evaluation run: the configured pipeline alone, or
 * with `compare` one variant per fusion strategy plus a reranked twin of
 * each when rerank is on.
 */
export function createEvaluationVariants(
  services: HybridSearchServices,
  config: SearchConfig,
  options: EvaluationVariantOptions = {}
): Record<string, SearchFn> {
  const { compare = false, ...searchOptions } = options;
  const rerank = searchOptions.rerank ?? config.rerank.enabled;
  const suffix = rerank ? '+rerank' : '';

  if (!compare) {
    return { [`${config.fusion.strategy}${suffix}`]: asSearchFn(createHybridSearch(services, config, searchOptions)) };
  }

  const variants: Record<string, SearchFn> = {};
  for (const strategy of FUSION_STRATEGIES) {
    const variantConfig = withOverrides(config, { fusion: { strategy } });
    variants[strategy] = asSearchFn(createHybridSearch(services, variantConfig, { ...searchOptions, rerank: false }));
    if (rerank) {
      variants[`${strategy}${suffix}`] = asSearchFn(
        createHybridSearch(services, variantConfig, { ...searchOptions, rerank: true })
      );
    }
  }
  return variants;
}
