/**
 * Search configuration
 *
 * One SearchConfig is loaded at start-up from four layers, later layers
 * winning: built-in defaults, an optional JSON file, HYBRID_SEARCH_* environment
 * variables, then explicit overrides (CLI flags or tool arguments). The result
 * is validated once, deep-frozen and passed explicitly to everything that
 * needs it.
 *
 * @module services/search/config
 */

import * as fs from 'fs';
import { z } from 'zod';
import { FUSION_STRATEGIES, DEFAULT_RRF_K, LEXICAL_SOURCE, VECTOR_SOURCE } from '../../models/search.js';
import type { FusionConfig, FusionStrategy, SourceName } from '../../models/search.js';
import type { LexicalField } from '../../models/document.js';
import { DEFAULT_STORAGE_PATH } from '../storage/database/helpers.js';
import { DEFAULT_GEMINI_MODEL } from '../gemini/config.js';
import { DEFAULT_EMBEDDING_DIM } from '../embedding/hashing.js';
import { DatabaseName, formatZodError } from '../../utils/validation.js';
import type { BlendMode } from '../../utils/validation.js';
import { ConfigurationError } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// FUSION CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

const Weight = z.number().finite('weight must be finite').min(0, 'weight must be >= 0');

export const FusionConfigSchema = z.object({
  strategy: z.enum(FUSION_STRATEGIES),
  weights: z.record(Weight),
  rrf_k: z.number().int('rrf_k must be an integer').positive('rrf_k must be > 0').default(DEFAULT_RRF_K),
});

/**
 * Validate and freeze a fusion config.
 *
 * @throws ConfigurationError on unknown strategy, bad rrf_k or a negative/non-finite weight
 */
export function createFusionConfig(input: unknown): FusionConfig {
  const result = FusionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid fusion config: ${formatZodError(result.error)}`);
  }
  return deepFreeze(result.data);
}

/**
 * Map the CLI/tool spelling of a blend mode to a fusion strategy
 */
export function strategyFromBlend(blend: BlendMode): FusionStrategy {
  return blend === 'rrf' ? 'rrf' : 'weighted_sum';
}

// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export const SearchConfigSchema = z.object({
  storagePath: z.string().min(1),
  database: DatabaseName,
  fusion: FusionConfigSchema,
  /** Per-source top_k */
  candidatePool: z.number().int().min(1).max(1000),
  topN: z.number().int().min(1).max(100),
  fieldWeights: z.object({
    title: Weight,
    body: Weight,
    tags: Weight,
  }),
  embedding: z.object({
    dimensions: z.number().int().min(8).max(4096),
  }),
  sourceTimeoutMs: z.number().int().min(1).max(600_000),
  rerank: z.object({
    enabled: z.boolean(),
    candidatePool: z.number().int().min(1).max(1000),
    concurrency: z.number().int().min(1).max(32),
    model: z.string().min(1),
  }),
});

type SearchConfigShape = z.infer<typeof SearchConfigSchema>;

export interface SearchConfig {
  readonly storagePath: string;
  readonly database: string;
  readonly fusion: FusionConfig;
  readonly candidatePool: number;
  readonly topN: number;
  readonly fieldWeights: Readonly<Record<LexicalField, number>>;
  readonly embedding: { readonly dimensions: number };
  readonly sourceTimeoutMs: number;
  readonly rerank: {
    readonly enabled: boolean;
    readonly candidatePool: number;
    readonly concurrency: number;
    readonly model: string;
  };
}

/** A partial config as read from a file, the environment or overrides */
export const SearchConfigLayerSchema = SearchConfigSchema.deepPartial();
export type SearchConfigLayer = z.infer<typeof SearchConfigLayerSchema>;

export const DEFAULT_WEIGHTS: Readonly<Record<SourceName, number>> = Object.freeze({
  [LEXICAL_SOURCE]: 0.6,
  [VECTOR_SOURCE]: 0.4,
});

function defaultShape(): SearchConfigShape {
  return {
    storagePath: DEFAULT_STORAGE_PATH,
    database: 'default',
    fusion: { strategy: 'weighted_sum', weights: { ...DEFAULT_WEIGHTS }, rrf_k: DEFAULT_RRF_K },
    candidatePool: 50,
    topN: 10,
    fieldWeights: { title: 3.0, body: 1.0, tags: 2.0 },
    embedding: { dimensions: DEFAULT_EMBEDDING_DIM },
    sourceTimeoutMs: 5000,
    rerank: { enabled: false, candidatePool: 20, concurrency: 4, model: DEFAULT_GEMINI_MODEL },
  };
}

export const DEFAULT_SEARCH_CONFIG: SearchConfig = deepFreeze(defaultShape());

// ═══════════════════════════════════════════════════════════════════════════════
// LAYERS
// ═══════════════════════════════════════════════════════════════════════════════

function applyLayer(base: SearchConfigShape, layer: SearchConfigLayer): SearchConfigShape {
  const weights: Record<SourceName, number> = { ...base.fusion.weights };
  for (const [source, weight] of Object.entries(layer.fusion?.weights ?? {})) {
    weights[source] = weight;
  }
  return {
    storagePath: layer.storagePath ?? base.storagePath,
    database: layer.database ?? base.database,
    fusion: {
      strategy: layer.fusion?.strategy ?? base.fusion.strategy,
      weights,
      rrf_k: layer.fusion?.rrf_k ?? base.fusion.rrf_k,
    },
    candidatePool: layer.candidatePool ?? base.candidatePool,
    topN: layer.topN ?? base.topN,
    fieldWeights: {
      title: layer.fieldWeights?.title ?? base.fieldWeights.title,
      body: layer.fieldWeights?.body ?? base.fieldWeights.body,
      tags: layer.fieldWeights?.tags ?? base.fieldWeights.tags,
    },
    embedding: {
      dimensions: layer.embedding?.dimensions ?? base.embedding.dimensions,
    },
    sourceTimeoutMs: layer.sourceTimeoutMs ?? base.sourceTimeoutMs,
    rerank: {
      enabled: layer.rerank?.enabled ?? base.rerank.enabled,
      candidatePool: layer.rerank?.candidatePool ?? base.rerank.candidatePool,
      concurrency: layer.rerank?.concurrency ?? base.rerank.concurrency,
      model: layer.rerank?.model ?? base.rerank.model,
    },
  };
}

/**
 * Read a JSON config file into a layer
 *
 * @throws ConfigurationError if the file is missing, not JSON or has invalid fields
 */
export function readConfigFile(filePath: string): SearchConfigLayer {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Config file not found: ${filePath}`, { path: filePath });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config file is not valid JSON: ${filePath}: ${message}`, { path: filePath });
  }
  const result = SearchConfigLayerSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config file ${filePath}: ${formatZodError(result.error)}`, {
      path: filePath,
    });
  }
  return result.data;
}

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${value}"`, { variable: name });
  }
  return parsed;
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = envString(env, name)?.toLowerCase();
  if (value === undefined) return undefined;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new ConfigurationError(`${name} must be true or false, got "${value}"`, { variable: name });
}

function envStrategy(env: NodeJS.ProcessEnv): FusionStrategy | undefined {
  const value = envString(env, 'HYBRID_SEARCH_BLEND');
  if (value === undefined) return undefined;
  if (value === 'weighted' || value === 'weighted_sum') return 'weighted_sum';
  if (value === 'rrf') return 'rrf';
  throw new ConfigurationError(`HYBRID_SEARCH_BLEND must be weighted or rrf, got "${value}"`, {
    variable: 'HYBRID_SEARCH_BLEND',
  });
}

/**
 * Build a layer from HYBRID_SEARCH_* and GEMINI_MODEL variables
 */
export function configLayerFromEnv(env: NodeJS.ProcessEnv): SearchConfigLayer {
  const weights: Record<SourceName, number> = {};
  const lexical = envNumber(env, 'HYBRID_SEARCH_WEIGHT_LEXICAL');
  const vector = envNumber(env, 'HYBRID_SEARCH_WEIGHT_VECTOR');
  if (lexical !== undefined) weights[LEXICAL_SOURCE] = lexical;
  if (vector !== undefined) weights[VECTOR_SOURCE] = vector;

  return {
    storagePath: envString(env, 'HYBRID_SEARCH_STORAGE_PATH'),
    database: envString(env, 'HYBRID_SEARCH_DATABASE'),
    fusion: {
      strategy: envStrategy(env),
      weights,
      rrf_k: envNumber(env, 'HYBRID_SEARCH_RRF_K'),
    },
    candidatePool: envNumber(env, 'HYBRID_SEARCH_CANDIDATE_POOL'),
    topN: envNumber(env, 'HYBRID_SEARCH_TOP_N'),
    embedding: { dimensions: envNumber(env, 'HYBRID_SEARCH_EMBEDDING_DIM') },
    sourceTimeoutMs: envNumber(env, 'HYBRID_SEARCH_SOURCE_TIMEOUT_MS'),
    rerank: {
      enabled: envBoolean(env, 'HYBRID_SEARCH_RERANK'),
      candidatePool: envNumber(env, 'HYBRID_SEARCH_RERANK_POOL'),
      concurrency: envNumber(env, 'HYBRID_SEARCH_RERANK_CONCURRENCY'),
      model: envString(env, 'GEMINI_MODEL'),
    },
  };
}

export interface LoadSearchConfigOptions {
  /** JSON file layer; HYBRID_SEARCH_CONFIG is used when omitted */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: SearchConfigLayer;
}

/**
 * Load, validate and freeze the search configuration.
 *
 * @throws ConfigurationError for any invalid layer or merged value
 */
export function loadSearchConfig(options: LoadSearchConfigOptions = {}): SearchConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? envString(env, 'HYBRID_SEARCH_CONFIG');

  let merged = defaultShape();
  if (configPath !== undefined) {
    merged = applyLayer(merged, readConfigFile(configPath));
  }
  merged = applyLayer(merged, configLayerFromEnv(env));
  if (options.overrides) {
    merged = applyLayer(merged, options.overrides);
  }

  const result = SearchConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(`Invalid search config: ${formatZodError(result.error)}`);
  }
  return deepFreeze(result.data);
}

/**
 * Apply a layer on top of an already loaded config (per-request overrides)
 */
export function withOverrides(config: SearchConfig, overrides: SearchConfigLayer): SearchConfig {
  const base: SearchConfigShape = applyLayer(defaultShape(), {
    ...config,
    fusion: { ...config.fusion, weights: { ...config.fusion.weights } },
  });
  const result = SearchConfigSchema.safeParse(applyLayer(base, overrides));
  if (!result.success) {
    throw new ConfigurationError(`Invalid search config: ${formatZodError(result.error)}`);
  }
  return deepFreeze(result.data);
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
