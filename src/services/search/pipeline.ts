/**
 * Hybrid Search Pipeline
 *
 * retrieve -> fuse -> rerank -> top_n
 *
 * Lexical and vector retrieval are started together, each bounded by the
 * source timeout. The SQLite sources are synchronous and so still run one
 * after the other; an overrun is detected when they return. A source that
 * fails or times out is replaced by an explicit empty
 * list, logged with [WARN] and reported in degraded_sources; the query still
 * answers from the remaining source. ScoringError and ConfigurationError are
 * never degraded: they abort the request.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/search/pipeline
 */

import type {
  FusionConfig,
  RankedList,
  ScoredDocument,
  SearchResponse,
  SourceFailure,
  SourceName,
} from '../../models/search.js';
import { LEXICAL_SOURCE, VECTOR_SOURCE } from '../../models/search.js';
import type { Embedder, LexicalSource, ResolveText, ScoreFn, VectorSource } from './sources.js';
import type { SearchConfig } from './config.js';
import { createFusionConfig } from './config.js';
import { ConfigurationError, ScoringError, SourceUnavailableError } from './errors.js';
import { fuse } from './fusion.js';
import { emptyRankedList } from './ranked-list.js';
import { createRerankStage, identityRerank, type RerankStage } from './reranker.js';
import type { SearchFn } from './evaluator.js';
import { ValidationError } from '../../utils/validation.js';

export interface SearchSources {
  lexical: LexicalSource;
  vector: VectorSource;
  embedder: Embedder;
}

export interface RerankSettings {
  scoreFn: ScoreFn;
  resolveText: ResolveText;
  /** Fused documents handed to the cross-encoder; must be >= topN */
  candidatePool: number;
  concurrency?: number;
}

export interface SearchPipelineOptions {
  fusion: FusionConfig;
  /** Per-source top_k */
  candidatePool: number;
  topN: number;
  fieldWeights: Readonly<Record<string, number>>;
  sourceTimeoutMs: number;
  rerank?: RerankSettings;
}

export type SearchPipeline = (query: string) => Promise<SearchResponse>;

// ═══════════════════════════════════════════════════════════════════════════════
// RETRIEVAL
// ═══════════════════════════════════════════════════════════════════════════════

interface Retrieval {
  list: RankedList;
  failure?: SourceFailure;
}

/**
 * Race `task` against the timeout.
 *
 * A synchronous source (better-sqlite3) blocks the event loop, so the timer
 * cannot fire before it returns. The elapsed time is therefore also checked
 * once the task settles, and an overrun result is discarded.
 */
async function withTimeout<T>(source: SourceName, timeoutMs: number, task: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new SourceUnavailableError(`Source "${source}" timed out after ${timeoutMs}ms`, source, true)),
      timeoutMs
    );
  });
  let startedAt = 0;
  const run = Promise.resolve().then(() => {
    startedAt = Date.now();
    return task();
  });
  try {
    const result = await Promise.race([run, timeout]);
    const elapsed = Date.now() - startedAt;
    if (elapsed > timeoutMs) {
      throw new SourceUnavailableError(
        `Source "${source}" took ${elapsed}ms, over its ${timeoutMs}ms timeout`,
        source,
        true
      );
    }
    return result;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run one source under the timeout, degrading to an empty list on failure
 */
export async function retrieveSource(
  source: SourceName,
  timeoutMs: number,
  task: () => Promise<RankedList>
): Promise<Retrieval> {
  try {
    const list = await withTimeout(source, timeoutMs, task);
    if (list.source !== source) {
      throw new ConfigurationError(`Source "${source}" returned a list labelled "${list.source}"`, {
        source,
        list_source: list.source,
      });
    }
    return { list };
  } catch (error) {
    if (error instanceof ScoringError || error instanceof ConfigurationError) throw error;

    const reason = error instanceof Error ? error.message : String(error);
    const timedOut = error instanceof SourceUnavailableError && error.timedOut;
    console.error(`[WARN] Source "${source}" unavailable, continuing without it: ${reason}`);
    return { list: emptyRankedList(source), failure: { source, reason, timed_out: timedOut } };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE
// ═══════════════════════════════════════════════════════════════════════════════

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`, { [name]: value });
  }
}

/**
 * Build a search pipeline. All configuration is checked here, before any query runs.
 *
 * @throws ConfigurationError for an invalid fusion config, a missing source
 *         weight under weighted_sum, or a rerank pool smaller than topN
 */
export function createSearchPipeline(sources: SearchSources, options: SearchPipelineOptions): SearchPipeline {
  const fusion = createFusionConfig(options.fusion);
  const { candidatePool, topN, sourceTimeoutMs } = options;
  const fieldWeights = Object.freeze({ ...options.fieldWeights });

  requirePositiveInteger('candidatePool', candidatePool);
  requirePositiveInteger('topN', topN);
  requirePositiveInteger('sourceTimeoutMs', sourceTimeoutMs);

  if (fusion.strategy === 'weighted_sum') {
    for (const source of [LEXICAL_SOURCE, VECTOR_SOURCE]) {
      if (fusion.weights[source] === undefined) {
        throw new ConfigurationError(`No weight configured for source "${source}"`, { source });
      }
    }
  }

  let rerankStage: RerankStage = identityRerank;
  if (options.rerank) {
    const { scoreFn, resolveText, candidatePool: rerankPool, concurrency } = options.rerank;
    requirePositiveInteger('rerank.candidatePool', rerankPool);
    if (rerankPool < topN) {
      throw new ConfigurationError(
        `Rerank candidate pool (${rerankPool}) is smaller than top_n (${topN}); the reranker never expands its pool`,
        { rerank_pool: rerankPool, top_n: topN }
      );
    }
    rerankStage = createRerankStage(scoreFn, resolveText, rerankPool, concurrency);
  }

  return async (query: string): Promise<SearchResponse> => {
    if (query.trim().length === 0) {
      throw new ValidationError('query: Query is required');
    }

    const [lexical, vector] = await Promise.all([
      retrieveSource(LEXICAL_SOURCE, sourceTimeoutMs, () =>
        sources.lexical.search(query, fieldWeights, candidatePool)
      ),
      retrieveSource(VECTOR_SOURCE, sourceTimeoutMs, async () =>
        sources.vector.search(await sources.embedder.embed(query), candidatePool)
      ),
    ]);

    const fused = fuse({ [LEXICAL_SOURCE]: lexical.list, [VECTOR_SOURCE]: vector.list }, fusion);
    const { documents, reranked } = await rerankStage(query, fused);

    const degraded: SourceFailure[] = [];
    if (lexical.failure) degraded.push(lexical.failure);
    if (vector.failure) degraded.push(vector.failure);

    return {
      query,
      strategy: fusion.strategy,
      results: documents.slice(0, topN),
      reranked,
      degraded_sources: degraded,
    };
  };
}

/**
 * Map a loaded SearchConfig onto pipeline options
 */
export function pipelineOptionsFromConfig(
  config: SearchConfig,
  rerank?: Omit<RerankSettings, 'candidatePool' | 'concurrency'>
): SearchPipelineOptions {
  return {
    fusion: config.fusion,
    candidatePool: config.candidatePool,
    topN: config.topN,
    fieldWeights: config.fieldWeights,
    sourceTimeoutMs: config.sourceTimeoutMs,
    rerank: rerank
      ? {
          ...rerank,
          candidatePool: config.rerank.candidatePool,
          concurrency: config.rerank.concurrency,
        }
      : undefined,
  };
}

/**
 * Adapt a pipeline to the evaluator: results only
 */
export function asSearchFn(pipeline: SearchPipeline): SearchFn {
  return async (query: string): Promise<readonly ScoredDocument[]> => (await pipeline(query)).results;
}
