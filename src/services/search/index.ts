export { normalize, DEGENERATE_NORMALIZED_SCORE } from './normalizer.js';
export { fuse, rrfContribution } from './fusion.js';
export { buildRankedList, emptyRankedList, compareScored, sortScored, type SourceHit } from './ranked-list.js';
export {
  rerank,
  createRerankStage,
  identityRerank,
  buildRerankPrompt,
  parseRelevanceResponse,
  GeminiCrossEncoder,
  DEFAULT_RERANK_CONCURRENCY,
  FUSED_SCORE_KEY,
  type RerankStage,
  type RerankOptions,
  type JsonGenerator,
} from './reranker.js';
export {
  evaluate,
  evaluateVariants,
  loadJudgments,
  parseJudgment,
  reciprocalRank,
  recallAt,
  type SearchFn,
  type EvaluateOptions,
} from './evaluator.js';
export {
  createSearchPipeline,
  pipelineOptionsFromConfig,
  asSearchFn,
  retrieveSource,
  type SearchPipeline,
  type SearchPipelineOptions,
  type SearchSources,
  type RerankSettings,
} from './pipeline.js';
export { Bm25LexicalSource, buildFTSQuery, columnWeights, createDocumentTextResolver } from './bm25.js';
export {
  loadSearchConfig,
  createFusionConfig,
  strategyFromBlend,
  withOverrides,
  DEFAULT_SEARCH_CONFIG,
  type SearchConfig,
  type SearchConfigLayer,
} from './config.js';
export {
  createHybridSearch,
  createEvaluationVariants,
  configForRequest,
  overridesLayer,
  type HybridSearchServices,
  type HybridSearchOptions,
  type SearchOverrides,
} from './hybrid.js';
export { ConfigurationError, SourceUnavailableError, ScoringError, EvaluationInputError } from './errors.js';
export type { LexicalSource, VectorSource, Embedder, CrossEncoder, ScoreFn, ResolveText } from './sources.js';
