/**
 * Utility Functions Barrel Export
 *
 * @module utils
 */

// Content hashes for ingested documents
export { computeHash, computeCompositeHash, isValidHashFormat, HASH_PREFIX, HASH_PATTERN } from './hash.js';

// JSONL input files
export { readJsonl, expandInputPaths, isJsonlError, PathNotFoundError } from './files.js';
export type { JsonlEntry } from './files.js';

export { mapInBatches } from './batches.js';

// Validation utilities for MCP tool and CLI inputs
export {
  validateInput,
  safeValidateInput,
  formatZodError,
  ValidationError,
  BlendMode,
  ConfigKey,
  DatabaseName,
  DatabaseListInput,
  DatabaseSelectInput,
  DatabaseStatsInput,
  IngestInput,
  CorpusRecord,
  SearchQueryInput,
  EvaluateInput,
  JudgmentLine,
  ConfigGetInput,
} from './validation.js';
