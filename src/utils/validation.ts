/**
 * Hybrid Search - Zod Validation Schemas
 *
 * Input validation for every MCP tool, every CLI command and every record
 * read from a corpus or judgment file. Each schema includes:
 * - Type validation
 * - Constraint validation (min/max, patterns)
 * - Default values where appropriate
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Flatten zod issues into "path: message; path: message"
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(formatZodError(result.error));
  }
  return result.data;
}

/**
 * Safely validate input without throwing, returns result object
 */
export function safeValidateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown
): { success: true; data: T } | { success: false; error: ValidationError } {
  const result = schema.safeParse(input);
  if (!result.success) {
    return { success: false, error: new ValidationError(formatZodError(result.error)) };
  }
  return { success: true, data: result.data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Blend mode as spelled on the command line and in tool inputs
 */
export const BlendMode = z.enum(['weighted', 'rrf']);

/**
 * Database name: alphanumeric, underscores, hyphens
 */
export const DatabaseName = z
  .string()
  .min(1, 'Database name is required')
  .max(64, 'Database name must be 64 characters or less')
  .regex(
    /^[a-zA-Z0-9_-]+$/,
    'Database name must contain only alphanumeric characters, underscores, and hyphens'
  );

/**
 * Configuration keys readable through search_config_get
 */
export const ConfigKey = z.enum([
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
]);

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DatabaseListInput = z.object({
  include_stats: z.boolean().default(false),
});

export const DatabaseSelectInput = z.object({
  database_name: DatabaseName,
});

export const DatabaseStatsInput = z.object({
  database_name: DatabaseName.optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// INGESTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const IngestInput = z.object({
  input_paths: z.array(z.string().min(1)).min(1, 'At least one input path is required'),
  database_name: DatabaseName.optional(),
});

/**
 * One line of a JSONL corpus file. Numeric ids and timestamps are accepted
 * and stored as strings.
 */
export const CorpusRecord = z.object({
  doc_id: z
    .union([z.string(), z.number()])
    .transform((v) => String(v).trim())
    .pipe(z.string().min(1, 'doc_id must not be empty')),
  title: z.string().default(''),
  body: z.string().default(''),
  tags: z.array(z.string()).nullish().transform((v) => v ?? []),
  source: z.string().optional(),
  created_at: z
    .union([z.string(), z.number()])
    .transform((v) => String(v))
    .optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for a hybrid query. Unset fields fall back to the loaded config.
 */
export const SearchQueryInput = z.object({
  query: z.string().min(1, 'Query is required').max(1000, 'Query must be 1000 characters or less'),
  blend: BlendMode.optional(),
  top_n: z.number().int().min(1).max(100).optional(),
  candidate_pool: z.number().int().min(1).max(1000).optional(),
  rerank: z.boolean().optional(),
  lexical_weight: z.number().min(0).max(10).optional(),
  vector_weight: z.number().min(0).max(10).optional(),
  rrf_k: z.number().int().min(1).max(1000).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const EvaluateInput = z.object({
  queries_path: z.string().min(1, 'queries_path is required'),
  blend: BlendMode.optional(),
  top_n: z.number().int().min(1).max(100).optional(),
  candidate_pool: z.number().int().min(1).max(1000).optional(),
  rerank: z.boolean().optional(),
  compare: z.boolean().default(false),
  concurrency: z.number().int().min(1).max(16).default(1),
});

/**
 * One line of a labeled query file: `relevant` or `relevant_doc_ids`
 */
export const JudgmentLine = z
  .object({
    query: z.string().trim().min(1, 'query must not be empty'),
    relevant: z.array(z.union([z.string(), z.number()])).optional(),
    relevant_doc_ids: z.array(z.union([z.string(), z.number()])).optional(),
  })
  .refine((v) => v.relevant !== undefined || v.relevant_doc_ids !== undefined, {
    message: 'relevant or relevant_doc_ids is required',
  });

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE EXPORTS (inferred from schemas)
// ═══════════════════════════════════════════════════════════════════════════════

export type BlendMode = z.infer<typeof BlendMode>;
export type ConfigKey = z.infer<typeof ConfigKey>;

export type DatabaseListInput = z.infer<typeof DatabaseListInput>;
export type DatabaseSelectInput = z.infer<typeof DatabaseSelectInput>;
export type DatabaseStatsInput = z.infer<typeof DatabaseStatsInput>;

export type IngestInput = z.infer<typeof IngestInput>;
export type CorpusRecord = z.infer<typeof CorpusRecord>;

export type SearchQueryInput = z.infer<typeof SearchQueryInput>;
export type EvaluateInput = z.infer<typeof EvaluateInput>;
export type JudgmentLine = z.infer<typeof JudgmentLine>;

export type ConfigGetInput = z.infer<typeof ConfigGetInput>;
