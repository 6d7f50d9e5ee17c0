/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * The only degradation anywhere is a retrieval source dropping to an empty
 * list inside the search pipeline; everything else surfaces here.
 *
 * @module server/errors
 */

import { DatabaseErrorCode } from '../services/storage/database/types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 * Each category maps to specific failure modes for debugging
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Search pipeline errors
  | 'CONFIGURATION_ERROR'
  | 'SOURCE_UNAVAILABLE'
  | 'SCORING_ERROR'
  | 'EVALUATION_INPUT_ERROR'

  // Database errors
  | 'DATABASE_NOT_FOUND'
  | 'DATABASE_NOT_SELECTED'
  | 'DATABASE_ALREADY_EXISTS'
  | 'DATABASE_ERROR'

  // Document errors
  | 'DOCUMENT_NOT_FOUND'

  // Embedding errors
  | 'EMBEDDING_FAILED'

  // Gemini errors
  | 'RERANK_API_ERROR'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PERMISSION_DENIED'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories.
 *
 * DatabaseError is resolved through its code in fromUnknown(), since one
 * class covers several distinct failures.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  // Validation
  ValidationError: 'VALIDATION_ERROR',

  // Search pipeline
  ConfigurationError: 'CONFIGURATION_ERROR',
  SourceUnavailableError: 'SOURCE_UNAVAILABLE',
  ScoringError: 'SCORING_ERROR',
  EvaluationInputError: 'EVALUATION_INPUT_ERROR',

  // Database / Storage
  DatabaseError: 'DATABASE_ERROR',
  MigrationError: 'DATABASE_ERROR',

  // Embedding
  EmbeddingError: 'EMBEDDING_FAILED',

  // Gemini
  CircuitBreakerOpenError: 'RERANK_API_ERROR',

  // File system
  PathNotFoundError: 'PATH_NOT_FOUND',
};

const DATABASE_CODE_TO_CATEGORY: Record<DatabaseErrorCode, ErrorCategory> = {
  [DatabaseErrorCode.DATABASE_NOT_FOUND]: 'DATABASE_NOT_FOUND',
  [DatabaseErrorCode.DATABASE_ALREADY_EXISTS]: 'DATABASE_ALREADY_EXISTS',
  [DatabaseErrorCode.DATABASE_LOCKED]: 'DATABASE_ERROR',
  [DatabaseErrorCode.SCHEMA_MISMATCH]: 'DATABASE_ERROR',
  [DatabaseErrorCode.INVALID_NAME]: 'VALIDATION_ERROR',
  [DatabaseErrorCode.PERMISSION_DENIED]: 'PERMISSION_DENIED',
  [DatabaseErrorCode.DOCUMENT_NOT_FOUND]: 'DOCUMENT_NOT_FOUND',
};

function isDatabaseErrorCode(value: unknown): value is DatabaseErrorCode {
  return typeof value === 'string' && Object.values<string>(DatabaseErrorCode).includes(value);
}

function categoryFor(error: Error, defaultCategory: ErrorCategory): ErrorCategory {
  if (error.name === 'DatabaseError' && 'code' in error && isDatabaseErrorCode(error.code)) {
    return DATABASE_CODE_TO_CATEGORY[error.code];
  }
  return ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 *
 * FAIL FAST: Thrown immediately when any error condition is detected.
 * Provides category, message, and optional details for debugging.
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const details: Record<string, unknown> = {
        originalName: error.name,
        stack: error.stack,
      };
      if ('details' in error && typeof error.details === 'object' && error.details !== null) {
        details.context = error.details;
      }
      return new MCPError(categoryFor(error, defaultCategory), error.message, details);
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, and details
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create validation error
 */
export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create database not selected error
 */
export function databaseNotSelectedError(): MCPError {
  return new MCPError(
    'DATABASE_NOT_SELECTED',
    'No database selected. Use search_db_list to see available databases, then search_db_select to choose one.'
  );
}

/**
 * Create database not found error
 */
export function databaseNotFoundError(name: string, storagePath?: string): MCPError {
  return new MCPError('DATABASE_NOT_FOUND', `Database "${name}" not found`, {
    databaseName: name,
    storagePath,
  });
}
