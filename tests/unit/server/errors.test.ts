/**
 * Unit tests for MCP error categories and tool result helpers
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  MCPError,
  formatErrorResponse,
  databaseNotSelectedError,
  databaseNotFoundError,
  validationError,
} from '../../../src/server/errors.js';
import { successResult, failureResult } from '../../../src/server/types.js';
import { handleError, formatResponse } from '../../../src/tools/shared.js';
import {
  ConfigurationError,
  EvaluationInputError,
  ScoringError,
  SourceUnavailableError,
} from '../../../src/services/search/errors.js';
import { DatabaseError, DatabaseErrorCode } from '../../../src/services/storage/database/index.js';
import { ValidationError } from '../../../src/utils/validation.js';
import { PathNotFoundError } from '../../../src/utils/files.js';
import { EmbeddingError } from '../../../src/services/embedding/index.js';
import { CircuitBreakerOpenError } from '../../../src/services/gemini/index.js';

describe('MCPError.fromUnknown', () => {
  it.each([
    [new ValidationError('bad'), 'VALIDATION_ERROR'],
    [new ConfigurationError('bad'), 'CONFIGURATION_ERROR'],
    [new SourceUnavailableError('bad', 'lexical'), 'SOURCE_UNAVAILABLE'],
    [new ScoringError('bad'), 'SCORING_ERROR'],
    [new EvaluationInputError('bad', 3), 'EVALUATION_INPUT_ERROR'],
    [new EmbeddingError('bad', 'EMBEDDING_FAILED'), 'EMBEDDING_FAILED'],
    [new CircuitBreakerOpenError('bad', 1000), 'RERANK_API_ERROR'],
    [new PathNotFoundError('/tmp/x'), 'PATH_NOT_FOUND'],
    [new Error('bad'), 'INTERNAL_ERROR'],
  ])('maps %s to its category', (error, category) => {
    expect(MCPError.fromUnknown(error).category).toBe(category);
  });

  it('maps DatabaseError by its code', () => {
    const notFound = new DatabaseError('gone', DatabaseErrorCode.DATABASE_NOT_FOUND);
    const badName = new DatabaseError('bad name', DatabaseErrorCode.INVALID_NAME);
    const locked = new DatabaseError('locked', DatabaseErrorCode.DATABASE_LOCKED);

    expect(MCPError.fromUnknown(notFound).category).toBe('DATABASE_NOT_FOUND');
    expect(MCPError.fromUnknown(badName).category).toBe('VALIDATION_ERROR');
    expect(MCPError.fromUnknown(locked).category).toBe('DATABASE_ERROR');
  });

  it('keeps error details as context', () => {
    const error = MCPError.fromUnknown(new ScoringError('NaN', { doc_id: 'd1' }));
    expect(error.message).toBe('NaN');
    expect(error.details?.originalName).toBe('ScoringError');
    expect(error.details?.context).toEqual({ doc_id: 'd1' });
  });

  it('returns an MCPError unchanged', () => {
    const original = validationError('x');
    expect(MCPError.fromUnknown(original)).toBe(original);
  });

  it('wraps a thrown non-error value', () => {
    const error = MCPError.fromUnknown('plain string', 'DATABASE_ERROR');
    expect(error.category).toBe('DATABASE_ERROR');
    expect(error.message).toBe('plain string');
    expect(error.details).toEqual({ originalValue: 'plain string' });
  });
});

describe('error factories', () => {
  it('names the database tools in the not-selected message', () => {
    const error = databaseNotSelectedError();
    expect(error.category).toBe('DATABASE_NOT_SELECTED');
    expect(error.message).toContain('search_db_select');
  });

  it('records name and storage path for a missing database', () => {
    const error = databaseNotFoundError('papers', '/data');
    expect(error.message).toBe('Database "papers" not found');
    expect(error.details).toEqual({ databaseName: 'papers', storagePath: '/data' });
  });

  it('formats an error response', () => {
    expect(formatErrorResponse(validationError('query: Query is required'))).toEqual({
      success: false,
      error: { category: 'VALIDATION_ERROR', message: 'query: Query is required', details: undefined },
    });
  });
});

describe('tool results', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('wraps data in a success result', () => {
    const data = { id: 'd1' };
    const result = successResult(data);
    expect(result).toEqual({ success: true, data });
    expect(result.data).toBe(data);
  });

  it('builds a failure result', () => {
    expect(failureResult('SCORING_ERROR', 'NaN')).toEqual({
      success: false,
      error: { category: 'SCORING_ERROR', message: 'NaN', details: undefined },
    });
  });

  it('formats a response as pretty JSON text', () => {
    expect(formatResponse({ a: 1 })).toEqual({ content: [{ type: 'text', text: '{\n  "a": 1\n}' }] });
  });

  it('logs and formats a handled error', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const response = handleError(new ConfigurationError('rrf_k must be > 0'));

    expect(spy).toHaveBeenCalledWith('[ERROR] CONFIGURATION_ERROR: rrf_k must be > 0');
    const body: unknown = JSON.parse(response.content[0].text);
    expect(body).toMatchObject({ success: false, error: { category: 'CONFIGURATION_ERROR', message: 'rrf_k must be > 0' } });
  });
});
