/**
 * Unit tests for Zod validation schemas
 *
 * @module tests/unit/validation
 */

import { describe, it, expect } from 'vitest';
import {
  validateInput,
  safeValidateInput,
  ValidationError,
  DatabaseName,
  CorpusRecord,
  SearchQueryInput,
  EvaluateInput,
  IngestInput,
  JudgmentLine,
} from '../../src/utils/validation.js';

describe('validateInput', () => {
  it('returns parsed data with defaults applied', () => {
    expect(validateInput(EvaluateInput, { queries_path: 'q.jsonl' })).toEqual({
      queries_path: 'q.jsonl',
      compare: false,
      concurrency: 1,
    });
  });

  it('throws ValidationError with path-prefixed messages', () => {
    expect(() => validateInput(SearchQueryInput, { query: '' })).toThrow(ValidationError);
    expect(() => validateInput(SearchQueryInput, { query: '' })).toThrow('query: Query is required');
  });

  it('joins several issues with "; "', () => {
    expect(() => validateInput(SearchQueryInput, { query: '', top_n: 0 })).toThrow(
      'query: Query is required; top_n: Number must be greater than or equal to 1'
    );
  });
});

describe('safeValidateInput', () => {
  it('reports failure without throwing', () => {
    const result = safeValidateInput(IngestInput, { input_paths: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('input_paths: At least one input path is required');
    }
  });
});

describe('DatabaseName', () => {
  it.each(['default', 'papers_2024', 'my-corpus'])('accepts %s', (name) => {
    expect(DatabaseName.safeParse(name).success).toBe(true);
  });

  it.each(['', 'has space', '../up', 'a'.repeat(65)])('rejects %j', (name) => {
    expect(DatabaseName.safeParse(name).success).toBe(false);
  });
});

describe('CorpusRecord', () => {
  it('fills defaults and stringifies numeric ids', () => {
    expect(validateInput(CorpusRecord, { doc_id: 42 })).toEqual({ doc_id: '42', title: '', body: '', tags: [] });
  });

  it('trims doc_id and accepts null tags', () => {
    const record = validateInput(CorpusRecord, {
      doc_id: ' d1 ',
      title: 'T',
      body: 'B',
      tags: null,
      source: 'wiki',
      created_at: 1700000000,
    });
    expect(record).toEqual({ doc_id: 'd1', title: 'T', body: 'B', tags: [], source: 'wiki', created_at: '1700000000' });
  });

  it('rejects a blank doc_id', () => {
    expect(() => validateInput(CorpusRecord, { doc_id: '   ' })).toThrow('doc_id: doc_id must not be empty');
  });
});

describe('JudgmentLine', () => {
  it('requires relevant or relevant_doc_ids', () => {
    expect(() => validateInput(JudgmentLine, { query: 'q' })).toThrow('relevant or relevant_doc_ids is required');
  });

  it('accepts numeric doc ids', () => {
    expect(JudgmentLine.safeParse({ query: 'q', relevant: [1, 'd2'] }).success).toBe(true);
  });
});
