/**
 * Unit Tests for the retrieval evaluator
 *
 * @module tests/unit/services/search/evaluator
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  aggregate,
  evaluate,
  evaluateVariants,
  loadJudgments,
  parseJudgment,
  recallAt,
  reciprocalRank,
  type SearchFn,
} from '../../../../src/services/search/evaluator.js';
import { ConfigurationError, EvaluationInputError } from '../../../../src/services/search/errors.js';
import { PathNotFoundError } from '../../../../src/utils/files.js';
import type { JudgmentRecord, ScoredDocument } from '../../../../src/models/search.js';

function results(...ids: string[]): ScoredDocument[] {
  return ids.map((doc_id, i) => ({ doc_id, score: 1 - i / 10, raw_scores: {} }));
}

function fixed(...ids: string[]): SearchFn {
  return async () => results(...ids);
}

function judgment(query: string, ...relevant: string[]): JudgmentRecord {
  return { query, relevant_doc_ids: new Set(relevant) };
}

describe('metrics', () => {
  it('reciprocalRank is 1 / position of the first relevant doc', () => {
    expect(reciprocalRank(['d1', 'd2', 'd3'], new Set(['d2']))).toBe(0.5);
    expect(reciprocalRank(['d1', 'd2', 'd3'], new Set(['d3', 'd1']))).toBe(1);
    expect(reciprocalRank(['d1'], new Set(['d9']))).toBe(0);
  });

  it('recallAt counts each relevant doc once', () => {
    expect(recallAt(['d1', 'd2'], new Set(['d2', 'd4']))).toBe(0.5);
    expect(recallAt(['d2', 'd2'], new Set(['d2']))).toBe(1);
    expect(recallAt(['d1'], new Set())).toBeNull();
  });
});

describe('evaluate', () => {
  it('scores a single judgment', async () => {
    const result = await evaluate([judgment('q', 'd2')], fixed('d1', 'd2', 'd3'), 3);

    expect(result.per_query).toEqual([
      { query: 'q', mrr: 0.5, recall: 1, retrieved: ['d1', 'd2', 'd3'], flags: [] },
    ]);
    expect(result.aggregate).toEqual({
      mrr_at_n: 0.5,
      recall_at_n: 1,
      n: 3,
      mrr_queries: 1,
      recall_queries: 1,
      flagged_queries: 0,
    });
  });

  it('only looks at the top n results', async () => {
    const result = await evaluate([judgment('q', 'd3')], fixed('d1', 'd2', 'd3'), 2);

    expect(result.per_query[0]).toMatchObject({ mrr: 0, recall: 0, retrieved: ['d1', 'd2'] });
  });

  it('flags an empty relevant set and leaves it out of recall only', async () => {
    const result = await evaluate([judgment('q1', 'd1'), judgment('q2')], fixed('d1', 'd2'), 2);

    expect(result.per_query[1]).toEqual({
      query: 'q2',
      mrr: 0,
      recall: null,
      retrieved: ['d1', 'd2'],
      flags: ['empty_relevant_set'],
    });
    expect(result.aggregate).toEqual({
      mrr_at_n: 0.5,
      recall_at_n: 1,
      n: 2,
      mrr_queries: 2,
      recall_queries: 1,
      flagged_queries: 1,
    });
  });

  it('flags a malformed judgment and leaves it out of both aggregates', async () => {
    const records: JudgmentRecord[] = [
      judgment('q1', 'd2'),
      { malformed: true, line: 2, reason: 'relevant_doc_ids: Required' },
    ];

    const result = await evaluate(records, fixed('d1', 'd2'), 2);

    expect(result.per_query[1]).toEqual({
      query: '<line 2>',
      mrr: 0,
      recall: null,
      retrieved: [],
      flags: ['malformed_judgment'],
      error: 'relevant_doc_ids: Required',
    });
    expect(result.aggregate.mrr_at_n).toBe(0.5);
    expect(result.aggregate.mrr_queries).toBe(1);
    expect(result.aggregate.recall_queries).toBe(1);
    expect(result.aggregate.flagged_queries).toBe(1);
  });

  it('flags a failing query and continues the batch', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const pipeline: SearchFn = async (query) => {
      if (query === 'broken') throw new Error('index offline');
      return results('d1');
    };

    const result = await evaluate([judgment('broken', 'd1'), judgment('fine', 'd1')], pipeline, 5);

    expect(result.per_query.map((q) => q.flags)).toEqual([['pipeline_error'], []]);
    expect(result.per_query[0].error).toBe('index offline');
    expect(result.aggregate.mrr_at_n).toBe(1);
    expect(result.aggregate.mrr_queries).toBe(1);
    errorSpy.mockRestore();
  });

  it('aborts on a configuration error from the pipeline', async () => {
    const pipeline: SearchFn = async () => {
      throw new ConfigurationError('bad weights');
    };
    await expect(evaluate([judgment('q', 'd1')], pipeline, 5)).rejects.toThrow('bad weights');
  });

  it('rejects a non-positive n', async () => {
    await expect(evaluate([], fixed(), 0)).rejects.toThrow('n must be a positive integer, got 0');
  });

  it('keeps judgment order under concurrency', async () => {
    const pipeline: SearchFn = async (query) => {
      await new Promise((resolve) => setTimeout(resolve, query === 'slow' ? 20 : 1));
      return results(query);
    };

    const result = await evaluate(
      [judgment('slow', 'slow'), judgment('fast', 'fast'), judgment('mid', 'x')],
      pipeline,
      1,
      { concurrency: 3 }
    );

    expect(result.per_query.map((q) => q.query)).toEqual(['slow', 'fast', 'mid']);
    expect(result.aggregate.mrr_at_n).toBeCloseTo(2 / 3, 10);
  });

  it('reports zero aggregates when no query contributes', () => {
    expect(aggregate([], 10)).toEqual({
      mrr_at_n: 0,
      recall_at_n: 0,
      n: 10,
      mrr_queries: 0,
      recall_queries: 0,
      flagged_queries: 0,
    });
  });
});

describe('evaluateVariants', () => {
  it('evaluates every named pipeline against the same judgments', async () => {
    const report = await evaluateVariants(
      [judgment('q', 'd2')],
      { weighted_sum: fixed('d2', 'd1'), rrf: fixed('d1', 'd2') },
      2
    );

    expect(Object.keys(report)).toEqual(['weighted_sum', 'rrf']);
    expect(report.weighted_sum.aggregate.mrr_at_n).toBe(1);
    expect(report.rrf.aggregate.mrr_at_n).toBe(0.5);
  });
});

describe('judgment parsing', () => {
  it('accepts relevant_doc_ids', () => {
    const parsed = parseJudgment({ query: 'q', relevant_doc_ids: ['d1', 'd2'] }, 1);
    expect(parsed.query).toBe('q');
    expect([...parsed.relevant_doc_ids]).toEqual(['d1', 'd2']);
  });

  it('merges relevant and relevant_doc_ids', () => {
    const parsed = parseJudgment({ query: 'q', relevant: ['d1'], relevant_doc_ids: ['d1', 'd3'] }, 1);
    expect([...parsed.relevant_doc_ids]).toEqual(['d1', 'd3']);
  });

  it('throws EvaluationInputError with the line number', () => {
    try {
      parseJudgment({ relevant_doc_ids: ['d1'] }, 7);
      expect.unreachable('parseJudgment should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(EvaluationInputError);
      expect(error instanceof EvaluationInputError && error.line).toBe(7);
    }
  });
});

describe('loadJudgments', () => {
  let testDir = '';

  beforeAll(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'judgments-'));
  });

  afterAll(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('keeps bad lines as malformed records in place', async () => {
    const file = path.join(testDir, 'queries.jsonl');
    fs.writeFileSync(
      file,
      [
        '{"query": "first", "relevant_doc_ids": ["d1"]}',
        '',
        'not json',
        '{"query": "third"}',
        '{"query": "fourth", "relevant": []}',
      ].join('\n')
    );

    const records = await loadJudgments(file);

    expect(records).toHaveLength(4);
    expect(records[0]).toEqual({ query: 'first', relevant_doc_ids: new Set(['d1']) });
    expect(records[1]).toMatchObject({ malformed: true, line: 3 });
    expect(records[2]).toMatchObject({ malformed: true, line: 4, query: 'third' });
    expect(records[3]).toEqual({ query: 'fourth', relevant_doc_ids: new Set() });
  });

  it('throws PathNotFoundError for a missing file', async () => {
    await expect(loadJudgments(path.join(testDir, 'missing.jsonl'))).rejects.toThrow(PathNotFoundError);
  });
});
