/**
 * Unit Tests for the hybrid search pipeline
 *
 * Sources are in-process fakes; timeouts use short real timers.
 *
 * @module tests/unit/services/search/pipeline
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  createSearchPipeline,
  pipelineOptionsFromConfig,
  asSearchFn,
  retrieveSource,
  type SearchPipelineOptions,
  type SearchSources,
} from '../../../../src/services/search/pipeline.js';
import { buildRankedList } from '../../../../src/services/search/ranked-list.js';
import { ConfigurationError, ScoringError, SourceUnavailableError } from '../../../../src/services/search/errors.js';
import { DEFAULT_SEARCH_CONFIG } from '../../../../src/services/search/config.js';
import { ValidationError } from '../../../../src/utils/validation.js';
import type { RankedList } from '../../../../src/models/search.js';

const LEXICAL_HITS = [
  { doc_id: 'A', score: 10 },
  { doc_id: 'B', score: 5 },
  { doc_id: 'C', score: 0 },
];
const VECTOR_HITS = [{ doc_id: 'B', score: 0.8 }];

function sources(overrides: Partial<SearchSources> = {}): SearchSources {
  return {
    lexical: { search: async () => buildRankedList('lexical', LEXICAL_HITS) },
    vector: { search: async () => buildRankedList('vector', VECTOR_HITS) },
    embedder: { dimensions: 3, name: 'fake-3', embed: async () => [1, 0, 0] },
    ...overrides,
  };
}

function options(overrides: Partial<SearchPipelineOptions> = {}): SearchPipelineOptions {
  return {
    fusion: { strategy: 'weighted_sum', weights: { lexical: 0.5, vector: 0.5 }, rrf_k: 60 },
    candidatePool: 10,
    topN: 10,
    fieldWeights: { title: 3, body: 1, tags: 2 },
    sourceTimeoutMs: 50,
    ...overrides,
  };
}

const never = (): Promise<RankedList> => new Promise<RankedList>(() => undefined);

/** Hold the event loop the way a synchronous database driver does */
function blockFor(ms: number): void {
  const until = Date.now() + ms;
  while (Date.now() < until) {
    // spin
  }
}

describe('createSearchPipeline', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('fuses both sources', async () => {
    const search = createSearchPipeline(sources(), options());

    const response = await search('solar');

    expect(response.query).toBe('solar');
    expect(response.strategy).toBe('weighted_sum');
    expect(response.reranked).toBe(false);
    expect(response.degraded_sources).toEqual([]);
    expect(response.results.map((d) => d.doc_id)).toEqual(['B', 'A', 'C']);
    expect(response.results[0].score).toBeCloseTo(0.75, 10);
  });

  it('passes field weights and candidate pool to the lexical source and the embedding to the vector source', async () => {
    const lexicalSearch = vi.fn(async () => buildRankedList('lexical', []));
    const vectorSearch = vi.fn(async () => buildRankedList('vector', []));
    const search = createSearchPipeline(
      sources({ lexical: { search: lexicalSearch }, vector: { search: vectorSearch } }),
      options({ candidatePool: 7 })
    );

    await search('query text');

    expect(lexicalSearch).toHaveBeenCalledWith('query text', { title: 3, body: 1, tags: 2 }, 7);
    expect(vectorSearch).toHaveBeenCalledWith([1, 0, 0], 7);
  });

  it('cuts results to topN', async () => {
    const search = createSearchPipeline(sources(), options({ topN: 2 }));
    const response = await search('solar');
    expect(response.results.map((d) => d.doc_id)).toEqual(['B', 'A']);
  });

  it('answers from the vector source when lexical times out', async () => {
    const search = createSearchPipeline(sources({ lexical: { search: never } }), options({ sourceTimeoutMs: 20 }));

    const response = await search('solar');

    expect(response.results.map((d) => d.doc_id)).toEqual(['B']);
    expect(response.results[0].score).toBe(0.5);
    expect(response.degraded_sources).toEqual([
      { source: 'lexical', reason: 'Source "lexical" timed out after 20ms', timed_out: true },
    ]);
    expect(errorSpy).toHaveBeenCalledWith(
      '[WARN] Source "lexical" unavailable, continuing without it: Source "lexical" timed out after 20ms'
    );
  });

  it('degrades a synchronous source that overruns the timeout', async () => {
    const blocking = async (): Promise<RankedList> => {
      blockFor(120);
      return buildRankedList('lexical', LEXICAL_HITS);
    };
    const search = createSearchPipeline(sources({ lexical: { search: blocking } }), options({ sourceTimeoutMs: 50 }));

    const response = await search('solar');

    expect(response.results.map((d) => [d.doc_id, d.score])).toEqual([['B', 0.5]]);
    expect(response.degraded_sources).toHaveLength(1);
    expect(response.degraded_sources[0]).toMatchObject({ source: 'lexical', timed_out: true });
    expect(response.degraded_sources[0].reason).toMatch(/^Source "lexical" took \d+ms, over its 50ms timeout$/);
  });

  it('answers from the lexical source when the embedder fails', async () => {
    const search = createSearchPipeline(
      sources({
        embedder: {
          dimensions: 3,
          name: 'fake-3',
          embed: async () => {
            throw new Error('model not loaded');
          },
        },
      }),
      options()
    );

    const response = await search('solar');

    expect(response.results.map((d) => [d.doc_id, d.score])).toEqual([
      ['A', 0.5],
      ['B', 0.25],
      ['C', 0],
    ]);
    expect(response.degraded_sources).toEqual([{ source: 'vector', reason: 'model not loaded', timed_out: false }]);
  });

  it('returns no results when both sources fail', async () => {
    const failing = async (): Promise<RankedList> => {
      throw new SourceUnavailableError('down', 'x');
    };
    const search = createSearchPipeline(
      sources({ lexical: { search: failing }, vector: { search: failing } }),
      options()
    );

    const response = await search('solar');

    expect(response.results).toEqual([]);
    expect(response.degraded_sources.map((f) => f.source)).toEqual(['lexical', 'vector']);
  });

  it('does not degrade a scoring error', async () => {
    const search = createSearchPipeline(
      sources({
        lexical: {
          search: async () => {
            throw new ScoringError('Non-finite score NaN rejected');
          },
        },
      }),
      options()
    );

    await expect(search('solar')).rejects.toThrow(ScoringError);
  });

  it('rejects an empty query', async () => {
    const search = createSearchPipeline(sources(), options());
    await expect(search('   ')).rejects.toThrow(ValidationError);
  });

  it('uses rrf when configured', async () => {
    const search = createSearchPipeline(sources(), options({ fusion: { strategy: 'rrf', weights: {}, rrf_k: 60 } }));

    const response = await search('solar');

    expect(response.strategy).toBe('rrf');
    expect(response.results.map((d) => d.doc_id)).toEqual(['B', 'A', 'C']);
    expect(response.results[0].score).toBeCloseTo(1 / 62 + 1 / 61, 12);
  });

  it('reranks the fused candidates', async () => {
    const scoreFn = vi.fn(async (_query: string, docText: string) => (docText === 'C' ? 0.9 : 0.1));
    const search = createSearchPipeline(
      sources(),
      options({ topN: 2, rerank: { scoreFn, resolveText: (docId) => docId, candidatePool: 3 } })
    );

    const response = await search('solar');

    expect(response.reranked).toBe(true);
    expect(response.results.map((d) => d.doc_id)).toEqual(['C', 'A']);
    expect(response.results[0].raw_scores.fused).toBe(0);
    expect(scoreFn).toHaveBeenCalledTimes(3);
  });

  describe('configuration checks', () => {
    it('rejects a rerank pool smaller than topN', () => {
      expect(() =>
        createSearchPipeline(
          sources(),
          options({ topN: 5, rerank: { scoreFn: async () => 1, resolveText: () => '', candidatePool: 3 } })
        )
      ).toThrow('Rerank candidate pool (3) is smaller than top_n (5)');
    });

    it('rejects weighted_sum without a vector weight', () => {
      expect(() =>
        createSearchPipeline(
          sources(),
          options({ fusion: { strategy: 'weighted_sum', weights: { lexical: 1 }, rrf_k: 60 } })
        )
      ).toThrow('No weight configured for source "vector"');
    });

    it('rejects a non-positive candidate pool', () => {
      expect(() => createSearchPipeline(sources(), options({ candidatePool: 0 }))).toThrow(ConfigurationError);
    });
  });
});

describe('retrieveSource', () => {
  it('rejects a list labelled with another source', async () => {
    await expect(retrieveSource('lexical', 50, async () => buildRankedList('vector', []))).rejects.toThrow(
      'Source "lexical" returned a list labelled "vector"'
    );
  });
});

describe('pipelineOptionsFromConfig', () => {
  it('maps the default config', () => {
    const mapped = pipelineOptionsFromConfig(DEFAULT_SEARCH_CONFIG);

    expect(mapped).toEqual({
      fusion: { strategy: 'weighted_sum', weights: { lexical: 0.6, vector: 0.4 }, rrf_k: 60 },
      candidatePool: 50,
      topN: 10,
      fieldWeights: { title: 3, body: 1, tags: 2 },
      sourceTimeoutMs: 5000,
      rerank: undefined,
    });
  });

  it('takes rerank pool and concurrency from the config', () => {
    const scoreFn = async (): Promise<number> => 1;
    const resolveText = (): string => '';

    const mapped = pipelineOptionsFromConfig(DEFAULT_SEARCH_CONFIG, { scoreFn, resolveText });

    expect(mapped.rerank).toEqual({ scoreFn, resolveText, candidatePool: 20, concurrency: 4 });
  });
});

describe('asSearchFn', () => {
  it('returns the result list only', async () => {
    const search = asSearchFn(createSearchPipeline(sources(), options({ topN: 1 })));
    const docs = await search('solar');
    expect(docs.map((d) => d.doc_id)).toEqual(['B']);
  });
});
