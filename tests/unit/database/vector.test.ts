/**
 * VectorService Tests
 *
 * @module tests/unit/database/vector
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import {
  sqliteVecAvailable,
  createTestDir,
  cleanupTestDir,
  createFreshDatabase,
  safeCloseDatabase,
  DatabaseService,
  VectorService,
} from './helpers.js';
import { distanceToScore } from '../../../src/services/storage/vector.js';
import { ConfigurationError } from '../../../src/services/search/errors.js';

function unit(index: number): number[] {
  const vector = new Array<number>(8).fill(0);
  vector[index] = 1;
  return vector;
}

describe('distanceToScore', () => {
  it('maps distance 0 to 1 and shrinks with distance', () => {
    expect(distanceToScore(0)).toBe(1);
    expect(distanceToScore(1)).toBe(0.5);
    expect(distanceToScore(3)).toBe(0.25);
  });
});

describe('VectorService', () => {
  let testDir: string;
  let db: DatabaseService | undefined;
  let vectors: VectorService | undefined;

  beforeAll(() => {
    testDir = createTestDir('vector-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    if (!sqliteVecAvailable) return;
    db = createFreshDatabase(testDir, 'vectors');
    vectors = new VectorService(db.getConnection());
  });

  afterEach(() => {
    safeCloseDatabase(db);
    db = undefined;
    vectors = undefined;
  });

  function requireVectors(): VectorService {
    if (!vectors) throw new Error('vector service not created');
    return vectors;
  }

  it.skipIf(!sqliteVecAvailable)('reads its dimensions from the database', () => {
    expect(requireVectors().dimensions).toBe(8);
  });

  it.skipIf(!sqliteVecAvailable)('returns nearest documents first as a vector ranked list', async () => {
    const service = requireVectors();
    service.storeVector('a', unit(0));
    service.storeVector('b', unit(1));

    const list = await service.search(unit(0), 10);

    expect(list.source).toBe('vector');
    expect(list.documents.map((d) => d.doc_id)).toEqual(['a', 'b']);
    expect(list.documents[0].score).toBe(1);
    expect(list.documents[1].score).toBeCloseTo(1 / (1 + Math.SQRT2), 6);
    expect(list.documents[1].raw_scores.vector).toBe(list.documents[1].score);
  });

  it.skipIf(!sqliteVecAvailable)('honours the limit', () => {
    const service = requireVectors();
    service.storeVector('a', unit(0));
    service.storeVector('b', unit(1));
    service.storeVector('c', unit(2));

    expect(service.searchSimilar(unit(2), { limit: 1 })).toEqual([{ doc_id: 'c', distance: 0 }]);
  });

  it.skipIf(!sqliteVecAvailable)('replaces the vector of a doc_id', () => {
    const service = requireVectors();
    service.storeVector('a', unit(0));
    service.storeVector('a', unit(3));

    expect(service.getVectorCount()).toBe(1);
    expect(service.searchSimilar(unit(3), { limit: 1 })).toEqual([{ doc_id: 'a', distance: 0 }]);
  });

  it.skipIf(!sqliteVecAvailable)('accepts a Float32Array', () => {
    const service = requireVectors();
    service.storeVector('a', Float32Array.from(unit(4)));
    expect(service.searchSimilar(unit(4), { limit: 1 })[0].doc_id).toBe('a');
  });

  it.skipIf(!sqliteVecAvailable)('deletes a vector', () => {
    const service = requireVectors();
    service.storeVector('a', unit(0));

    expect(service.deleteVector('a')).toBe(true);
    expect(service.deleteVector('a')).toBe(false);
    expect(service.getVectorCount()).toBe(0);
  });

  it.skipIf(!sqliteVecAvailable)('rejects a vector of the wrong size', () => {
    const service = requireVectors();
    expect(() => service.storeVector('a', [1, 0, 0])).toThrow(ConfigurationError);
    expect(() => service.storeVector('a', [1, 0, 0])).toThrow('Vector for "a" has 3 dimensions, database stores 8');
  });

  it.skipIf(!sqliteVecAvailable)('rejects a query vector of the wrong size', async () => {
    await expect(requireVectors().search([1, 0], 5)).rejects.toThrow('Query vector has 2 dimensions, database stores 8');
  });

  it.skipIf(!sqliteVecAvailable)('returns an empty list for an empty table', async () => {
    const list = await requireVectors().search(unit(0), 5);
    expect(list.documents).toEqual([]);
  });
});
