/**
 * DatabaseService Tests
 *
 * Lifecycle (create, open, list, delete), embedder checks and document
 * storage.
 *
 * @module tests/unit/database/database
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import {
  sqliteVecAvailable,
  createTestDir,
  cleanupTestDir,
  createFreshDatabase,
  createTestDocument,
  createTestEmbedder,
  safeCloseDatabase,
  DatabaseService,
  HashingEmbedder,
  VectorService,
} from './helpers.js';
import { DatabaseError, DatabaseErrorCode } from '../../../src/services/storage/database/types.js';
import { ConfigurationError } from '../../../src/services/search/errors.js';

describe('DatabaseService - lifecycle', () => {
  let testDir: string;

  beforeAll(() => {
    testDir = createTestDir('db-lifecycle-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  it.skipIf(!sqliteVecAvailable)('creates a database that exists and lists', () => {
    const db = DatabaseService.create('papers', createTestEmbedder(), 'Test papers', testDir);
    db.close();

    expect(DatabaseService.exists('papers', testDir)).toBe(true);
    const listed = DatabaseService.list(testDir).find((info) => info.name === 'papers');
    expect(listed).toMatchObject({
      name: 'papers',
      path: path.join(testDir, 'papers.db'),
      description: 'Test papers',
      embedding_dimensions: 8,
      embedder: 'hashing-md5-8',
      total_documents: 0,
    });
  });

  it.skipIf(!sqliteVecAvailable)('refuses to create a database twice', () => {
    const db = createFreshDatabase(testDir, 'twice');
    db.close();

    expect(() => DatabaseService.create('twice', createTestEmbedder(), undefined, testDir)).toThrow(
      `Database "twice" already exists at ${path.join(testDir, 'twice.db')}`
    );
  });

  it('rejects an invalid name', () => {
    try {
      DatabaseService.create('../escape', createTestEmbedder(), undefined, testDir);
      expect.unreachable('create should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(DatabaseError);
      expect(error instanceof DatabaseError && error.code).toBe(DatabaseErrorCode.INVALID_NAME);
    }
    expect(DatabaseService.exists('../escape', testDir)).toBe(false);
  });

  it('throws DATABASE_NOT_FOUND when opening a missing database', () => {
    expect(() => DatabaseService.open('nope', testDir)).toThrow(
      `Database "nope" not found at ${path.join(testDir, 'nope.db')}`
    );
  });

  it.skipIf(!sqliteVecAvailable)('rejects an embedder with other dimensions', () => {
    createFreshDatabase(testDir, 'dims').close();

    expect(() => DatabaseService.open('dims', testDir, new HashingEmbedder(16))).toThrow(
      'Database "dims" stores 8-dimensional vectors but the embedder produces 16'
    );
  });

  it.skipIf(!sqliteVecAvailable)('rejects an embedder with another name', () => {
    createFreshDatabase(testDir, 'named').close();

    expect(() => DatabaseService.open('named', testDir, { name: 'other-model', dimensions: 8 })).toThrow(
      ConfigurationError
    );
    expect(() => DatabaseService.open('named', testDir, { name: 'other-model', dimensions: 8 })).toThrow(
      'Database "named" was built with embedder "hashing-md5-8", not "other-model"'
    );
  });

  it.skipIf(!sqliteVecAvailable)('opens with the matching embedder', () => {
    createFreshDatabase(testDir, 'match').close();

    const db = DatabaseService.open('match', testDir, createTestEmbedder());
    expect(db.getName()).toBe('match');
    expect(db.getMetadata().embedder).toBe('hashing-md5-8');
    db.close();
  });

  it.skipIf(!sqliteVecAvailable)('deletes a database', () => {
    createFreshDatabase(testDir, 'doomed').close();

    DatabaseService.delete('doomed', testDir);

    expect(DatabaseService.exists('doomed', testDir)).toBe(false);
    expect(() => DatabaseService.delete('doomed', testDir)).toThrow('Database "doomed" not found');
  });

  it.skipIf(!sqliteVecAvailable)('leaves files that are not corpus databases out of the listing', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const listDir = createTestDir('db-list-');
    try {
      createFreshDatabase(listDir, 'good').close();
      fs.writeFileSync(path.join(listDir, 'junk.db'), 'not a database');

      expect(DatabaseService.list(listDir).map((info) => info.name)).toEqual(['good']);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringMatching(/^\[WARN\] Skipping .*junk\.db: /));
    } finally {
      errorSpy.mockRestore();
      cleanupTestDir(listDir);
    }
  });

  it('lists nothing for a missing storage path', () => {
    expect(DatabaseService.list(path.join(testDir, 'missing'))).toEqual([]);
  });
});

describe('DatabaseService - documents', () => {
  let testDir: string;
  let db: DatabaseService | undefined;

  beforeAll(() => {
    testDir = createTestDir('db-docs-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    if (sqliteVecAvailable) db = createFreshDatabase(testDir, 'docs');
  });

  afterEach(() => {
    safeCloseDatabase(db);
    db = undefined;
  });

  function requireDb(): DatabaseService {
    if (!db) throw new Error('database not created');
    return db;
  }

  it.skipIf(!sqliteVecAvailable)('reports inserted, unchanged and updated', () => {
    const service = requireDb();
    const doc = createTestDocument();

    expect(service.upsertDocument(doc, 'sha256:one', 'batch-1')).toBe('inserted');
    expect(service.upsertDocument(doc, 'sha256:one', 'batch-2')).toBe('unchanged');
    expect(service.upsertDocument({ ...doc, title: 'Wind' }, 'sha256:two', 'batch-3')).toBe('updated');

    expect(service.countDocuments()).toBe(1);
    expect(service.getDocument('doc-1')?.title).toBe('Wind');
  });

  it.skipIf(!sqliteVecAvailable)('round-trips every stored field', () => {
    const service = requireDb();
    service.upsertDocument(
      createTestDocument({ tags: ['energy', 'solar'], source: 'news', created_at: '2024-05-01' }),
      'sha256:abc',
      'batch-1'
    );

    const stored = service.getDocument('doc-1');

    expect(stored).toMatchObject({
      doc_id: 'doc-1',
      title: 'Solar panels',
      body: 'Panels turn sunlight into electricity.',
      tags: ['energy', 'solar'],
      source: 'news',
      created_at: '2024-05-01',
      content_hash: 'sha256:abc',
    });
    expect(typeof stored?.ingested_at).toBe('string');
  });

  it.skipIf(!sqliteVecAvailable)('omits unset optional fields', () => {
    const service = requireDb();
    service.upsertDocument(createTestDocument(), 'sha256:abc', 'batch-1');

    const stored = service.getDocument('doc-1');

    expect(stored && 'source' in stored).toBe(false);
    expect(stored && 'created_at' in stored).toBe(false);
  });

  it.skipIf(!sqliteVecAvailable)('returns null for an unknown doc_id', () => {
    expect(requireDb().getDocument('missing')).toBeNull();
  });

  it.skipIf(!sqliteVecAvailable)('fetches many documents, leaving unknown ids out', () => {
    const service = requireDb();
    service.upsertDocument(createTestDocument({ doc_id: 'a' }), 'h-a', 'batch-1');
    service.upsertDocument(createTestDocument({ doc_id: 'b' }), 'h-b', 'batch-1');

    const docs = service.getDocuments(['b', 'missing', 'a']);

    expect([...docs.keys()].sort()).toEqual(['a', 'b']);
  });

  it.skipIf(!sqliteVecAvailable)('lists documents by source in doc_id order', () => {
    const service = requireDb();
    service.upsertDocument(createTestDocument({ doc_id: 'c', source: 'news' }), 'h-c', 'batch-1');
    service.upsertDocument(createTestDocument({ doc_id: 'a', source: 'news' }), 'h-a', 'batch-1');
    service.upsertDocument(createTestDocument({ doc_id: 'b', source: 'blog' }), 'h-b', 'batch-1');

    expect(service.listDocuments({ source: 'news' }).map((d) => d.doc_id)).toEqual(['a', 'c']);
    expect(service.listDocuments({ limit: 2, offset: 1 }).map((d) => d.doc_id)).toEqual(['b', 'c']);
  });

  it.skipIf(!sqliteVecAvailable)('deletes a document together with its vector', () => {
    const service = requireDb();
    const vectors = new VectorService(service.getConnection());
    service.upsertDocument(createTestDocument(), 'sha256:abc', 'batch-1');
    vectors.storeVector('doc-1', createTestEmbedder().embedSync('solar panels'));

    expect(service.deleteDocument('doc-1')).toBe(true);
    expect(service.getDocument('doc-1')).toBeNull();
    expect(vectors.getVectorCount()).toBe(0);
    expect(service.getMetadata().total_documents).toBe(0);
    expect(service.deleteDocument('doc-1')).toBe(false);
  });

  it.skipIf(!sqliteVecAvailable)('keeps the lexical index in step with updates and deletes', () => {
    const service = requireDb();
    const conn = service.getConnection();
    const matches = (term: string): number =>
      conn
        .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM documents_fts WHERE documents_fts MATCH ?')
        .get(term)?.count ?? 0;

    service.upsertDocument(createTestDocument({ title: 'Solar' }), 'h-1', 'batch-1');
    expect(matches('solar')).toBe(1);

    service.upsertDocument(createTestDocument({ title: 'Wind', body: 'Turbines.' }), 'h-2', 'batch-2');
    expect(matches('solar')).toBe(0);
    expect(matches('turbines')).toBe(1);

    service.deleteDocument('doc-1');
    expect(matches('wind')).toBe(0);
  });
});
