/**
 * Shared helpers for database-backed tests
 *
 * @module tests/unit/database/helpers
 */

import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DatabaseService } from '../../../src/services/storage/database/index.js';
import { VectorService } from '../../../src/services/storage/vector.js';
import { HashingEmbedder } from '../../../src/services/embedding/hashing.js';
import type { CorpusDocument } from '../../../src/models/document.js';

export { DatabaseService, VectorService, HashingEmbedder };

function isSqliteVecAvailable(): boolean {
  try {
    const db = new Database(':memory:');
    try {
      sqliteVec.load(db);
    } finally {
      db.close();
    }
    return true;
  } catch (error) {
    console.error(`[WARN] sqlite-vec unavailable, skipping database tests: ${String(error)}`);
    return false;
  }
}

export const sqliteVecAvailable = isSqliteVecAvailable();

/** Small embedder so expected vectors stay readable */
export const TEST_DIMENSIONS = 8;

export function createTestEmbedder(): HashingEmbedder {
  return new HashingEmbedder(TEST_DIMENSIONS);
}

export function createTestDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTestDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Create a database under `dir`, deleting any earlier one of the same name
 */
export function createFreshDatabase(dir: string, name: string): DatabaseService {
  if (DatabaseService.exists(name, dir)) {
    DatabaseService.delete(name, dir);
  }
  return DatabaseService.create(name, createTestEmbedder(), undefined, dir);
}

export function safeCloseDatabase(db: DatabaseService | undefined): void {
  if (!db) return;
  try {
    db.close();
  } catch (error) {
    console.error(`[WARN] close failed: ${String(error)}`);
  }
}

export function createTestDocument(overrides: Partial<CorpusDocument> = {}): CorpusDocument {
  return {
    doc_id: 'doc-1',
    title: 'Solar panels',
    body: 'Panels turn sunlight into electricity.',
    tags: ['energy'],
    ...overrides,
  };
}
