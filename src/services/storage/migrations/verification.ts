/**
 * Schema Verification Functions
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES } from './schema-definitions.js';

/**
 * Verify all required tables and indexes exist
 */
export function verifySchema(db: Database.Database): {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
} {
  const missingTables: string[] = [];
  const missingIndexes: string[] = [];

  const tableStmt = db.prepare(`
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name = ?
    `);
  for (const tableName of REQUIRED_TABLES) {
    if (!tableStmt.get(tableName)) {
      missingTables.push(tableName);
    }
  }

  const indexStmt = db.prepare(`
      SELECT name FROM sqlite_master
      WHERE type = 'index' AND name = ?
    `);
  for (const indexName of REQUIRED_INDEXES) {
    if (!indexStmt.get(indexName)) {
      missingIndexes.push(indexName);
    }
  }

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0,
    missingTables,
    missingIndexes,
  };
}
