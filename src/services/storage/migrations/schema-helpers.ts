/**
 * Schema Helper Functions for Database Migrations
 *
 * Contains helper functions for configuring pragmas, creating tables,
 * indexes, and initializing database metadata.
 *
 * @module migrations/schema-helpers
 */

import type Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { MigrationError } from './types.js';
import {
  DATABASE_PRAGMAS,
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_DOCUMENTS_FTS_TABLE,
  CREATE_FTS_TRIGGERS,
  CREATE_INDEXES,
  TABLE_DEFINITIONS,
  SCHEMA_VERSION,
  createVecDocumentsTableSql,
} from './schema-definitions.js';

/**
 * Configure database pragmas for optimal performance and safety
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw new MigrationError(`Failed to set pragma: ${pragma}`, 'pragma', undefined, error);
    }
  }
}

/**
 * Create schema version table and initialize if needed
 */
export function initializeSchemaVersion(db: Database.Database): void {
  try {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);

    const now = new Date().toISOString();
    db.prepare(
      `
      INSERT OR IGNORE INTO schema_version (id, version, created_at, updated_at)
      VALUES (?, ?, ?, ?)
    `
    ).run(1, SCHEMA_VERSION, now, now);
  } catch (error) {
    throw new MigrationError('Failed to initialize schema version table', 'create_table', 'schema_version', error);
  }
}

/**
 * Create all tables in dependency order
 */
export function createTables(db: Database.Database): void {
  for (const table of TABLE_DEFINITIONS) {
    try {
      db.exec(table.sql);
    } catch (error) {
      throw new MigrationError(`Failed to create table: ${table.name}`, 'create_table', table.name, error);
    }
  }
}

/**
 * Create the FTS5 index and its sync triggers
 */
export function createFTSTables(db: Database.Database): void {
  try {
    db.exec(CREATE_DOCUMENTS_FTS_TABLE);
  } catch (error) {
    throw new MigrationError('Failed to create documents_fts virtual table', 'create_virtual_table', 'documents_fts', error);
  }
  for (const trigger of CREATE_FTS_TRIGGERS) {
    try {
      db.exec(trigger);
    } catch (error) {
      throw new MigrationError('Failed to create FTS trigger', 'create_trigger', 'documents_fts', error);
    }
  }
}

/**
 * Create sqlite-vec virtual table for vector storage
 */
export function createVecTable(db: Database.Database, dimensions: number): void {
  try {
    db.exec(createVecDocumentsTableSql(dimensions));
  } catch (error) {
    throw new MigrationError(
      'Failed to create vec_documents virtual table. Ensure sqlite-vec extension is loaded.',
      'create_virtual_table',
      'vec_documents',
      error
    );
  }
}

/**
 * Create all required indexes
 */
export function createIndexes(db: Database.Database): void {
  for (const indexSql of CREATE_INDEXES) {
    try {
      db.exec(indexSql);
    } catch (error) {
      const match = indexSql.match(/CREATE INDEX IF NOT EXISTS (\w+)/);
      const indexName = match ? match[1] : 'unknown';
      throw new MigrationError(`Failed to create index: ${indexName}`, 'create_index', indexName, error);
    }
  }
}

export interface DatabaseMetadataInit {
  name: string;
  description?: string;
  embeddingDimensions: number;
  embedder: string;
}

/**
 * Initialize database metadata
 */
export function initializeDatabaseMetadata(db: Database.Database, init: DatabaseMetadataInit): void {
  try {
    const now = new Date().toISOString();
    db.prepare(
      `
      INSERT OR IGNORE INTO database_metadata (
        id, database_name, database_version, description, embedding_dimensions, embedder,
        created_at, last_modified_at, total_documents
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `
    ).run(1, init.name, '1.0.0', init.description ?? null, init.embeddingDimensions, init.embedder, now, now, 0);
  } catch (error) {
    throw new MigrationError('Failed to initialize database metadata', 'insert', 'database_metadata', error);
  }
}

/**
 * Load the sqlite-vec extension
 */
export function loadSqliteVecExtension(db: Database.Database): void {
  try {
    sqliteVec.load(db);
  } catch (error) {
    throw new MigrationError(
      'Failed to load sqlite-vec extension. Ensure sqlite-vec is installed: npm install sqlite-vec',
      'load_extension',
      'sqlite-vec',
      error
    );
  }
}
