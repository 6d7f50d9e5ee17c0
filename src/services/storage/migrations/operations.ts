/**
 * Database Migration Operations
 *
 * Contains the main migration functions: initializeDatabase, migrateToLatest,
 * and checkSchemaVersion.
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import {
  configurePragmas,
  initializeSchemaVersion,
  createTables,
  createVecTable,
  createIndexes,
  createFTSTables,
  initializeDatabaseMetadata,
  loadSqliteVecExtension,
  type DatabaseMetadataInit,
} from './schema-helpers.js';

/**
 * Check the current schema version of the database
 * @returns Current schema version, or 0 if not initialized
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare(
        `
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name = 'schema_version'
    `
      )
      .get();

    if (!tableExists) {
      return 0;
    }

    const row = db.prepare<[number], { version: number }>('SELECT version FROM schema_version WHERE id = ?').get(1);

    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

/**
 * Initialize the database with all tables, indexes, and configuration
 *
 * Idempotent: tables are only created if they don't exist.
 *
 * @throws MigrationError if any operation fails
 */
export function initializeDatabase(db: Database.Database, init: DatabaseMetadataInit): void {
  // Pragmas and extension loading must run outside the transaction
  configurePragmas(db);
  loadSqliteVecExtension(db);

  // Schema version is stamped LAST so a crash mid-init leaves version=0
  const initTransaction = db.transaction(() => {
    createTables(db);
    createVecTable(db, init.embeddingDimensions);
    createIndexes(db);
    createFTSTables(db);
    initializeDatabaseMetadata(db, init);
    initializeSchemaVersion(db);
  });

  initTransaction();
}

/**
 * Bring an opened database to the latest schema version.
 *
 * A database with no version stamp (interrupted creation) is initialized
 * from `init`.
 *
 * @throws MigrationError if the stored version is newer than supported
 */
export function migrateToLatest(db: Database.Database, init: DatabaseMetadataInit): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db, init);
    return;
  }

  configurePragmas(db);
  loadSqliteVecExtension(db);

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${String(currentVersion)}) is newer than supported version (${String(SCHEMA_VERSION)}). ` +
        'Please update the application.',
      'version_check',
      undefined
    );
  }
}
