/**
 * Static operations for DatabaseService - database lifecycle: create, open, list, delete, exists.
 */

import Database from 'better-sqlite3';
import { statSync, existsSync, mkdirSync, readdirSync, unlinkSync, writeFileSync, chmodSync } from 'fs';
import { join } from 'path';
import { checkSchemaVersion, initializeDatabase, migrateToLatest } from '../migrations/operations.js';
import { verifySchema } from '../migrations/verification.js';
import { ConfigurationError } from '../../search/errors.js';
import { DatabaseError, DatabaseErrorCode, type DatabaseInfo, type MetadataRow } from './types.js';
import { DEFAULT_STORAGE_PATH, validateName, getDatabasePath } from './helpers.js';

/** The embedder a database's vectors must come from */
export interface EmbedderIdentity {
  name: string;
  dimensions: number;
}

export interface OpenedDatabase {
  db: Database.Database;
  name: string;
  path: string;
}

function removeDatabaseFiles(path: string): void {
  for (const candidate of [path, `${path}-wal`, `${path}-shm`]) {
    if (existsSync(candidate)) unlinkSync(candidate);
  }
}

/**
 * Create a new database whose vector table is sized for `embedder`
 * @throws DatabaseError if name is invalid or database already exists
 */
export function createDatabase(
  name: string,
  embedder: EmbedderIdentity,
  description?: string,
  storagePath?: string
): OpenedDatabase {
  validateName(name);
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(basePath)) {
    mkdirSync(basePath, { recursive: true, mode: 0o700 });
  }

  if (existsSync(dbPath)) {
    throw new DatabaseError(`Database "${name}" already exists at ${dbPath}`, DatabaseErrorCode.DATABASE_ALREADY_EXISTS);
  }

  writeFileSync(dbPath, '', { mode: 0o600 });
  chmodSync(dbPath, 0o600);

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    removeDatabaseFiles(dbPath);
    throw new DatabaseError(`Failed to create database "${name}": ${String(error)}`, DatabaseErrorCode.PERMISSION_DENIED, error);
  }

  try {
    initializeDatabase(db, {
      name,
      description,
      embeddingDimensions: embedder.dimensions,
      embedder: embedder.name,
    });
  } catch (error) {
    db.close();
    removeDatabaseFiles(dbPath);
    throw error;
  }

  return { db, name, path: dbPath };
}

/**
 * Read the metadata row
 * @throws DatabaseError if the row is missing
 */
export function readMetadata(db: Database.Database): MetadataRow {
  const row = db
    .prepare<[], MetadataRow>(
      `
    SELECT database_name, description, embedding_dimensions, embedder, created_at,
           last_modified_at, total_documents, last_ingest_batch_id
    FROM database_metadata WHERE id = 1
  `
    )
    .get();
  if (!row) {
    throw new DatabaseError('database_metadata row is missing', DatabaseErrorCode.SCHEMA_MISMATCH);
  }
  return row;
}

/**
 * Open an existing database
 *
 * When `embedder` is given it must match the embedder the database was
 * created with; vectors from a different model or size cannot be compared.
 *
 * @throws DatabaseError if database doesn't exist or schema is invalid
 * @throws ConfigurationError if the embedder does not match the stored one
 */
export function openDatabase(name: string, storagePath?: string, embedder?: EmbedderIdentity): OpenedDatabase {
  validateName(name);
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(dbPath)) {
    throw new DatabaseError(`Database "${name}" not found at ${dbPath}`, DatabaseErrorCode.DATABASE_NOT_FOUND);
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new DatabaseError(`Failed to open database "${name}": ${String(error)}`, DatabaseErrorCode.DATABASE_LOCKED, error);
  }

  try {
    if (checkSchemaVersion(db) === 0 && !embedder) {
      throw new DatabaseError(
        `Database "${name}" was never initialized; open it with an embedder to initialize it`,
        DatabaseErrorCode.SCHEMA_MISMATCH
      );
    }
    migrateToLatest(db, {
      name,
      embeddingDimensions: embedder?.dimensions ?? 0,
      embedder: embedder?.name ?? '',
    });

    const verification = verifySchema(db);
    if (!verification.valid) {
      throw new DatabaseError(
        `Database schema verification failed. Missing tables: ${verification.missingTables.join(', ')}. Missing indexes: ${verification.missingIndexes.join(', ')}`,
        DatabaseErrorCode.SCHEMA_MISMATCH
      );
    }

    if (embedder) {
      const metadata = readMetadata(db);
      if (metadata.embedding_dimensions !== embedder.dimensions) {
        throw new ConfigurationError(
          `Database "${name}" stores ${metadata.embedding_dimensions}-dimensional vectors but the embedder produces ${embedder.dimensions}`,
          { database: name, stored: metadata.embedding_dimensions, embedder: embedder.dimensions }
        );
      }
      if (metadata.embedder !== embedder.name) {
        throw new ConfigurationError(
          `Database "${name}" was built with embedder "${metadata.embedder}", not "${embedder.name}"`,
          { database: name, stored: metadata.embedder, embedder: embedder.name }
        );
      }
    }
  } catch (error) {
    db.close();
    throw error;
  }

  return { db, name, path: dbPath };
}

/** List all available databases */
export function listDatabases(storagePath?: string): DatabaseInfo[] {
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  if (!existsSync(basePath)) return [];

  const files = readdirSync(basePath)
    .filter((f) => f.endsWith('.db'))
    .sort();
  const databases: DatabaseInfo[] = [];

  for (const file of files) {
    const name = file.slice(0, -'.db'.length);
    const dbPath = join(basePath, file);
    try {
      const stats = statSync(dbPath);
      const db = new Database(dbPath, { readonly: true });
      try {
        const row = readMetadata(db);
        databases.push({
          name,
          path: dbPath,
          size_bytes: stats.size,
          description: row.description,
          embedding_dimensions: row.embedding_dimensions,
          embedder: row.embedder,
          created_at: row.created_at,
          last_modified_at: row.last_modified_at,
          total_documents: row.total_documents,
        });
      } finally {
        db.close();
      }
    } catch (error) {
      // Not a corpus database (or unreadable): leave it out of the listing
      console.error(`[WARN] Skipping ${dbPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return databases;
}

/** Delete a database - throws DatabaseError if database doesn't exist */
export function deleteDatabase(name: string, storagePath?: string): void {
  validateName(name);
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(dbPath)) {
    throw new DatabaseError(`Database "${name}" not found at ${dbPath}`, DatabaseErrorCode.DATABASE_NOT_FOUND);
  }

  removeDatabaseFiles(dbPath);
}

/** Check if a database exists */
export function databaseExists(name: string, storagePath?: string): boolean {
  try {
    validateName(name);
  } catch {
    return false;
  }
  return existsSync(getDatabasePath(name, storagePath));
}
