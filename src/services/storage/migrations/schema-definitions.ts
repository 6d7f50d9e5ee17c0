/**
 * SQL Schema Definitions for corpus databases
 *
 * Contains all table creation SQL, indexes, and database configuration.
 * These are constants used by the migration system.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * Database configuration pragmas for optimal performance and safety
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -64000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Database metadata table - database info, the embedder the vectors came
 * from, and statistics
 */
export const CREATE_DATABASE_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS database_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  database_name TEXT NOT NULL,
  database_version TEXT NOT NULL,
  description TEXT,
  embedding_dimensions INTEGER NOT NULL,
  embedder TEXT NOT NULL,
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL,
  total_documents INTEGER NOT NULL DEFAULT 0,
  last_ingest_batch_id TEXT
)
`;

/**
 * Documents table - one row per doc_id. tags holds a JSON array.
 * The implicit rowid is the FTS5 content rowid.
 */
export const CREATE_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS documents (
  doc_id TEXT PRIMARY KEY,
  title TEXT NOT NULL DEFAULT '',
  body TEXT NOT NULL DEFAULT '',
  tags TEXT NOT NULL DEFAULT '[]',
  source TEXT,
  created_at TEXT,
  content_hash TEXT NOT NULL,
  ingested_at TEXT NOT NULL,
  ingest_batch_id TEXT NOT NULL
)
`;

/**
 * FTS5 index over documents, columns in LEXICAL_FIELDS order
 * (bm25() column weights are positional)
 */
export const CREATE_DOCUMENTS_FTS_TABLE = `
CREATE VIRTUAL TABLE IF NOT EXISTS documents_fts USING fts5(
  title,
  body,
  tags,
  content='documents',
  content_rowid='rowid',
  tokenize='porter unicode61'
)
`;

/**
 * Triggers keeping documents_fts in sync with documents
 */
export const CREATE_FTS_TRIGGERS = [
  `CREATE TRIGGER IF NOT EXISTS documents_fts_ai AFTER INSERT ON documents BEGIN
    INSERT INTO documents_fts(rowid, title, body, tags) VALUES (new.rowid, new.title, new.body, new.tags);
  END`,
  `CREATE TRIGGER IF NOT EXISTS documents_fts_ad AFTER DELETE ON documents BEGIN
    INSERT INTO documents_fts(documents_fts, rowid, title, body, tags) VALUES ('delete', old.rowid, old.title, old.body, old.tags);
  END`,
  `CREATE TRIGGER IF NOT EXISTS documents_fts_au AFTER UPDATE OF title, body, tags ON documents BEGIN
    INSERT INTO documents_fts(documents_fts, rowid, title, body, tags) VALUES ('delete', old.rowid, old.title, old.body, old.tags);
    INSERT INTO documents_fts(rowid, title, body, tags) VALUES (new.rowid, new.title, new.body, new.tags);
  END`,
] as const;

/**
 * Vector table using sqlite-vec. Dimensions are fixed per database at creation.
 */
export function createVecDocumentsTableSql(dimensions: number): string {
  if (!Number.isInteger(dimensions) || dimensions < 1) {
    throw new RangeError(`Embedding dimensions must be a positive integer, got ${dimensions}`);
  }
  return `
CREATE VIRTUAL TABLE IF NOT EXISTS vec_documents USING vec0(
  doc_id TEXT PRIMARY KEY,
  embedding FLOAT[${dimensions}]
)
`;
}

/**
 * All required indexes for query performance
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_documents_content_hash ON documents(content_hash)',
  'CREATE INDEX IF NOT EXISTS idx_documents_source ON documents(source)',
  'CREATE INDEX IF NOT EXISTS idx_documents_ingest_batch ON documents(ingest_batch_id)',
] as const;

/**
 * Table definitions for creating tables in dependency order
 */
export const TABLE_DEFINITIONS = [
  { name: 'database_metadata', sql: CREATE_DATABASE_METADATA_TABLE },
  { name: 'documents', sql: CREATE_DOCUMENTS_TABLE },
] as const;

/**
 * Required tables for schema verification
 */
export const REQUIRED_TABLES = [
  'schema_version',
  'database_metadata',
  'documents',
  'documents_fts',
  'vec_documents',
] as const;

/**
 * Required indexes for schema verification
 */
export const REQUIRED_INDEXES = [
  'idx_documents_content_hash',
  'idx_documents_source',
  'idx_documents_ingest_batch',
] as const;
