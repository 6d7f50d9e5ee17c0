/**
 * Types and error handling for DatabaseService
 */

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  INVALID_NAME = 'INVALID_NAME',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  DOCUMENT_NOT_FOUND = 'DOCUMENT_NOT_FOUND',
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'DatabaseError';
    Error.captureStackTrace?.(this, DatabaseError);
  }
}

/**
 * Summary of a database file, as listed without opening it for writes
 */
export interface DatabaseInfo {
  name: string;
  path: string;
  size_bytes: number;
  description: string | null;
  embedding_dimensions: number;
  embedder: string;
  created_at: string;
  last_modified_at: string;
  total_documents: number;
}

/**
 * Live statistics of an open database
 */
export interface DatabaseStats {
  name: string;
  path: string;
  size_bytes: number;
  schema_version: number;
  embedding_dimensions: number;
  embedder: string;
  created_at: string;
  last_modified_at: string;
  last_ingest_batch_id: string | null;
  total_documents: number;
  total_vectors: number;
  documents_by_source: Array<{ source: string | null; count: number }>;
}

/**
 * Row of database_metadata
 */
export interface MetadataRow {
  database_name: string;
  description: string | null;
  embedding_dimensions: number;
  embedder: string;
  created_at: string;
  last_modified_at: string;
  total_documents: number;
  last_ingest_batch_id: string | null;
}

/**
 * Row of documents
 */
export interface DocumentRow {
  doc_id: string;
  title: string;
  body: string;
  tags: string;
  source: string | null;
  created_at: string | null;
  content_hash: string;
  ingested_at: string;
  ingest_batch_id: string;
}

export interface ListDocumentsOptions {
  source?: string;
  limit?: number;
  offset?: number;
}

/** Outcome of upserting one document */
export type UpsertOutcome = 'inserted' | 'updated' | 'unchanged';
