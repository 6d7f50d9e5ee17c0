/**
 * Statistics operations for DatabaseService
 *
 * Handles database statistics retrieval and metadata counters.
 */

import type Database from 'better-sqlite3';
import { statSync } from 'fs';
import { checkSchemaVersion } from '../migrations/operations.js';
import type { DatabaseStats } from './types.js';
import { readMetadata } from './static-operations.js';
import { countDocuments } from './document-operations.js';

/**
 * Get database statistics
 *
 * @returns DatabaseStats - Live statistics from database
 */
export function getStats(db: Database.Database, name: string, path: string): DatabaseStats {
  const metadata = readMetadata(db);
  const vectors = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM vec_documents').get();
  const bySource = db
    .prepare<[], { source: string | null; count: number }>(
      `
    SELECT source, COUNT(*) AS count
    FROM documents
    GROUP BY source
    ORDER BY count DESC, source
  `
    )
    .all();

  return {
    name,
    path,
    size_bytes: statSync(path).size,
    schema_version: checkSchemaVersion(db),
    embedding_dimensions: metadata.embedding_dimensions,
    embedder: metadata.embedder,
    created_at: metadata.created_at,
    last_modified_at: metadata.last_modified_at,
    last_ingest_batch_id: metadata.last_ingest_batch_id,
    total_documents: countDocuments(db),
    total_vectors: vectors?.count ?? 0,
    documents_by_source: bySource,
  };
}

/**
 * Refresh total_documents and last_modified_at, optionally recording the
 * ingest batch that caused the change
 */
export function updateMetadataCounts(db: Database.Database, batchId?: string): void {
  const now = new Date().toISOString();
  db.prepare(
    `
    UPDATE database_metadata
    SET total_documents = (SELECT COUNT(*) FROM documents),
        last_modified_at = ?,
        last_ingest_batch_id = COALESCE(?, last_ingest_batch_id)
    WHERE id = 1
  `
  ).run(now, batchId ?? null);
}
