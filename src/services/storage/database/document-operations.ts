/**
 * Document operations for DatabaseService
 *
 * documents_fts is maintained by triggers, so every write here keeps the
 * lexical index in sync without touching it directly.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { CorpusDocument, StoredDocument } from '../../../models/document.js';
import { DatabaseError, DatabaseErrorCode } from './types.js';
import type { DocumentRow, ListDocumentsOptions, UpsertOutcome } from './types.js';
import { batchedQuery } from './helpers.js';

const StoredTags = z.array(z.string());

/**
 * Convert a documents row to a StoredDocument
 * @throws DatabaseError if the tags column is not a JSON string array
 */
export function rowToDocument(row: DocumentRow): StoredDocument {
  let tags: unknown;
  try {
    tags = JSON.parse(row.tags);
  } catch (error) {
    throw new DatabaseError(`Corrupt tags for document "${row.doc_id}"`, DatabaseErrorCode.SCHEMA_MISMATCH, error);
  }
  const parsed = StoredTags.safeParse(tags);
  if (!parsed.success) {
    throw new DatabaseError(`Corrupt tags for document "${row.doc_id}"`, DatabaseErrorCode.SCHEMA_MISMATCH);
  }

  const doc: StoredDocument = {
    doc_id: row.doc_id,
    title: row.title,
    body: row.body,
    tags: parsed.data,
    content_hash: row.content_hash,
    ingested_at: row.ingested_at,
  };
  if (row.source !== null) doc.source = row.source;
  if (row.created_at !== null) doc.created_at = row.created_at;
  return doc;
}

/**
 * Insert or replace a document by doc_id (last write wins).
 *
 * @returns 'unchanged' when the stored content hash already matches
 */
export function upsertDocument(
  db: Database.Database,
  doc: CorpusDocument,
  contentHash: string,
  batchId: string
): UpsertOutcome {
  const existing = db
    .prepare<[string], { content_hash: string }>('SELECT content_hash FROM documents WHERE doc_id = ?')
    .get(doc.doc_id);

  if (existing && existing.content_hash === contentHash) {
    return 'unchanged';
  }

  db.prepare(
    `
    INSERT INTO documents (doc_id, title, body, tags, source, created_at, content_hash, ingested_at, ingest_batch_id)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(doc_id) DO UPDATE SET
      title = excluded.title,
      body = excluded.body,
      tags = excluded.tags,
      source = excluded.source,
      created_at = excluded.created_at,
      content_hash = excluded.content_hash,
      ingested_at = excluded.ingested_at,
      ingest_batch_id = excluded.ingest_batch_id
  `
  ).run(
    doc.doc_id,
    doc.title,
    doc.body,
    JSON.stringify(doc.tags),
    doc.source ?? null,
    doc.created_at ?? null,
    contentHash,
    new Date().toISOString(),
    batchId
  );

  return existing ? 'updated' : 'inserted';
}

export function getDocument(db: Database.Database, docId: string): StoredDocument | null {
  const row = db.prepare<[string], DocumentRow>('SELECT * FROM documents WHERE doc_id = ?').get(docId);
  return row ? rowToDocument(row) : null;
}

/**
 * Fetch many documents by id. Missing ids are absent from the map.
 */
export function getDocuments(db: Database.Database, docIds: readonly string[]): Map<string, StoredDocument> {
  const rows = batchedQuery(docIds, (batch) =>
    db
      .prepare<string[], DocumentRow>(`SELECT * FROM documents WHERE doc_id IN (${batch.map(() => '?').join(',')})`)
      .all(...batch)
  );
  return new Map(rows.map((row) => [row.doc_id, rowToDocument(row)]));
}

export function listDocuments(db: Database.Database, options: ListDocumentsOptions = {}): StoredDocument[] {
  const { source, limit = 100, offset = 0 } = options;
  const rows =
    source === undefined
      ? db
          .prepare<[number, number], DocumentRow>('SELECT * FROM documents ORDER BY doc_id LIMIT ? OFFSET ?')
          .all(limit, offset)
      : db
          .prepare<[string, number, number], DocumentRow>(
            'SELECT * FROM documents WHERE source = ? ORDER BY doc_id LIMIT ? OFFSET ?'
          )
          .all(source, limit, offset);
  return rows.map(rowToDocument);
}

/**
 * Delete a document and its vector. Call inside a transaction.
 * @returns true when a document row was deleted
 */
export function deleteDocument(db: Database.Database, docId: string): boolean {
  db.prepare('DELETE FROM vec_documents WHERE doc_id = ?').run(docId);
  return db.prepare('DELETE FROM documents WHERE doc_id = ?').run(docId).changes > 0;
}

export function countDocuments(db: Database.Database): number {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM documents').get();
  return row?.count ?? 0;
}
