/**
 * DatabaseService class for all database operations
 *
 * Owns one corpus database: documents, their FTS index and metadata.
 * Vectors live in the same file but are managed by VectorService.
 */

import Database from 'better-sqlite3';
import type { CorpusDocument, StoredDocument } from '../../../models/document.js';
import type { DatabaseInfo, DatabaseStats, ListDocumentsOptions, UpsertOutcome } from './types.js';
import {
  createDatabase,
  openDatabase,
  listDatabases,
  deleteDatabase,
  databaseExists,
  readMetadata,
  type EmbedderIdentity,
} from './static-operations.js';
import { getStats, updateMetadataCounts } from './stats-operations.js';
import * as docOps from './document-operations.js';
import type { MetadataRow } from './types.js';

/**
 * DatabaseService class for all database operations
 */
export class DatabaseService {
  private db: Database.Database;
  private readonly name: string;
  private readonly path: string;

  private constructor(db: Database.Database, name: string, path: string) {
    this.db = db;
    this.name = name;
    this.path = path;
  }

  static create(name: string, embedder: EmbedderIdentity, description?: string, storagePath?: string): DatabaseService {
    const result = createDatabase(name, embedder, description, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static open(name: string, storagePath?: string, embedder?: EmbedderIdentity): DatabaseService {
    const result = openDatabase(name, storagePath, embedder);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static list(storagePath?: string): DatabaseInfo[] {
    return listDatabases(storagePath);
  }

  static delete(name: string, storagePath?: string): void {
    deleteDatabase(name, storagePath);
  }

  static exists(name: string, storagePath?: string): boolean {
    return databaseExists(name, storagePath);
  }

  getStats(): DatabaseStats {
    return getStats(this.db, this.name, this.path);
  }

  getMetadata(): MetadataRow {
    return readMetadata(this.db);
  }

  close(): void {
    this.db.close();
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  // ==================== DOCUMENT OPERATIONS ====================

  upsertDocument(doc: CorpusDocument, contentHash: string, batchId: string): UpsertOutcome {
    return docOps.upsertDocument(this.db, doc, contentHash, batchId);
  }

  getDocument(docId: string): StoredDocument | null {
    return docOps.getDocument(this.db, docId);
  }

  getDocuments(docIds: readonly string[]): Map<string, StoredDocument> {
    return docOps.getDocuments(this.db, docIds);
  }

  listDocuments(options?: ListDocumentsOptions): StoredDocument[] {
    return docOps.listDocuments(this.db, options);
  }

  /**
   * Delete a document and refresh the metadata counters
   * @returns true when the document existed
   */
  deleteDocument(docId: string): boolean {
    return this.transaction(() => {
      const deleted = docOps.deleteDocument(this.db, docId);
      if (deleted) updateMetadataCounts(this.db);
      return deleted;
    });
  }

  countDocuments(): number {
    return docOps.countDocuments(this.db);
  }

  updateMetadataCounts(batchId?: string): void {
    updateMetadataCounts(this.db, batchId);
  }
}
