/**
 * BM25 Lexical Source using SQLite FTS5
 *
 * FAIL FAST: All errors throw immediately with detailed messages
 *
 * FTS5 bm25() returns lower-is-better values, so the raw lexical score is
 * its negation: larger means more relevant.
 */

import type Database from 'better-sqlite3';
import type { RankedList } from '../../models/search.js';
import { LEXICAL_SOURCE } from '../../models/search.js';
import { LEXICAL_FIELDS, documentText } from '../../models/document.js';
import type { LexicalSource, ResolveText } from './sources.js';
import { buildRankedList } from './ranked-list.js';
import { ValidationError } from '../../utils/validation.js';
import { DatabaseError, DatabaseErrorCode } from '../storage/database/types.js';
import type { DatabaseService } from '../storage/database/service.js';

/** Weight for a field the caller did not mention */
const DEFAULT_FIELD_WEIGHT = 1.0;

const FTS5_OPERATORS = new Set(['AND', 'OR', 'NOT']);

/**
 * Turn free text into an FTS5 MATCH expression.
 *
 * AND/OR/NOT are kept as operators; every other token is stripped of FTS5
 * syntax characters and consecutive terms are joined with an implicit AND.
 *
 * @throws ValidationError if nothing searchable is left
 */
export function buildFTSQuery(query: string): string {
  const rawTokens = query.trim().split(/\s+/).filter((t) => t.length > 0);

  const result: string[] = [];
  for (const raw of rawTokens) {
    if (FTS5_OPERATORS.has(raw.toUpperCase())) {
      result.push(raw.toUpperCase());
    } else {
      // Hyphens separate words, matching the unicode61 tokenizer
      const parts = raw
        .split(/-/)
        .map((p) => p.replace(/['"()*:^~+{}[\]\\;@<>#!$%&|,./`?=]/g, ''))
        .filter((p) => p.length > 0);
      result.push(...parts);
    }
  }

  // Strip leading/trailing operators and consecutive operators
  while (result.length > 0 && FTS5_OPERATORS.has(result[0])) result.shift();
  while (result.length > 0 && FTS5_OPERATORS.has(result[result.length - 1])) result.pop();
  const cleaned: string[] = [];
  for (const t of result) {
    if (FTS5_OPERATORS.has(t) && cleaned.length > 0 && FTS5_OPERATORS.has(cleaned[cleaned.length - 1])) continue;
    cleaned.push(t);
  }

  if (cleaned.length === 0) {
    throw new ValidationError('query: Query contains no valid search tokens after sanitization');
  }

  const parts: string[] = [];
  for (let i = 0; i < cleaned.length; i++) {
    parts.push(cleaned[i]);
    if (i < cleaned.length - 1 && !FTS5_OPERATORS.has(cleaned[i]) && !FTS5_OPERATORS.has(cleaned[i + 1])) {
      parts.push('AND');
    }
  }

  return parts.join(' ');
}

/**
 * Map per-field weights onto bm25() column weights, in FTS5 column order
 *
 * @throws ValidationError for an unknown field or a negative/non-finite weight
 */
export function columnWeights(fieldWeights: Readonly<Record<string, number>>): number[] {
  const known = new Set<string>(LEXICAL_FIELDS);
  for (const [field, weight] of Object.entries(fieldWeights)) {
    if (!known.has(field)) {
      throw new ValidationError(`field_weights.${field}: Unknown field (expected one of ${LEXICAL_FIELDS.join(', ')})`);
    }
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ValidationError(`field_weights.${field}: Weight must be a finite number >= 0`);
    }
  }
  return LEXICAL_FIELDS.map((field) => fieldWeights[field] ?? DEFAULT_FIELD_WEIGHT);
}

interface Bm25Row {
  doc_id: string;
  bm25_score: number;
}

export class Bm25LexicalSource implements LexicalSource {
  constructor(private readonly db: Database.Database) {
    this.verifyFTSTableExists();
  }

  private verifyFTSTableExists(): void {
    const result = this.db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name='documents_fts'")
      .get();

    if (!result) {
      throw new DatabaseError(
        'FTS5 table "documents_fts" not found. Re-open the database to trigger migration.',
        DatabaseErrorCode.SCHEMA_MISMATCH
      );
    }
  }

  /**
   * Synchronous search, best match first
   */
  searchSync(query: string, fieldWeights: Readonly<Record<string, number>>, topK: number): RankedList {
    if (!query || query.trim().length === 0) {
      throw new ValidationError('query: BM25 search query cannot be empty');
    }
    const [title, body, tags] = columnWeights(fieldWeights);
    const ftsQuery = buildFTSQuery(query);

    const rows = this.db
      .prepare<[number, number, number, string, number], Bm25Row>(
        `
      SELECT d.doc_id, bm25(documents_fts, ?, ?, ?) AS bm25_score
      FROM documents_fts
      JOIN documents d ON documents_fts.rowid = d.rowid
      WHERE documents_fts MATCH ?
      ORDER BY bm25_score
      LIMIT ?
    `
      )
      .all(title, body, tags, ftsQuery, topK);

    return buildRankedList(
      LEXICAL_SOURCE,
      rows.map((row) => ({ doc_id: row.doc_id, score: -row.bm25_score }))
    );
  }

  async search(query: string, fieldWeights: Readonly<Record<string, number>>, topK: number): Promise<RankedList> {
    return this.searchSync(query, fieldWeights, topK);
  }
}

/**
 * Resolve doc_ids to the text the cross-encoder scores
 */
export function createDocumentTextResolver(db: DatabaseService): ResolveText {
  return (docId: string): string => {
    const doc = db.getDocument(docId);
    if (!doc) {
      throw new DatabaseError(`Document "${docId}" not found`, DatabaseErrorCode.DOCUMENT_NOT_FOUND);
    }
    return documentText(doc);
  };
}
