/**
 * Corpus ingestion
 *
 * JSONL corpus files are merged by doc_id (the last record read wins),
 * embedded, and upserted into a corpus database. Documents whose content
 * hash has not changed are neither re-embedded nor rewritten.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/ingestion/corpus
 */

import { v4 as uuidv4 } from 'uuid';
import type { CorpusDocument } from '../../models/document.js';
import { documentText } from '../../models/document.js';
import type { Embedder } from '../search/sources.js';
import type { DatabaseService } from '../storage/database/service.js';
import type { VectorService } from '../storage/vector.js';
import { computeCompositeHash } from '../../utils/hash.js';
import { expandInputPaths, isJsonlError, readJsonl } from '../../utils/files.js';
import { mapInBatches } from '../../utils/batches.js';
import { CorpusRecord, formatZodError } from '../../utils/validation.js';

/** Embedding calls in flight during ingestion */
const EMBED_BATCH_SIZE = 32;

export interface SkippedRecord {
  file: string;
  line: number;
  reason: string;
}

export interface CorpusReadResult {
  files: string[];
  /** Unique documents, in order of first appearance */
  documents: CorpusDocument[];
  records_read: number;
  /** Records whose doc_id had already been read; the later one was kept */
  duplicates: number;
  skipped: SkippedRecord[];
}

export interface IngestResult {
  batch_id: string;
  inserted: number;
  updated: number;
  unchanged: number;
  total_documents: number;
}

/**
 * Hash of everything that is stored for a document
 */
export function documentContentHash(doc: CorpusDocument): string {
  return computeCompositeHash([
    doc.doc_id,
    doc.title,
    doc.body,
    JSON.stringify(doc.tags),
    doc.source ?? '',
    doc.created_at ?? '',
  ]);
}

function toCorpusDocument(record: CorpusRecord): CorpusDocument {
  const doc: CorpusDocument = {
    doc_id: record.doc_id,
    title: record.title,
    body: record.body,
    tags: record.tags,
  };
  if (record.source !== undefined) doc.source = record.source;
  if (record.created_at !== undefined) doc.created_at = record.created_at;
  return doc;
}

/**
 * Read and merge JSONL corpus files. Invalid lines are skipped and reported,
 * never fatal.
 *
 * @throws PathNotFoundError if an input path does not exist
 */
export async function readCorpus(inputPaths: readonly string[]): Promise<CorpusReadResult> {
  const files = await expandInputPaths(inputPaths);
  const byId = new Map<string, CorpusDocument>();
  const skipped: SkippedRecord[] = [];
  let recordsRead = 0;
  let duplicates = 0;

  for (const file of files) {
    for (const entry of await readJsonl(file)) {
      recordsRead++;
      if (isJsonlError(entry)) {
        skipped.push({ file, line: entry.line, reason: `Invalid JSON: ${entry.error}` });
        continue;
      }
      const parsed = CorpusRecord.safeParse(entry.value);
      if (!parsed.success) {
        skipped.push({ file, line: entry.line, reason: formatZodError(parsed.error) });
        continue;
      }
      if (byId.has(parsed.data.doc_id)) duplicates++;
      byId.set(parsed.data.doc_id, toCorpusDocument(parsed.data));
    }
  }

  if (skipped.length > 0) {
    console.error(`[WARN] Skipped ${skipped.length} invalid corpus record(s) across ${files.length} file(s)`);
  }

  return { files, documents: [...byId.values()], records_read: recordsRead, duplicates, skipped };
}

/**
 * Embed and upsert documents in one transaction.
 *
 * Embeddings are computed first (the transaction itself is synchronous);
 * documents whose stored content hash already matches are skipped.
 */
export async function ingestDocuments(
  db: DatabaseService,
  vectors: VectorService,
  embedder: Embedder,
  documents: readonly CorpusDocument[]
): Promise<IngestResult> {
  const batchId = uuidv4();
  const hashed = documents.map((doc) => ({ doc, hash: documentContentHash(doc) }));
  const stored = db.getDocuments(documents.map((doc) => doc.doc_id));
  const changed = hashed.filter(({ doc, hash }) => stored.get(doc.doc_id)?.content_hash !== hash);

  const embeddings = await mapInBatches(changed, EMBED_BATCH_SIZE, ({ doc }) => embedder.embed(documentText(doc)));

  let inserted = 0;
  let updated = 0;
  db.transaction(() => {
    changed.forEach(({ doc, hash }, i) => {
      const outcome = db.upsertDocument(doc, hash, batchId);
      if (outcome === 'inserted') inserted++;
      else if (outcome === 'updated') updated++;
      vectors.storeVector(doc.doc_id, embeddings[i]);
    });
    db.updateMetadataCounts(changed.length > 0 ? batchId : undefined);
  });

  const result: IngestResult = {
    batch_id: batchId,
    inserted,
    updated,
    unchanged: documents.length - changed.length,
    total_documents: db.countDocuments(),
  };
  console.error(
    `[INFO] Ingest batch ${batchId}: ${inserted} inserted, ${updated} updated, ${result.unchanged} unchanged`
  );
  return result;
}
