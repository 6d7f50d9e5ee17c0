/**
 * Ingestion MCP Tools
 *
 * Tools: search_ingest
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/ingestion
 */

import { z } from 'zod';
import { getConfig, requireDatabase, selectOrCreateDatabase, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { readCorpus, ingestDocuments } from '../services/ingestion/corpus.js';
import { validateInput, IngestInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

/** Skipped records listed in a response; the count is always complete */
const MAX_SKIPPED_REPORTED = 50;

export async function handleIngest(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(IngestInput, params);
    const name = input.database_name ?? state.currentDatabaseName ?? getConfig().database;

    const corpus = await readCorpus(input.input_paths);
    const created = selectOrCreateDatabase(name);
    const { db, vector, embedder } = requireDatabase();
    const result = await ingestDocuments(db, vector, embedder, corpus.documents);

    return formatResponse(
      successResult({
        database_name: name,
        database_created: created,
        files: corpus.files,
        records_read: corpus.records_read,
        duplicates: corpus.duplicates,
        skipped_count: corpus.skipped.length,
        skipped: corpus.skipped.slice(0, MAX_SKIPPED_REPORTED),
        ...result,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Ingestion tools collection for MCP server registration
 */
export const ingestionTools: Record<string, ToolDefinition> = {
  search_ingest: {
    description:
      'Ingest JSONL corpus files (or directories of them) into a database, creating it if needed. Later records with the same doc_id replace earlier ones.',
    inputSchema: {
      input_paths: z.array(z.string()).min(1).describe('JSONL files or directories'),
      database_name: z.string().optional().describe('Target database (defaults to the selected or configured one)'),
    },
    handler: handleIngest,
  },
};
