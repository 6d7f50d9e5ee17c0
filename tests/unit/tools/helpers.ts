/**
 * Shared helpers for MCP tool tests
 *
 * Each test file points the server state at its own temp storage path and
 * ingests a small corpus through the real handlers.
 *
 * @module tests/unit/tools/helpers
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadSearchConfig } from '../../../src/services/search/config.js';
import { resetState, setConfig } from '../../../src/server/state.js';
import { handleIngest } from '../../../src/tools/ingestion.js';
import type { ToolResponse as McpToolResponse } from '../../../src/tools/shared.js';

export interface ToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: {
    category: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function parseResponse(response: McpToolResponse): ToolResponse {
  return JSON.parse(response.content[0].text);
}

export const CORPUS_LINES = [
  { doc_id: 'a', title: 'Solar', body: 'Panels turn sunlight into electricity.', tags: ['energy'] },
  { doc_id: 'b', title: 'Wind', body: 'Turbines spin in the wind.', tags: ['energy'] },
  { doc_id: 'c', title: 'Gardening', body: 'Solar lamps light the path.', tags: [] },
  { doc_id: 'd', title: 'Rivers', body: 'Dams hold water.', tags: [] },
  { doc_id: 'e', title: 'Forests', body: 'Trees grow slowly.', tags: [] },
  { doc_id: 'f', title: 'Deserts', body: 'Sand dunes shift.', tags: [] },
];

/**
 * Reset server state to a config whose storage path is `dir`
 */
export function useTestConfig(dir: string): void {
  resetState();
  setConfig(
    loadSearchConfig({
      env: { HYBRID_SEARCH_STORAGE_PATH: dir, HYBRID_SEARCH_EMBEDDING_DIM: '8' },
    })
  );
}

export function writeCorpus(dir: string): string {
  const file = path.join(dir, 'corpus.jsonl');
  fs.writeFileSync(file, CORPUS_LINES.map((line) => JSON.stringify(line)).join('\n'));
  return file;
}

/**
 * Ingest the test corpus into `databaseName`, which becomes the selected database
 */
export async function ingestTestCorpus(dir: string, databaseName: string): Promise<ToolResponse> {
  return parseResponse(await handleIngest({ input_paths: [writeCorpus(dir)], database_name: databaseName }));
}
