/**
 * Database Management MCP Tools
 *
 * Tools: search_db_list, search_db_select, search_db_stats
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/database
 */

import { z } from 'zod';
import { DatabaseService } from '../services/storage/database/index.js';
import { getConfig, requireDatabase, selectDatabase, state } from '../server/state.js';
import { databaseNotFoundError } from '../server/errors.js';
import { successResult, type DatabaseListItem, type DatabaseSelectResult } from '../server/types.js';
import { validateInput, DatabaseListInput, DatabaseSelectInput, DatabaseStatsInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleDatabaseList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseListInput, params);
    const storagePath = getConfig().storagePath;

    const items: DatabaseListItem[] = DatabaseService.list(storagePath).map((info) => {
      const item: DatabaseListItem = {
        name: info.name,
        path: info.path,
        size_bytes: info.size_bytes,
        created_at: info.created_at,
        modified_at: info.last_modified_at,
        embedder: info.embedder,
        embedding_dimensions: info.embedding_dimensions,
      };
      if (input.include_stats) item.document_count = info.total_documents;
      return item;
    });

    return formatResponse(
      successResult({
        databases: items,
        total: items.length,
        storage_path: storagePath,
        current_database: state.currentDatabaseName,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDatabaseSelect(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseSelectInput, params);
    selectDatabase(input.database_name);

    const { db, vector } = requireDatabase();
    const result: DatabaseSelectResult = {
      name: input.database_name,
      path: db.getPath(),
      selected: true,
      stats: {
        document_count: db.countDocuments(),
        vector_count: vector.getVectorCount(),
      },
    };
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDatabaseStats(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseStatsInput, params);

    if (input.database_name === undefined || input.database_name === state.currentDatabaseName) {
      const { db } = requireDatabase();
      return formatResponse(successResult(db.getStats()));
    }

    const storagePath = getConfig().storagePath;
    if (!DatabaseService.exists(input.database_name, storagePath)) {
      throw databaseNotFoundError(input.database_name, storagePath);
    }
    const db = DatabaseService.open(input.database_name, storagePath);
    try {
      return formatResponse(successResult(db.getStats()));
    } finally {
      db.close();
    }
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Database tools collection for MCP server registration
 */
export const databaseTools: Record<string, ToolDefinition> = {
  search_db_list: {
    description: 'List corpus databases in the configured storage path',
    inputSchema: {
      include_stats: z.boolean().default(false).describe('Include document counts'),
    },
    handler: handleDatabaseList,
  },
  search_db_select: {
    description: 'Select the corpus database that search, ingest and evaluate operate on',
    inputSchema: {
      database_name: z.string().min(1).describe('Name of the database to select'),
    },
    handler: handleDatabaseSelect,
  },
  search_db_stats: {
    description: 'Statistics for the selected database, or for a named one',
    inputSchema: {
      database_name: z.string().optional().describe('Database name (defaults to the selected database)'),
    },
    handler: handleDatabaseStats,
  },
};
