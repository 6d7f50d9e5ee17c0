/**
 * MCP Server State Management
 *
 * Manages global server state: the current database connection, the
 * services built on it, and the loaded SearchConfig.
 * FAIL FAST: All state access throws immediately if preconditions not met.
 *
 * @module server/state
 */

import { DatabaseService } from '../services/storage/database/index.js';
import { VectorService } from '../services/storage/vector.js';
import { Bm25LexicalSource } from '../services/search/bm25.js';
import { HashingEmbedder } from '../services/embedding/hashing.js';
import { DEFAULT_SEARCH_CONFIG, type SearchConfig } from '../services/search/config.js';
import { databaseNotSelectedError, databaseNotFoundError } from './errors.js';
import type { ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state
 * Mutable state for current database and configuration
 */
export const state: ServerState = {
  currentDatabase: null,
  currentDatabaseName: null,
  config: DEFAULT_SEARCH_CONFIG,
};

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Services returned from requireDatabase
 */
export interface DatabaseServices {
  db: DatabaseService;
  vector: VectorService;
  lexical: Bm25LexicalSource;
  embedder: HashingEmbedder;
}

/**
 * Services built on the current connection - cleared on database change
 */
let _cachedServices: Omit<DatabaseServices, 'db'> | null = null;

/**
 * The embedder every database opened by this server must match
 */
export function getEmbedder(): HashingEmbedder {
  return new HashingEmbedder(state.config.embedding.dimensions);
}

/**
 * Require database to be selected - FAIL FAST if not
 *
 * @throws MCPError with DATABASE_NOT_SELECTED if no database is selected
 */
export function requireDatabase(): DatabaseServices {
  if (!state.currentDatabase) {
    throw databaseNotSelectedError();
  }

  if (!_cachedServices) {
    const conn = state.currentDatabase.getConnection();
    _cachedServices = {
      vector: new VectorService(conn),
      lexical: new Bm25LexicalSource(conn),
      embedder: getEmbedder(),
    };
  }
  return { db: state.currentDatabase, ..._cachedServices };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

function setCurrent(db: DatabaseService | null, name: string | null): void {
  if (state.currentDatabase) {
    state.currentDatabase.close();
  }
  state.currentDatabase = db;
  state.currentDatabaseName = name;
  _cachedServices = null;
}

/**
 * Select a database by name - opens connection and sets as current
 *
 * @throws MCPError with DATABASE_NOT_FOUND if database doesn't exist
 * @throws ConfigurationError if the database was built with another embedder
 */
export function selectDatabase(name: string): void {
  const path = state.config.storagePath;
  setCurrent(null, null);

  if (!DatabaseService.exists(name, path)) {
    throw databaseNotFoundError(name, path);
  }

  const embedder = getEmbedder();
  setCurrent(DatabaseService.open(name, path, embedder), name);
}

/**
 * Select a database, creating it first when it does not exist
 *
 * @returns true when the database was created
 */
export function selectOrCreateDatabase(name: string): boolean {
  const path = state.config.storagePath;
  if (DatabaseService.exists(name, path)) {
    if (state.currentDatabaseName !== name) selectDatabase(name);
    return false;
  }

  const db = DatabaseService.create(name, getEmbedder(), undefined, path);
  setCurrent(db, name);
  console.error(`[INFO] Created database "${name}" at ${db.getPath()}`);
  return true;
}

/**
 * Clear current database selection - closes connection
 */
export function clearDatabase(): void {
  if (state.currentDatabase) {
    setCurrent(null, null);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export function getConfig(): SearchConfig {
  return state.config;
}

/**
 * Install a loaded configuration. Closes the current database, whose
 * services were built for the previous one.
 */
export function setConfig(config: SearchConfig): void {
  clearDatabase();
  state.config = config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  clearDatabase();
  state.config = DEFAULT_SEARCH_CONFIG;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS EXIT CLEANUP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Close the connection on exit so WAL/SHM files are checkpointed.
 */
process.on('exit', () => {
  if (state.currentDatabase) {
    try {
      state.currentDatabase.close();
    } catch (error) {
      console.error(`[WARN] Failed to close database on exit: ${error instanceof Error ? error.message : String(error)}`);
    }
    state.currentDatabase = null;
    state.currentDatabaseName = null;
  }
});
