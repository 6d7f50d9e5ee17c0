/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results and server state.
 *
 * @module server/types
 */

import type { ErrorCategory } from './errors.js';
import type { DatabaseService } from '../services/storage/database/index.js';
import type { SearchConfig } from '../services/search/config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error structure for failed tool operations
 */
export interface ToolError {
  category: ErrorCategory;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Successful tool result
 */
export interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Failed tool result
 */
export interface ToolResultFailure {
  success: false;
  error: ToolError;
}

/**
 * Union type for all tool results
 */
export type ToolResult<T = unknown> = ToolResultSuccess<T> | ToolResultFailure;

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

/**
 * Helper to create failure result
 */
export function failureResult(
  category: ErrorCategory,
  message: string,
  details?: Record<string, unknown>
): ToolResultFailure {
  return {
    success: false,
    error: { category, message, details },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Currently selected database instance */
  currentDatabase: DatabaseService | null;

  /** Name of the currently selected database */
  currentDatabaseName: string | null;

  /** Loaded at start-up; replaced wholesale, never mutated */
  config: SearchConfig;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE OPERATION RESULTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Database info for listing
 */
export interface DatabaseListItem {
  name: string;
  path: string;
  size_bytes: number;
  created_at: string;
  modified_at: string;
  embedder: string;
  embedding_dimensions: number;
  document_count?: number;
}

/**
 * Result of database selection
 */
export interface DatabaseSelectResult {
  name: string;
  path: string;
  selected: true;
  stats: {
    document_count: number;
    vector_count: number;
  };
}
