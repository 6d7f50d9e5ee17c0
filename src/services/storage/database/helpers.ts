/**
 * Helper functions for DatabaseService
 *
 * Contains utility functions for validation, path resolution and batched
 * query execution.
 */

import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Default storage path for databases
 */
export const DEFAULT_STORAGE_PATH = join(homedir(), '.hybrid-search', 'databases');

/**
 * Valid database name pattern: alphanumeric, underscores, hyphens
 */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Validate database name format
 */
export function validateName(name: string): void {
  if (!name) {
    throw new DatabaseError('Database name is required', DatabaseErrorCode.INVALID_NAME);
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

/**
 * Get full database path
 */
export function getDatabasePath(name: string, storagePath?: string): string {
  return join(storagePath ?? DEFAULT_STORAGE_PATH, `${name}.db`);
}

/**
 * SQLite caps bound parameters per statement; 500 stays well under it.
 */
const DEFAULT_BATCH_SIZE = 500;

/**
 * Execute a query callback in batches to stay under SQLite's parameter limit
 * when building `IN (?, ?, ...)` clauses.
 *
 * @param ids - Full array of IDs to process
 * @param callback - Function that receives a batch of IDs and returns results
 * @param batchSize - Maximum IDs per batch (default 500)
 * @returns Concatenated results from all batches
 */
export function batchedQuery<T>(
  ids: readonly string[],
  callback: (batch: string[]) => T[],
  batchSize: number = DEFAULT_BATCH_SIZE
): T[] {
  if (ids.length === 0) return [];

  const results: T[] = [];
  for (let i = 0; i < ids.length; i += batchSize) {
    results.push(...callback(ids.slice(i, i + batchSize)));
  }
  return results;
}
