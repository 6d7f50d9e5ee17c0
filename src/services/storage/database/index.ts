/**
 * Database Module - Public API
 *
 * Re-exports all public types, classes, and functions from the database module.
 */

export { MigrationError } from '../migrations/types.js';

export type {
  DatabaseInfo,
  DatabaseStats,
  ListDocumentsOptions,
  MetadataRow,
  UpsertOutcome,
} from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';
export type { EmbedderIdentity } from './static-operations.js';
export { DEFAULT_STORAGE_PATH } from './helpers.js';

export { DatabaseService } from './service.js';
