/**
 * Storage Service Module
 *
 * Corpus databases, schema migrations and the vector store.
 */

export { initializeDatabase, checkSchemaVersion, migrateToLatest } from './migrations/operations.js';
export { verifySchema } from './migrations/verification.js';
export { MigrationError } from './migrations/types.js';
export { DatabaseService, DatabaseError, DatabaseErrorCode, DEFAULT_STORAGE_PATH } from './database/index.js';
export type { DatabaseInfo, DatabaseStats, EmbedderIdentity } from './database/index.js';
export { VectorService, distanceToScore } from './vector.js';
export type { VectorHit } from './vector.js';
