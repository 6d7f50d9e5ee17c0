/**
 * Migration error type
 *
 * @module migrations/types
 */

export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly tableName?: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'MigrationError';
  }
}
