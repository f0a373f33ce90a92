/**
 * Error class for database migration failures
 *
 * @module migrations/types
 */

export type MigrationOperation =
  | 'pragma'
  | 'create_table'
  | 'create_index'
  | 'query'
  | 'version_check';

export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly operation: MigrationOperation,
    public readonly tableName?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}
