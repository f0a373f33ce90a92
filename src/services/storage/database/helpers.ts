/**
 * Helper functions for ExampleDatabase
 *
 * Path resolution and SQLite constraint error translation.
 */

import Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Default database file location
 */
export const DEFAULT_DATABASE_PATH = join(homedir(), '.rag-field-extractor', 'examples.db');

/**
 * Run a statement, converting SQLite constraint failures into DatabaseError.
 *
 * @param context - Error context message (e.g. "inserting feedback for field=psi")
 */
export function runWithConstraintCheck(
  stmt: Database.Statement,
  params: unknown[],
  context: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    if (error instanceof Error && error.message.includes('FOREIGN KEY constraint failed')) {
      throw new DatabaseError(
        `Foreign key violation ${context}`,
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        error
      );
    }
    if (error instanceof Error && error.message.includes('constraint failed')) {
      throw new DatabaseError(
        `Constraint violation ${context}: ${error.message}`,
        DatabaseErrorCode.CONSTRAINT_VIOLATION,
        error
      );
    }
    if (error instanceof Error && /database is locked|SQLITE_BUSY/i.test(error.message)) {
      throw new DatabaseError(`Database locked ${context}`, DatabaseErrorCode.DATABASE_LOCKED, error);
    }
    throw error;
  }
}
