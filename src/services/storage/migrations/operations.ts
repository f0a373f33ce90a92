/**
 * Schema initialization and version checks
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import {
  configurePragmas,
  createIndexes,
  createTables,
  initializeSchemaVersion,
} from './schema-helpers.js';

/**
 * Current schema version of the database, or 0 if not initialized
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`)
      .get();
    if (!tableExists) {
      return 0;
    }

    const row = db.prepare('SELECT version FROM schema_version WHERE id = ?').get(1) as
      | { version: number }
      | undefined;
    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Create tables, indexes and the version stamp. Idempotent.
 *
 * The version is stamped last inside the transaction, so an interrupted
 * initialization leaves version 0 and is redone on the next open.
 *
 * @throws MigrationError if any step fails, or the file was written by a
 * newer schema version
 */
export function initializeDatabase(db: Database.Database): void {
  configurePragmas(db);

  const existing = checkSchemaVersion(db);
  if (existing > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version ${existing} is newer than supported version ${SCHEMA_VERSION}`,
      'version_check',
      'schema_version'
    );
  }

  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    initializeSchemaVersion(db);
  });

  initTransaction();
}
