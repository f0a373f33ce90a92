/**
 * Schema steps run by initializeDatabase
 *
 * Each statement runs through `step`, which turns a SQLite failure into a
 * MigrationError naming the operation and the object it touched.
 *
 * @module migrations/schema-helpers
 */

import type Database from 'better-sqlite3';
import { type MigrationOperation, MigrationError } from './types.js';
import {
  DATABASE_PRAGMAS,
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_INDEXES,
  TABLE_DEFINITIONS,
  SCHEMA_VERSION,
} from './schema-definitions.js';

const INDEX_NAME = /CREATE INDEX IF NOT EXISTS (\w+)/;

function step(operation: MigrationOperation, target: string, run: () => void): void {
  try {
    run();
  } catch (error) {
    throw new MigrationError(`Migration step ${operation} failed for ${target}`, operation, target, error);
  }
}

/** Runs outside any transaction; journal_mode cannot change inside one */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    step('pragma', pragma, () => db.exec(pragma));
  }
}

export function createTables(db: Database.Database): void {
  for (const { name, sql } of TABLE_DEFINITIONS) {
    step('create_table', name, () => db.exec(sql));
  }
}

export function createIndexes(db: Database.Database): void {
  for (const sql of CREATE_INDEXES) {
    step('create_index', INDEX_NAME.exec(sql)?.[1] ?? 'unknown', () => db.exec(sql));
  }
}

/**
 * Stamp SCHEMA_VERSION into the single schema_version row
 */
export function initializeSchemaVersion(db: Database.Database): void {
  step('create_table', 'schema_version', () => {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);
    const now = new Date().toISOString();
    db.prepare(
      `INSERT INTO schema_version (id, version, created_at, updated_at) VALUES (1, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at`
    ).run(SCHEMA_VERSION, now, now);
  });
}
