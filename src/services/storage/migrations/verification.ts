/**
 * Schema verification used by the health tool
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_INDEXES, REQUIRED_TABLES } from './schema-definitions.js';

/**
 * Report missing tables and indexes
 */
export function verifySchema(db: Database.Database): {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
} {
  const rows = db
    .prepare(`SELECT type, name FROM sqlite_master WHERE type IN ('table', 'index')`)
    .all() as Array<{ type: string; name: string }>;

  const tables = new Set(rows.filter((r) => r.type === 'table').map((r) => r.name));
  const indexes = new Set(rows.filter((r) => r.type === 'index').map((r) => r.name));

  const missingTables = REQUIRED_TABLES.filter((t) => !tables.has(t));
  const missingIndexes = REQUIRED_INDEXES.filter((i) => !indexes.has(i));

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0,
    missingTables,
    missingIndexes,
  };
}
