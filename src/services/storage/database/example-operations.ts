/**
 * Example operations for ExampleDatabase
 *
 * Free functions over a better-sqlite3 connection. Counter updates go
 * through compareAndSetCounters, which only succeeds when the caller's
 * version is still current.
 */

import Database from 'better-sqlite3';
import type { Example, ExampleCounters, ExampleFilter } from '../../../models/example.js';
import { embeddingToBuffer, rowToExample } from './converters.js';
import { runWithConstraintCheck } from './helpers.js';
import type { ExampleRow } from './types.js';

/** SQLite's default host-parameter limit leaves room for this many IN values */
const MAX_IN_PARAMS = 500;

interface ExampleRowWithRowid extends ExampleRow {
  row_id: number;
}

const INSERT_COLUMNS = `
  id, domain_category, variant, field_name, input_context, context_hash, expected_output,
  confidence_score, usage_count, success_count, source, embedding, embedding_model,
  deprioritized, deprioritized_at, version, created_at, last_used_at`;

function exampleParams(example: Example): unknown[] {
  return [
    example.id,
    example.domain_category,
    example.variant,
    example.field_name,
    example.input_context,
    example.context_hash,
    example.expected_output,
    example.confidence_score,
    example.usage_count,
    example.success_count,
    example.source,
    example.embedding ? embeddingToBuffer(example.embedding) : null,
    example.embedding_model,
    example.deprioritized ? 1 : 0,
    example.deprioritized_at,
    example.version,
    example.created_at,
    example.last_used_at,
  ];
}

/**
 * Insert an example record
 *
 * @returns The example ID
 */
export function insertExample(db: Database.Database, example: Example): string {
  const stmt = db.prepare(`INSERT INTO examples (${INSERT_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`);
  runWithConstraintCheck(stmt, exampleParams(example), `inserting example for field_name="${example.field_name}"`);
  return example.id;
}

/**
 * Insert an example unless one already exists for its (field_name,
 * context_hash). The existence check and the insert are one statement.
 *
 * @returns false when an example for that context was already stored
 */
export function insertExampleIfAbsent(db: Database.Database, example: Example): boolean {
  const stmt = db.prepare(`
    INSERT INTO examples (${INSERT_COLUMNS})
    SELECT ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?
    WHERE NOT EXISTS (SELECT 1 FROM examples WHERE field_name = ? AND context_hash = ?)
  `);
  const result = runWithConstraintCheck(
    stmt,
    [...exampleParams(example), example.field_name, example.context_hash],
    `inserting example for field_name="${example.field_name}"`
  );
  return result.changes === 1;
}

export function getExample(db: Database.Database, id: string): Example | null {
  const row = db.prepare('SELECT * FROM examples WHERE id = ?').get(id) as ExampleRow | undefined;
  return row ? rowToExample(row) : null;
}

export function getCounters(db: Database.Database, id: string): ExampleCounters | null {
  const row = db
    .prepare('SELECT id, usage_count, success_count, version FROM examples WHERE id = ?')
    .get(id) as ExampleCounters | undefined;
  return row ?? null;
}

/**
 * Write new counters if the row is still at `expectedVersion`.
 *
 * @returns false when another writer got there first
 */
export function compareAndSetCounters(
  db: Database.Database,
  id: string,
  expectedVersion: number,
  counters: { usage_count: number; success_count: number; last_used_at: string | null }
): boolean {
  const stmt = db.prepare(`
    UPDATE examples
    SET usage_count = ?, success_count = ?, last_used_at = COALESCE(?, last_used_at), version = version + 1
    WHERE id = ? AND version = ?
  `);
  const result = runWithConstraintCheck(
    stmt,
    [counters.usage_count, counters.success_count, counters.last_used_at, id, expectedVersion],
    `updating counters for example "${id}"`
  );
  return result.changes === 1;
}

/**
 * Active examples for one field, newest first. Ranking happens in the store.
 */
export function listActiveByField(
  db: Database.Database,
  domainCategory: string,
  variant: string,
  fieldName: string
): Example[] {
  const rows = db
    .prepare(
      `SELECT * FROM examples
       WHERE domain_category = ? AND variant = ? AND field_name = ? AND deprioritized = 0
       ORDER BY created_at DESC, rowid DESC`
    )
    .all(domainCategory, variant, fieldName) as ExampleRow[];
  return rows.map(rowToExample);
}

/**
 * Active, embedded examples for any of `fieldNames`, newest first.
 */
export function listRetrievalCandidates(
  db: Database.Database,
  domainCategory: string,
  variant: string,
  fieldNames: string[]
): Example[] {
  const examples: Example[] = [];
  for (let i = 0; i < fieldNames.length; i += MAX_IN_PARAMS) {
    const slice = fieldNames.slice(i, i + MAX_IN_PARAMS);
    const placeholders = slice.map(() => '?').join(', ');
    const rows = db
      .prepare(
        `SELECT * FROM examples
         WHERE domain_category = ? AND variant = ? AND deprioritized = 0
           AND embedding IS NOT NULL AND field_name IN (${placeholders})
         ORDER BY created_at DESC, rowid DESC`
      )
      .all(domainCategory, variant, ...slice) as ExampleRow[];
    examples.push(...rows.map(rowToExample));
  }
  return examples;
}

/**
 * Example sharing (field_name, context_hash), preferring active then newest.
 */
export function findByContext(
  db: Database.Database,
  fieldName: string,
  contextHash: string
): Example | null {
  const row = db
    .prepare(
      `SELECT * FROM examples
       WHERE field_name = ? AND context_hash = ?
       ORDER BY deprioritized ASC, created_at DESC, rowid DESC
       LIMIT 1`
    )
    .get(fieldName, contextHash) as ExampleRow | undefined;
  return row ? rowToExample(row) : null;
}

export function listExamples(db: Database.Database, filter: ExampleFilter = {}): Example[] {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (filter.domain_category) {
    conditions.push('domain_category = ?');
    params.push(filter.domain_category);
  }
  if (filter.variant) {
    conditions.push('variant = ?');
    params.push(filter.variant);
  }
  if (filter.field_name) {
    conditions.push('field_name = ?');
    params.push(filter.field_name);
  }
  if (!filter.include_deprioritized) {
    conditions.push('deprioritized = 0');
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  params.push(filter.limit ?? 50, filter.offset ?? 0);

  const rows = db
    .prepare(
      `SELECT * FROM examples ${where} ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`
    )
    .all(...params) as ExampleRow[];
  return rows.map(rowToExample);
}

/**
 * One keyset page of all examples in insertion order, for curation scans.
 */
export function scanPage(
  db: Database.Database,
  afterRowid: number,
  limit: number
): Array<{ rowid: number; example: Example }> {
  const rows = db
    .prepare('SELECT rowid AS row_id, * FROM examples WHERE rowid > ? ORDER BY rowid LIMIT ?')
    .all(afterRowid, limit) as ExampleRowWithRowid[];
  return rows.map((row) => ({ rowid: row.row_id, example: rowToExample(row) }));
}

export function setEmbedding(
  db: Database.Database,
  id: string,
  vector: Float32Array,
  model: string
): boolean {
  const result = db
    .prepare(
      'UPDATE examples SET embedding = ?, embedding_model = ?, version = version + 1 WHERE id = ?'
    )
    .run(embeddingToBuffer(vector), model, id);
  return result.changes === 1;
}

export function setDeprioritized(db: Database.Database, id: string, deprioritized: boolean): boolean {
  const result = db
    .prepare(
      `UPDATE examples
       SET deprioritized = ?, deprioritized_at = ?, version = version + 1
       WHERE id = ?`
    )
    .run(deprioritized ? 1 : 0, deprioritized ? new Date().toISOString() : null, id);
  return result.changes === 1;
}

export function listFieldNames(db: Database.Database): string[] {
  const rows = db
    .prepare('SELECT DISTINCT field_name FROM examples ORDER BY field_name')
    .all() as Array<{ field_name: string }>;
  return rows.map((r) => r.field_name);
}
