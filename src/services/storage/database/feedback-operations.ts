/**
 * Feedback operations for ExampleDatabase
 */

import Database from 'better-sqlite3';
import type { FeedbackRecord } from '../../../models/feedback.js';
import { rowToFeedback } from './converters.js';
import { runWithConstraintCheck } from './helpers.js';
import type { FeedbackRow } from './types.js';

/**
 * Insert a feedback record
 *
 * @returns The feedback ID
 */
export function insertFeedback(db: Database.Database, record: FeedbackRecord): string {
  const stmt = db.prepare(`
    INSERT INTO feedback (
      id, field_name, domain_category, variant, context_hash, original_prediction,
      corrected_value, feedback_type, example_id, user_context, timestamp
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  runWithConstraintCheck(
    stmt,
    [
      record.id,
      record.field_name,
      record.domain_category,
      record.variant,
      record.context_hash,
      record.original_prediction,
      record.corrected_value,
      record.feedback_type,
      record.example_id,
      record.user_context,
      record.timestamp,
    ],
    `inserting feedback for field_name="${record.field_name}" example_id="${record.example_id}"`
  );

  return record.id;
}

export function getFeedback(db: Database.Database, id: string): FeedbackRecord | null {
  const row = db.prepare('SELECT * FROM feedback WHERE id = ?').get(id) as FeedbackRow | undefined;
  return row ? rowToFeedback(row) : null;
}

/**
 * Feedback for a field, newest first
 */
export function listFeedbackByField(
  db: Database.Database,
  fieldName: string,
  limit: number = 100
): FeedbackRecord[] {
  const rows = db
    .prepare('SELECT * FROM feedback WHERE field_name = ? ORDER BY timestamp DESC, rowid DESC LIMIT ?')
    .all(fieldName, limit) as FeedbackRow[];
  return rows.map(rowToFeedback);
}
