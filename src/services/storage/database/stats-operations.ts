/**
 * Quality statistics for ExampleDatabase
 *
 * Aggregates run in SQL; rates are derived from summed counters so that
 * heavily used examples weigh more than idle ones.
 */

import Database from 'better-sqlite3';
import type { FeedbackType } from '../../../models/feedback.js';
import { roundTo } from '../../../utils/math.js';
import type { CategoryQualityStats, FieldQualityStats, QualityStats } from './types.js';

/** Confidence tier boundaries for quality_distribution */
export const QUALITY_TIERS = {
  HIGH: 0.9,
  MEDIUM: 0.7,
} as const;

interface TotalsRow {
  total: number;
  deprioritized: number | null;
  with_embedding: number | null;
  avg_confidence: number | null;
  usage: number | null;
  success: number | null;
  high: number | null;
  medium: number | null;
  low: number | null;
}

interface FieldRow {
  field_name: string;
  total: number;
  active: number;
  avg_confidence: number;
  usage: number;
  success: number;
}

function rate(success: number, usage: number): number | null {
  return usage > 0 ? roundTo(success / usage) : null;
}

export function getQualityStats(db: Database.Database): QualityStats {
  const totals = db
    .prepare(
      `SELECT
         COUNT(*) AS total,
         SUM(deprioritized) AS deprioritized,
         SUM(CASE WHEN embedding IS NOT NULL THEN 1 ELSE 0 END) AS with_embedding,
         AVG(confidence_score) AS avg_confidence,
         SUM(usage_count) AS usage,
         SUM(success_count) AS success,
         SUM(CASE WHEN confidence_score >= ? THEN 1 ELSE 0 END) AS high,
         SUM(CASE WHEN confidence_score >= ? AND confidence_score < ? THEN 1 ELSE 0 END) AS medium,
         SUM(CASE WHEN confidence_score < ? THEN 1 ELSE 0 END) AS low
       FROM examples`
    )
    .get(QUALITY_TIERS.HIGH, QUALITY_TIERS.MEDIUM, QUALITY_TIERS.HIGH, QUALITY_TIERS.MEDIUM) as TotalsRow;

  const fieldRows = db
    .prepare(
      `SELECT
         field_name,
         COUNT(*) AS total,
         SUM(CASE WHEN deprioritized = 0 THEN 1 ELSE 0 END) AS active,
         AVG(confidence_score) AS avg_confidence,
         SUM(usage_count) AS usage,
         SUM(success_count) AS success
       FROM examples
       GROUP BY field_name
       ORDER BY total DESC, field_name ASC`
    )
    .all() as FieldRow[];

  const categoryRows = db
    .prepare(
      `SELECT domain_category, variant, COUNT(*) AS total_examples, AVG(confidence_score) AS avg_confidence
       FROM examples
       GROUP BY domain_category, variant
       ORDER BY total_examples DESC, domain_category ASC, variant ASC`
    )
    .all() as CategoryQualityStats[];

  const feedbackRows = db
    .prepare('SELECT feedback_type, COUNT(*) AS count FROM feedback GROUP BY feedback_type')
    .all() as Array<{ feedback_type: FeedbackType; count: number }>;

  const feedbackCounts: Record<FeedbackType, number> = {
    correction: 0,
    confirmation: 0,
    rejection: 0,
  };
  for (const row of feedbackRows) {
    feedbackCounts[row.feedback_type] = row.count;
  }

  const perField: FieldQualityStats[] = fieldRows.map((row) => ({
    field_name: row.field_name,
    total_examples: row.total,
    active_examples: row.active,
    avg_confidence: roundTo(row.avg_confidence),
    usage_count: row.usage,
    success_count: row.success,
    success_rate: rate(row.success, row.usage),
  }));

  const deprioritized = totals.deprioritized ?? 0;

  return {
    total_examples: totals.total,
    active_examples: totals.total - deprioritized,
    deprioritized_examples: deprioritized,
    examples_with_embedding: totals.with_embedding ?? 0,
    success_rate: rate(totals.success ?? 0, totals.usage ?? 0),
    avg_confidence: totals.avg_confidence === null ? null : roundTo(totals.avg_confidence),
    per_field_breakdown: perField,
    by_category: categoryRows.map((row) => ({
      ...row,
      avg_confidence: roundTo(row.avg_confidence),
    })),
    quality_distribution: {
      high: totals.high ?? 0,
      medium: totals.medium ?? 0,
      low: totals.low ?? 0,
    },
    feedback_counts: feedbackCounts,
  };
}
