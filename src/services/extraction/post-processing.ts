/**
 * Post-Processing Rule Engine
 *
 * Deterministic rules applied to the merged value map after evidence
 * verification, in this order:
 *
 *   1. exclusive groups    at most one YES per group (lowest priority, then schema order)
 *   2. unit normalization  canonical unit spelling on fields that declare a unit
 *   3. summaries           summary fields rebuilt from the current YES selections
 *
 * Every rule is a pure function of the schema and the value map, and the
 * whole chain is idempotent. Dependency checks only produce warnings.
 *
 * @module services/extraction/post-processing
 */

import { type FieldSchemaEntry, sectionKey } from '../../models/field-schema.js';
import { type FieldValue, formatValue, isEmptyValue, valuesEqual } from '../../models/field-value.js';
import { readableFieldName } from '../../utils/text.js';
import { findUnit, formatQuantity, parseSingleQuantity } from './units.js';

export type PostProcessingRule = 'exclusive_group' | 'unit_normalization' | 'summary';

export interface PostProcessingChange {
  field: string;
  rule: PostProcessingRule;
  before: string;
  after: string;
}

export interface PostProcessingResult {
  values: Map<string, FieldValue>;
  changes: PostProcessingChange[];
  warnings: string[];
}

export const SUMMARY_SEPARATOR = '; ';

export function applyPostProcessing(
  schema: FieldSchemaEntry[],
  values: ReadonlyMap<string, FieldValue>
): PostProcessingResult {
  const changes: PostProcessingChange[] = [];
  const steps: Array<[PostProcessingRule, typeof enforceExclusiveGroups]> = [
    ['exclusive_group', enforceExclusiveGroups],
    ['unit_normalization', normalizeUnits],
    ['summary', rebuildSummaries],
  ];

  let current = new Map(values);
  for (const [rule, apply] of steps) {
    const next = apply(schema, current);
    for (const [name, after] of next) {
      const before = current.get(name);
      if (before && !valuesEqual(before, after)) {
        changes.push({ field: name, rule, before: formatValue(before), after: formatValue(after) });
      }
    }
    current = next;
  }

  return { values: current, changes, warnings: checkDependencies(schema, current) };
}

export function enforceExclusiveGroups(
  schema: FieldSchemaEntry[],
  values: ReadonlyMap<string, FieldValue>
): Map<string, FieldValue> {
  const result = new Map(values);
  const groups = new Map<string, Array<{ entry: FieldSchemaEntry; position: number }>>();

  schema.forEach((entry, position) => {
    if (!entry.exclusiveGroup) return;
    const value = values.get(entry.name);
    if (value?.type !== 'boolean' || !value.value) return;
    const members = groups.get(entry.exclusiveGroup) ?? [];
    members.push({ entry, position });
    groups.set(entry.exclusiveGroup, members);
  });

  for (const [group, selected] of groups) {
    if (selected.length <= 1) continue;
    const [winner] = [...selected].sort(
      (a, b) =>
        (a.entry.priority ?? Number.MAX_SAFE_INTEGER) - (b.entry.priority ?? Number.MAX_SAFE_INTEGER) ||
        a.position - b.position
    );
    for (const { entry } of selected) {
      if (entry !== winner.entry) {
        result.set(entry.name, { type: 'boolean', value: false });
      }
    }
    console.error(
      `[PostProcessing] Exclusive group "${group}": kept ${winner.entry.name}, cleared ${selected.length - 1} other selection(s)`
    );
  }

  return result;
}

export function normalizeUnits(
  schema: FieldSchemaEntry[],
  values: ReadonlyMap<string, FieldValue>
): Map<string, FieldValue> {
  const result = new Map(values);
  for (const entry of schema) {
    if (!entry.unit || entry.type !== 'text') continue;
    const value = values.get(entry.name);
    if (value?.type !== 'text' || value.value === '') continue;

    const unit = findUnit(entry.unit);
    const quantity = parseSingleQuantity(value.value);
    if (!unit || !quantity) continue;
    if (quantity.unit !== null && quantity.unit !== unit) continue;

    result.set(entry.name, { type: 'text', value: formatQuantity(quantity.numbers, unit) });
  }
  return result;
}

export function rebuildSummaries(
  schema: FieldSchemaEntry[],
  values: ReadonlyMap<string, FieldValue>
): Map<string, FieldValue> {
  const result = new Map(values);
  for (const summary of schema) {
    if (!summary.summaryOf || !values.has(summary.name)) continue;
    const prefixes = summary.summaryOf;

    const labels: string[] = [];
    for (const entry of schema) {
      if (entry.type !== 'boolean') continue;
      const value = values.get(entry.name);
      if (value?.type !== 'boolean' || !value.value) continue;
      if (!prefixes.some((prefix) => sectionMatches(entry, prefix))) continue;
      labels.push(entry.description ?? readableFieldName(entry.name));
    }

    result.set(summary.name, { type: 'text', value: labels.join(SUMMARY_SEPARATOR) });
  }
  return result;
}

/**
 * Advisory notes for fields filled without their declared companions.
 */
export function checkDependencies(schema: FieldSchemaEntry[], values: ReadonlyMap<string, FieldValue>): string[] {
  const warnings: string[] = [];
  for (const entry of schema) {
    if (!entry.requires) continue;
    const value = values.get(entry.name);
    if (!value || isEmptyValue(value)) continue;
    for (const companion of entry.requires) {
      const other = values.get(companion);
      if (!other || isEmptyValue(other)) {
        warnings.push(`"${entry.name}" is set but required field "${companion}" is empty`);
      }
    }
  }
  return warnings;
}

function sectionMatches(entry: FieldSchemaEntry, prefix: string): boolean {
  if (prefix === '*') return true;
  const key = sectionKey(entry);
  return key === prefix || key.startsWith(`${prefix} > `);
}
