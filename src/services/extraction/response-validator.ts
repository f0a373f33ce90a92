/**
 * Structured-output validation for LLM batch responses.
 *
 * @module services/extraction/response-validator
 */

import type { FieldSchemaEntry } from '../../models/field-schema.js';
import type { FieldValue } from '../../models/field-value.js';
import type { PromptViolation } from './prompt-assembler.js';

const TRUE_TOKENS = new Set(['YES', 'TRUE', 'Y', '1', 'X', 'CHECKED']);
const FALSE_TOKENS = new Set(['NO', 'FALSE', 'N', '0', '', 'UNCHECKED']);

export interface BatchValidation {
  /** Values for every field that passed validation */
  values: Map<string, FieldValue>;
  violations: PromptViolation[];
  /** Keys present in the response but not requested */
  unknownKeys: string[];
}

export type JsonParseResult = { ok: true; value: Record<string, unknown> } | { ok: false; error: string };

/**
 * Parse a model response into a JSON object. Tolerates markdown code fences
 * and leading or trailing prose around the object.
 */
export function parseJsonObject(text: string): JsonParseResult {
  let body = text.trim();
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(body);
  if (fenced) body = fenced[1].trim();

  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return { ok: false, error: 'response contains no JSON object' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body.slice(start, end + 1));
  } catch (error) {
    return { ok: false, error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  if (!isRecord(parsed)) {
    return { ok: false, error: 'response JSON is not an object' };
  }
  return { ok: true, value: parsed };
}

export function validateBatchResponse(fields: FieldSchemaEntry[], response: Record<string, unknown>): BatchValidation {
  const values = new Map<string, FieldValue>();
  const violations: PromptViolation[] = [];
  const requested = new Set(fields.map((f) => f.name));

  for (const field of fields) {
    if (!Object.prototype.hasOwnProperty.call(response, field.name)) {
      violations.push({ field: field.name, message: 'missing from response' });
      continue;
    }
    const result = coerceValue(field, response[field.name]);
    if (result.ok) {
      values.set(field.name, result.value);
    } else {
      violations.push({ field: field.name, message: result.error });
    }
  }

  const unknownKeys = Object.keys(response).filter((key) => !requested.has(key));
  return { values, violations, unknownKeys };
}

type Coerced = { ok: true; value: FieldValue } | { ok: false; error: string };

export function coerceValue(field: FieldSchemaEntry, raw: unknown): Coerced {
  switch (field.type) {
    case 'boolean': {
      if (raw === null || raw === false) return { ok: true, value: { type: 'boolean', value: false } };
      if (raw === true) return { ok: true, value: { type: 'boolean', value: true } };
      if (typeof raw === 'string' || typeof raw === 'number') {
        const token = String(raw).trim().toUpperCase();
        if (TRUE_TOKENS.has(token)) return { ok: true, value: { type: 'boolean', value: true } };
        if (FALSE_TOKENS.has(token)) return { ok: true, value: { type: 'boolean', value: false } };
      }
      return { ok: false, error: `expected "YES" or "NO", got ${JSON.stringify(raw)}` };
    }

    case 'enumerated': {
      if (raw === null) return { ok: true, value: { type: 'enumerated', value: '' } };
      if (typeof raw !== 'string') {
        return { ok: false, error: `expected one of the options, got ${JSON.stringify(raw)}` };
      }
      const candidate = raw.trim();
      if (candidate === '') return { ok: true, value: { type: 'enumerated', value: '' } };
      const match = (field.options ?? []).find((o) => o.toLowerCase() === candidate.toLowerCase());
      if (match === undefined) {
        return {
          ok: false,
          error: `"${candidate}" is not one of ${JSON.stringify(field.options ?? [])}`,
        };
      }
      return { ok: true, value: { type: 'enumerated', value: match } };
    }

    case 'text': {
      if (raw === null) return { ok: true, value: { type: 'text', value: '' } };
      if (typeof raw === 'string') return { ok: true, value: { type: 'text', value: raw.trim() } };
      if (typeof raw === 'number' || typeof raw === 'boolean') {
        return { ok: true, value: { type: 'text', value: String(raw) } };
      }
      return { ok: false, error: `expected a string, got ${Array.isArray(raw) ? 'array' : typeof raw}` };
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
