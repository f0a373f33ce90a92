/**
 * Prompt Assembler
 *
 * Builds the per-batch extraction prompt: instructions, response rules, the
 * batch's field descriptors grouped by section, retrieved examples, the
 * relevant window of source text and the structured line items.
 *
 * @module services/extraction/prompt-assembler
 */

import { type FieldSchemaEntry, sectionKey } from '../../models/field-schema.js';
import { BOOLEAN_FALSE, BOOLEAN_TRUE } from '../../models/field-value.js';
import { type LineItem, lineItemToText } from '../../models/ports.js';
import { normalizeWhitespace, readableFieldName, tokenize, truncate } from '../../utils/text.js';
import type { RetrievedExample } from '../retrieval/similarity-retriever.js';
import type { Batch } from './schema-partitioner.js';
import { describeField } from './field-descriptor.js';

export interface PromptInput {
  batch: Batch;
  sourceText: string;
  lineItems: LineItem[];
  examples: Map<string, RetrievedExample[]>;
  domainCategory: string;
  variant: string;
}

export interface PromptLimits {
  maxSourceChars: number;
  exampleContextChars: number;
}

export interface PromptViolation {
  field: string;
  message: string;
}

const SOURCE_OMITTED_MARKER = '[...]';

/** Words too common to rank paragraphs by */
const STOP_WORDS = new Set([
  'the', 'and', 'for', 'with', 'from', 'this', 'that', 'are', 'per', 'type', 'check', 'option',
]);

export function buildExtractionPrompt(input: PromptInput, limits: PromptLimits): string {
  const { batch } = input;
  const sections: string[] = [];

  sections.push(
    `You are extracting structured field values for a "${input.domainCategory}" document ` +
      `(template variant "${input.variant}").\n` +
      'Read the source text and line items and return a single JSON object with exactly one key per field listed below.'
  );

  sections.push(
    [
      'RULES:',
      `- Boolean fields: answer "${BOOLEAN_TRUE}" only when the source explicitly supports it, otherwise "${BOOLEAN_FALSE}".`,
      '- Enumerated fields: answer with one of the listed options exactly as written, or "" when none applies.',
      '- Text fields: copy the value as it appears in the source; answer "" when the source does not state it.',
      '- Never invent values. Do not add keys that are not listed.',
      '- Respond with the JSON object only, no commentary.',
    ].join('\n')
  );

  sections.push(`FIELDS:\n${formatFieldsBySection(batch.fields)}`);

  const exampleBlock = formatExamples(batch.fields, input.examples, limits.exampleContextChars);
  if (exampleBlock) {
    sections.push(`EXAMPLES FROM PREVIOUS DOCUMENTS:\n${exampleBlock}`);
  }

  if (input.lineItems.length > 0) {
    sections.push(`LINE ITEMS:\n${input.lineItems.map((item) => `- ${lineItemToText(item)}`).join('\n')}`);
  }

  const window = selectSourceWindow(input.sourceText, batch.fields, limits.maxSourceChars);
  sections.push(`SOURCE TEXT:\n${window.length > 0 ? window : '(no source text)'}`);

  sections.push(`Return JSON with these keys: ${JSON.stringify(batch.fields.map((f) => f.name))}`);

  return sections.join('\n\n');
}

/**
 * Follow-up prompt after a response failed validation. Repeats the original
 * prompt so the model can produce the complete object again.
 */
export function buildRepairPrompt(originalPrompt: string, violations: PromptViolation[]): string {
  const list = violations.map((v) => `- ${v.field}: ${v.message}`).join('\n');
  return (
    `${originalPrompt}\n\n` +
    `Your previous answer was rejected for these reasons:\n${list}\n\n` +
    'Return the complete corrected JSON object with every listed key.'
  );
}

/**
 * Short, stable description of a document: leading line items plus the
 * opening of the source text. Used as the retrieval query and stored as the
 * input_context of learned examples.
 */
export function buildContextSnippet(
  sourceText: string,
  lineItems: LineItem[],
  limits: { maxLineItems: number; maxChars: number }
): string {
  const parts: string[] = [];
  for (const item of lineItems.slice(0, limits.maxLineItems)) {
    parts.push(lineItemToText(item));
  }
  const text = normalizeWhitespace(sourceText);
  if (text.length > 0) parts.push(text.slice(0, limits.maxChars));
  return parts.join('\n');
}

/**
 * Pick the paragraphs most related to the batch fields, within `maxChars`,
 * and return them in document order. Short documents are returned whole.
 */
export function selectSourceWindow(sourceText: string, fields: FieldSchemaEntry[], maxChars: number): string {
  const text = sourceText.trim();
  if (text.length <= maxChars) return text;

  const paragraphs = text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  const terms = collectTerms(fields);
  const scored = paragraphs.map((paragraph, index) => {
    const tokens = new Set(tokenize(paragraph));
    let hits = 0;
    for (const term of terms) {
      if (tokens.has(term)) hits++;
    }
    return { paragraph, index, hits };
  });

  const ranked = [...scored].sort((a, b) => b.hits - a.hits || a.index - b.index);
  const chosen: typeof scored = [];
  let used = 0;
  for (const candidate of ranked) {
    const cost = candidate.paragraph.length + 2;
    if (used + cost > maxChars) {
      if (chosen.length === 0) {
        chosen.push({ ...candidate, paragraph: candidate.paragraph.slice(0, maxChars) });
        used = maxChars;
      }
      continue;
    }
    chosen.push(candidate);
    used += cost;
  }

  chosen.sort((a, b) => a.index - b.index);
  const out: string[] = [];
  let previous = -1;
  for (const c of chosen) {
    if (c.index !== previous + 1) out.push(SOURCE_OMITTED_MARKER);
    out.push(c.paragraph);
    previous = c.index;
  }
  return out.join('\n\n');
}

function collectTerms(fields: FieldSchemaEntry[]): Set<string> {
  const terms = new Set<string>();
  const add = (text: string): void => {
    for (const token of tokenize(text)) {
      if (token.length >= 3 && !STOP_WORDS.has(token)) terms.add(token);
    }
  };
  for (const field of fields) {
    add(readableFieldName(field.name));
    if (field.description) add(field.description);
    for (const phrase of [...(field.positiveIndicators ?? []), ...(field.synonyms ?? [])]) add(phrase);
    for (const option of field.options ?? []) add(option);
  }
  return terms;
}

function formatFieldsBySection(fields: FieldSchemaEntry[]): string {
  const lines: string[] = [];
  let lastKey: string | null = null;
  for (const field of fields) {
    const key = sectionKey(field);
    if (key !== lastKey) {
      lines.push(`[${key.length > 0 ? key : 'General'}]`);
      lastKey = key;
    }
    lines.push(describeField(field));
  }
  return lines.join('\n');
}

function formatExamples(
  fields: FieldSchemaEntry[],
  examples: Map<string, RetrievedExample[]>,
  contextChars: number
): string {
  const lines: string[] = [];
  for (const field of fields) {
    for (const { example } of examples.get(field.name) ?? []) {
      const context = truncate(normalizeWhitespace(example.input_context), contextChars);
      lines.push(`- "${field.name}": input "${context}" -> ${JSON.stringify(example.expected_output)}`);
    }
  }
  return lines.join('\n');
}
