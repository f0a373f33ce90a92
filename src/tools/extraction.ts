/**
 * Extraction MCP Tools
 *
 * Tools: extract_fields, extract_document
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/extraction
 */

import { z } from 'zod';
import { FieldSchemaSchema } from '../models/field-schema.js';
import { formatValue } from '../models/field-value.js';
import { LineItemSchema } from '../models/ports.js';
import type { ServerContext } from '../server/context.js';
import { successResult } from '../server/types.js';
import type { ExtractionResult } from '../services/extraction/engine.js';
import { IdentifierSchema, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolExtra, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const ExtractFieldsShape = {
  source_text: z.string().describe('Plain text of the source document'),
  line_items: z
    .array(LineItemSchema)
    .default([])
    .describe('Structured line items accompanying the document (main item, add-ons)'),
  domain_category: IdentifierSchema.describe('Classification of the subject, scopes example retrieval'),
  variant: IdentifierSchema.describe('Template variant whose schema is extracted'),
  schema: FieldSchemaSchema.optional().describe(
    'Field schema to extract; omit to load <variant>.json from the templates directory'
  ),
  k: z.number().int().min(1).max(10).optional().describe('Examples per field (clamped to the configured maximum)'),
  learn: z.boolean().optional().describe('Promote verified high-confidence values into the example store'),
};

const ExtractDocumentShape = {
  path: z.string().min(1).describe('Path of a plain-text document; line items are read from <name>.items.json'),
  domain_category: IdentifierSchema.describe('Classification of the subject, scopes example retrieval'),
  variant: IdentifierSchema.describe('Template variant whose schema is extracted'),
  k: z.number().int().min(1).max(10).optional().describe('Examples per field'),
  learn: z.boolean().optional().describe('Promote verified high-confidence values into the example store'),
};

// ═══════════════════════════════════════════════════════════════════════════════
// RESULT SERIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Tool-facing shape of an extraction result: values rendered as strings
 * (booleans as YES/NO) and fields as an ordered array.
 */
export function serializeExtractionResult(result: ExtractionResult): Record<string, unknown> {
  const fields = [...result.fields.values()].map((field) => ({
    name: field.name,
    type: field.value.type,
    value: formatValue(field.value),
    status: field.status,
    flags: field.flags,
    confidence: field.confidence,
    evidence_backed: field.evidence_backed,
    evidence: field.evidence,
    batch_id: field.batch_id,
    example_ids: field.example_ids,
  }));

  const statusCounts: Record<string, number> = { ok: 0, low_confidence: 0, zero_evidence: 0, unresolved: 0 };
  for (const field of fields) {
    statusCounts[field.status] = (statusCounts[field.status] ?? 0) + 1;
  }

  return {
    values: Object.fromEntries(fields.map((f) => [f.name, f.value])),
    fields,
    status_counts: statusCounts,
    review_queue: result.reviewQueue,
    batches: result.batches,
    partial_failure: result.batches.some((b) => b.status === 'failed'),
    cancelled: result.cancelled,
    warnings: result.warnings,
    post_processing: result.postProcessing,
    promoted_examples: result.promotedExamples,
    context: result.context,
    context_hash: result.contextHash,
    duration_ms: result.durationMs,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export function createExtractionTools(ctx: ServerContext): Record<string, ToolDefinition> {
  async function handleExtractFields(params: Record<string, unknown>, extra?: ToolExtra): Promise<ToolResponse> {
    try {
      const input = validateInput(z.object(ExtractFieldsShape), params);
      const schema = input.schema ?? (await ctx.templates.getSchema(input.variant));

      const result = await ctx.engine.extractFields(
        {
          sourceText: input.source_text,
          lineItems: input.line_items,
          schema,
          domainCategory: input.domain_category,
          variant: input.variant,
          k: input.k,
        },
        { signal: extra?.signal, learnFromResults: input.learn }
      );
      return formatResponse(successResult(serializeExtractionResult(result)));
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleExtractDocument(params: Record<string, unknown>, extra?: ToolExtra): Promise<ToolResponse> {
    try {
      const input = validateInput(z.object(ExtractDocumentShape), params);
      const result = await ctx.engine.extractDocument(input.path, input.variant, input.domain_category, {
        k: input.k,
        signal: extra?.signal,
        learnFromResults: input.learn,
      });
      return formatResponse(successResult(serializeExtractionResult(result)));
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    extract_fields: {
      description:
        '[EXTRACTION] Extract every field of a schema from source text using retrieved examples and evidence verification. ' +
        'Returns per-field value, status and confidence plus a review queue. Pass the returned context to extract_record_feedback.',
      inputSchema: ExtractFieldsShape,
      handler: handleExtractFields,
    },
    extract_document: {
      description:
        '[EXTRACTION] Extract a template variant from a text file on disk, loading the schema from the templates directory.',
      inputSchema: ExtractDocumentShape,
      handler: handleExtractDocument,
    },
  };
}
