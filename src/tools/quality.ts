/**
 * Example Quality MCP Tools
 *
 * Tools: extract_quality_stats, extract_run_curation, extract_list_examples,
 *        extract_get_example, extract_seed_examples
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/quality
 */

import { z } from 'zod';
import type { Example } from '../models/example.js';
import type { ServerContext } from '../server/context.js';
import { exampleNotFoundError } from '../server/errors.js';
import { successResult } from '../server/types.js';
import { qualityScore, successRate } from '../services/examples/ranking.js';
import { seedExamples } from '../services/examples/seed.js';
import { roundTo } from '../utils/math.js';
import { IdentifierSchema, PaginationSchema, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const ListExamplesShape = {
  domain_category: IdentifierSchema.optional().describe('Filter by domain category'),
  variant: IdentifierSchema.optional().describe('Filter by template variant'),
  field_name: IdentifierSchema.optional().describe('Filter by field'),
  include_deprioritized: z.boolean().default(false).describe('Include examples removed by curation'),
  ...PaginationSchema.shape,
};

const GetExampleShape = {
  example_id: z.string().min(1).describe('Example ID'),
};

const SeedExamplesShape = {
  file_path: z.string().min(1).describe('JSON file of the form { "examples": [...] }'),
};

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Example without its raw vector
 */
export function serializeExample(example: Example): Record<string, unknown> {
  const { embedding, ...rest } = example;
  return {
    ...rest,
    embedding_dimensions: embedding ? embedding.length : null,
    success_rate: roundTo(successRate(example)),
    quality_score: roundTo(qualityScore(example)),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export function createQualityTools(ctx: ServerContext): Record<string, ToolDefinition> {
  async function handleQualityStats(): Promise<ToolResponse> {
    try {
      return formatResponse(successResult(ctx.database.getQualityStats()));
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleRunCuration(): Promise<ToolResponse> {
    try {
      return formatResponse(successResult(await ctx.curator.runCuration()));
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleListExamples(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(z.object(ListExamplesShape), params);
      const examples = ctx.store.list(input);
      return formatResponse(
        successResult({
          examples: examples.map(serializeExample),
          count: examples.length,
          limit: input.limit,
          offset: input.offset,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleGetExample(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(z.object(GetExampleShape), params);
      const example = ctx.store.get(input.example_id);
      if (!example) throw exampleNotFoundError(input.example_id);
      return formatResponse(
        successResult({
          example: serializeExample(example),
          feedback: ctx.database
            .listFeedbackByField(example.field_name)
            .filter((record) => record.example_id === example.id),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleSeedExamples(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(z.object(SeedExamplesShape), params);
      return formatResponse(successResult(await seedExamples(ctx.store, ctx.embedder, input.file_path)));
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    extract_quality_stats: {
      description:
        '[STATUS] Example store quality: totals, success rate, average confidence, per-field and per-category breakdown, feedback counts.',
      inputSchema: {},
      handler: handleQualityStats,
    },
    extract_run_curation: {
      description:
        '[MAINTENANCE] Deprioritize examples with a low success rate, restore recovered ones, and backfill missing embeddings.',
      inputSchema: {},
      handler: handleRunCuration,
    },
    extract_list_examples: {
      description: '[STATUS] Browse stored examples, newest first. Vectors are omitted.',
      inputSchema: ListExamplesShape,
      handler: handleListExamples,
    },
    extract_get_example: {
      description: '[STATUS] One stored example with the feedback recorded against it.',
      inputSchema: GetExampleShape,
      handler: handleGetExample,
    },
    extract_seed_examples: {
      description: '[SETUP] Load curated examples from a JSON file. Entries already stored for the same field and context are skipped.',
      inputSchema: SeedExamplesShape,
      handler: handleSeedExamples,
    },
  };
}
