/**
 * Health Check MCP Tools
 *
 * Tools: extract_health
 *
 * Reports database state, model service circuit breakers and the active
 * configuration. With probe=true, also makes one embedding call to check
 * that the model service answers.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import { z } from 'zod';
import type { ServerContext } from '../server/context.js';
import { successResult } from '../server/types.js';
import { OllamaEmbeddingClient } from '../services/embedding/ollama-embedder.js';
import { OllamaLLMClient } from '../services/llm/client.js';
import { checkSchemaVersion } from '../services/storage/migrations/operations.js';
import { validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

const HealthCheckShape = {
  probe: z
    .boolean()
    .default(false)
    .describe('If true, embed a short probe text to verify the embedding service is reachable'),
};

const PROBE_TEXT = 'health check';

export function createHealthTools(ctx: ServerContext): Record<string, ToolDefinition> {
  async function handleHealthCheck(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(z.object(HealthCheckShape), params);
      const warnings: string[] = [];

      const schema = ctx.database.verifySchema();
      if (!schema.valid) {
        warnings.push(
          `Database schema incomplete: missing tables [${schema.missingTables.join(', ')}], indexes [${schema.missingIndexes.join(', ')}]`
        );
      }
      const stats = ctx.database.getQualityStats();
      if (stats.total_examples > stats.examples_with_embedding) {
        warnings.push(
          `${stats.total_examples - stats.examples_with_embedding} example(s) without embeddings; run extract_run_curation to backfill`
        );
      }

      let probe: { ok: boolean; dimensions?: number; error?: string } | null = null;
      if (input.probe) {
        if (!ctx.embedder) {
          probe = { ok: false, error: 'no embedding provider configured' };
        } else {
          try {
            const vector = await ctx.embedder.embed(PROBE_TEXT);
            probe = { ok: true, dimensions: vector.length };
          } catch (error) {
            probe = { ok: false, error: error instanceof Error ? error.message : String(error) };
            warnings.push('Embedding service unreachable; retrieval will run without examples');
          }
        }
      }

      return formatResponse(
        successResult({
          started_at: ctx.startedAt,
          database: {
            path: ctx.database.getPath(),
            schema_version: checkSchemaVersion(ctx.database.getConnection()),
            schema_valid: schema.valid,
            total_examples: stats.total_examples,
            active_examples: stats.active_examples,
            examples_with_embedding: stats.examples_with_embedding,
          },
          llm: ctx.llm instanceof OllamaLLMClient ? ctx.llm.getStatus() : { provider: 'custom' },
          embedding:
            ctx.embedder instanceof OllamaEmbeddingClient
              ? ctx.embedder.getStatus()
              : { provider: ctx.embedder ? 'custom' : 'none', model: ctx.embedder?.model ?? null },
          probe,
          config: {
            batching: ctx.config.batching,
            retrieval: ctx.config.retrieval,
            extraction: ctx.config.extraction,
            evidence: ctx.config.evidence,
            learning_enabled: ctx.config.learning.enabled,
            templates_dir: ctx.config.templatesDir,
            template_variants: ctx.templates.listVariants(),
          },
          warnings,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    extract_health: {
      description:
        '[STATUS] Database, model service and configuration diagnostics. Use probe=true to test the embedding service.',
      inputSchema: HealthCheckShape,
      handler: handleHealthCheck,
    },
  };
}
