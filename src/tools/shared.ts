/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { ExtractorError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Per-request extras supplied by the MCP server; the signal aborts on client cancellation */
export interface ToolExtra {
  signal?: AbortSignal;
}

/** Tool handler function signature */
export type ToolHandler = (params: Record<string, unknown>, extra?: ToolExtra) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: z.ZodRawShape;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Max response size before arrays are truncated (700KB) */
const MAX_RESPONSE_BYTES = 700 * 1024;

/**
 * Format tool result as MCP content response.
 * If the serialized JSON exceeds MAX_RESPONSE_BYTES, arrays are progressively
 * truncated and a `_response_truncated` note is injected.
 */
export function formatResponse(result: unknown): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= MAX_RESPONSE_BYTES || !isRecord(result)) {
    return { content: [{ type: 'text', text: json }] };
  }

  const truncated = truncateResult(result, MAX_RESPONSE_BYTES);
  return { content: [{ type: 'text', text: JSON.stringify(truncated, null, 2) }] };
}

/**
 * Truncate the largest arrays first until the result fits within maxBytes.
 */
function truncateResult(obj: Record<string, unknown>, maxBytes: number): Record<string, unknown> {
  const arrays: { path: string[]; arr: unknown[]; size: number }[] = [];
  findArrays(obj, [], arrays);
  arrays.sort((a, b) => b.size - a.size);

  const cloned: unknown = JSON.parse(JSON.stringify(obj));
  const copy = isRecord(cloned) ? cloned : {};
  let currentSize = JSON.stringify(copy, null, 2).length;
  const truncatedFields: string[] = [];

  for (const { path, arr } of arrays) {
    if (currentSize <= maxBytes) break;
    if (arr.length <= 5) continue;

    const cap = Math.min(50, Math.max(5, Math.floor(arr.length * 0.1)));
    setNestedValue(copy, path, arr.slice(0, cap));
    setNestedValue(copy, [...path.slice(0, -1), `_${path[path.length - 1]}_total`], arr.length);

    truncatedFields.push(`${path.join('.')} (${arr.length} → ${cap})`);
    currentSize = JSON.stringify(copy, null, 2).length;
  }

  if (truncatedFields.length > 0) {
    copy._response_truncated = {
      reason: `Response exceeded ${Math.round(maxBytes / 1024)}KB limit`,
      truncated_fields: truncatedFields,
      suggestion: 'Use limit/offset parameters or more specific filters to reduce response size',
    };
  }

  if (currentSize > maxBytes) {
    return {
      _response_truncated: {
        reason: `Response exceeded ${Math.round(maxBytes / 1024)}KB limit and could not be reduced by array truncation`,
        original_size_bytes: JSON.stringify(obj, null, 2).length,
      },
    };
  }

  return copy;
}

function findArrays(obj: unknown, path: string[], result: { path: string[]; arr: unknown[]; size: number }[]): void {
  if (Array.isArray(obj)) {
    result.push({ path: [...path], arr: obj, size: JSON.stringify(obj).length });
    return;
  }
  if (isRecord(obj)) {
    for (const [key, value] of Object.entries(obj)) {
      findArrays(value, [...path, key], result);
    }
  }
}

function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current: Record<string, unknown> = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const next = current[path[i]];
    if (!isRecord(next)) return;
    current = next;
  }
  current[path[path.length - 1]] = value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Handle errors uniformly
 */
export function handleError(error: unknown): ToolResponse {
  const extractorError = ExtractorError.fromUnknown(error);
  console.error(`[ERROR] ${extractorError.category}: ${extractorError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(extractorError), null, 2) }],
    isError: true,
  };
}
