/**
 * Interfaces of the external collaborators the engine consumes.
 *
 * Concrete implementations live under services/ (Ollama clients, file-based
 * providers); tests substitute in-process fakes.
 */

import { z } from 'zod';
import type { FieldSchemaEntry } from './field-schema.js';

export const LineItemSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  quantity: z.number().optional(),
  attributes: z.record(z.string()).optional(),
});

/** Structured line item accompanying the source document (main item, add-ons) */
export type LineItem = z.infer<typeof LineItemSchema>;

export interface SourceDocument {
  text: string;
  lineItems: LineItem[];
}

export interface SourceTextProvider {
  getSource(handle: string): Promise<SourceDocument>;
}

export interface TemplateSchemaProvider {
  getSchema(variant: string): Promise<FieldSchemaEntry[]>;
}

export interface EmbeddingProvider {
  /** Model identifier stored alongside each vector */
  readonly model: string;
  embed(text: string, signal?: AbortSignal): Promise<Float32Array>;
}

export interface LLMRequest {
  prompt: string;
  /** Field names the response must cover, for providers that constrain output */
  fieldNames: string[];
  signal?: AbortSignal;
}

export interface LLMResponse {
  text: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  processingTimeMs: number;
}

export interface LLMProvider {
  generate(request: LLMRequest): Promise<LLMResponse>;
}

/**
 * Render a line item as one line of plain text.
 */
export function lineItemToText(item: LineItem): string {
  const parts = [item.quantity !== undefined ? `${item.quantity} x ${item.name}` : item.name];
  if (item.description) parts.push(item.description);
  if (item.attributes) {
    for (const [key, value] of Object.entries(item.attributes)) {
      parts.push(`${key}: ${value}`);
    }
  }
  return parts.join(' - ');
}
