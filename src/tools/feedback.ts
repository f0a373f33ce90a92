/**
 * Feedback MCP Tools
 *
 * Tools: extract_record_feedback
 *
 * @module tools/feedback
 */

import { z } from 'zod';
import type { ServerContext } from '../server/context.js';
import { successResult } from '../server/types.js';
import { IdentifierSchema, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

const RecordFeedbackShape = {
  field_name: IdentifierSchema.describe('Field the feedback is about'),
  context: z.string().min(1).describe('The "context" returned by extract_fields for this document'),
  original_value: z.string().describe('Value the extraction produced'),
  corrected_value: z.string().describe('Correct value; empty string rejects the prediction'),
  domain_category: IdentifierSchema.optional().describe('Defaults to "general"'),
  variant: IdentifierSchema.optional().describe('Defaults to "default"'),
  example_id: z.string().min(1).optional().describe('Example that produced the original value, when known'),
  feedback_type: z
    .enum(['correction', 'confirmation', 'rejection'])
    .optional()
    .describe('Inferred from the two values when omitted'),
  user_context: z.string().max(2000).optional().describe('Free-text note from the reviewer'),
};

export function createFeedbackTools(ctx: ServerContext): Record<string, ToolDefinition> {
  async function handleRecordFeedback(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(z.object(RecordFeedbackShape), params);
      const outcome = await ctx.feedback.recordFeedback({
        fieldName: input.field_name,
        context: input.context,
        originalValue: input.original_value,
        correctedValue: input.corrected_value,
        domainCategory: input.domain_category,
        variant: input.variant,
        exampleId: input.example_id,
        feedbackType: input.feedback_type,
        userContext: input.user_context,
      });

      return formatResponse(
        successResult({
          feedback_id: outcome.feedbackId,
          feedback_type: outcome.feedbackType,
          example_adjusted: outcome.exampleAdjusted,
          learned: outcome.learned,
          learned_example_id: outcome.learnedExampleId,
          duplicate_of: outcome.duplicateOf,
          ...(outcome.error !== undefined && { error: outcome.error }),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    extract_record_feedback: {
      description:
        '[LEARNING] Record a confirmation, correction or rejection of an extracted value. ' +
        'Corrections become new examples unless the same field and context is already stored.',
      inputSchema: RecordFeedbackShape,
      handler: handleRecordFeedback,
    },
  };
}
