/**
 * Input validation helpers built on zod.
 *
 * Every public operation and MCP tool validates its parameters here before
 * touching the engine or the database.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Thrown when caller-supplied input fails schema validation
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parse `input` with `schema`, throwing ValidationError with every issue
 * joined into one message (`path: message; path: message`).
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/** Non-empty identifier such as a field name, category or variant */
export const IdentifierSchema = z.string().trim().min(1, 'must not be empty').max(200);

/** Pagination shared by list tools */
export const PaginationSchema = z.object({
  limit: z.number().int().min(1).max(500).default(50),
  offset: z.number().int().min(0).default(0),
});
