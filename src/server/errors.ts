/**
 * MCP Server Error Handling
 *
 * Every failure reaching the tool surface becomes an ExtractorError with a
 * category, a message and a recovery hint naming the tool to call next.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // LLM or embedding endpoint unreachable, timed out, or circuit open
  | 'SERVICE_UNAVAILABLE'

  // LLM output did not match the field schema
  | 'SCHEMA_VIOLATION'

  // Value had no support in the source text
  | 'ZERO_EVIDENCE'

  // Example store or feedback write failed
  | 'PERSISTENCE_ERROR'

  // Some batches of a run failed
  | 'PARTIAL_BATCH_FAILURE'

  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map error class names to categories so clients can tell an unreachable
 * model service from a locked database from bad input.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  // Validation
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',

  // Storage
  DatabaseError: 'PERSISTENCE_ERROR',
  MigrationError: 'PERSISTENCE_ERROR',

  // Model services
  EmbeddingError: 'SERVICE_UNAVAILABLE',
  ServiceRequestError: 'SERVICE_UNAVAILABLE',
  CircuitBreakerOpenError: 'SERVICE_UNAVAILABLE',

  // Engine wiring
  ExtractionConfigurationError: 'CONFIGURATION_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTOR ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * ExtractorError - Structured error for all MCP tool failures
 */
export class ExtractorError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ExtractorError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExtractorError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): ExtractorError {
    if (error instanceof ExtractorError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;

      // Preserve diagnostic properties from custom error classes (DatabaseError, EmbeddingError, etc.)
      const customCode = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      const customDetails = 'details' in error && isRecord(error.details) ? error.details : undefined;
      return new ExtractorError(category, error.message, {
        originalName: error.name,
        ...(customCode && { errorCode: customCode }),
        ...(customDetails && { errorDetails: customDetails }),
        stack: error.stack,
      });
    }

    return new ExtractorError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint telling the agent which tool to call next.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  SERVICE_UNAVAILABLE: {
    tool: 'extract_health',
    hint: 'Check that Ollama is running at OLLAMA_BASE_URL and the configured models are pulled',
  },
  SCHEMA_VIOLATION: {
    tool: 'extract_fields',
    hint: 'Retry the run; affected fields were defaulted and flagged low_confidence',
  },
  ZERO_EVIDENCE: {
    tool: 'extract_record_feedback',
    hint: 'Review the field against the source and record a correction if the value exists',
  },
  PERSISTENCE_ERROR: {
    tool: 'extract_health',
    hint: 'Check EXTRACTOR_DB_PATH is writable and not locked by another process',
  },
  PARTIAL_BATCH_FAILURE: {
    tool: 'extract_fields',
    hint: 'Re-run extraction; fields of failed batches are reported as unresolved',
  },
  VALIDATION_ERROR: { tool: 'extract_fields', hint: 'Check parameter types and required fields' },
  CONFIGURATION_ERROR: {
    tool: 'extract_health',
    hint: 'Check EXTRACTOR_* and OLLAMA_* environment variables and EXTRACTOR_TEMPLATES_DIR',
  },
  INTERNAL_ERROR: { tool: 'extract_health', hint: 'Run extract_health for diagnostics' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format ExtractorError for tool response
 */
export function formatErrorResponse(error: ExtractorError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): ExtractorError {
  return new ExtractorError('VALIDATION_ERROR', message, details);
}

export function configurationError(message: string, details?: Record<string, unknown>): ExtractorError {
  return new ExtractorError('CONFIGURATION_ERROR', message, details);
}

export function exampleNotFoundError(exampleId: string): ExtractorError {
  return new ExtractorError(
    'VALIDATION_ERROR',
    `Example not found: ${exampleId}. Use extract_list_examples to browse stored examples.`,
    { exampleId }
  );
}
