/**
 * Unit tests for MCP Server Error Handling
 *
 * Tests ExtractorError, the error-name mapping, recovery hints and response
 * formatting.
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';
import { ZodError, z } from 'zod';
import {
  ExtractorError,
  configurationError,
  exampleNotFoundError,
  formatErrorResponse,
  getRecoveryHint,
  validationError,
  type ErrorCategory,
} from '../../../src/server/errors.js';
import { EmbeddingError } from '../../../src/services/embedding/ollama-embedder.js';
import { ExtractionConfigurationError } from '../../../src/services/extraction/engine.js';
import { CircuitBreakerOpenError } from '../../../src/services/llm/circuit-breaker.js';
import { ServiceRequestError } from '../../../src/services/llm/http.js';
import { DatabaseError, DatabaseErrorCode } from '../../../src/services/storage/database/types.js';
import { MigrationError } from '../../../src/services/storage/migrations/types.js';
import { ValidationError } from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ExtractorError CLASS TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('ExtractorError', () => {
  it('should carry category, message and details', () => {
    const error = new ExtractorError('VALIDATION_ERROR', 'Invalid input', { field: 'k' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ExtractorError');
    expect(error.category).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Invalid input');
    expect(error.details).toEqual({ field: 'k' });
  });

  it('should serialize to JSON', () => {
    const json = new ExtractorError('INTERNAL_ERROR', 'boom').toJSON();
    expect(json).toMatchObject({ name: 'ExtractorError', category: 'INTERNAL_ERROR', message: 'boom' });
    expect(typeof json.stack).toBe('string');
  });

  describe('fromUnknown', () => {
    it('should return an ExtractorError unchanged', () => {
      const original = validationError('bad');
      expect(ExtractorError.fromUnknown(original)).toBe(original);
    });

    it.each<[string, Error, ErrorCategory]>([
      ['ValidationError', new ValidationError('bad'), 'VALIDATION_ERROR'],
      ['DatabaseError', new DatabaseError('locked', DatabaseErrorCode.DATABASE_LOCKED), 'PERSISTENCE_ERROR'],
      ['MigrationError', new MigrationError('too new', 'version_check'), 'PERSISTENCE_ERROR'],
      ['EmbeddingError', new EmbeddingError('down', 'SERVICE_UNAVAILABLE'), 'SERVICE_UNAVAILABLE'],
      [
        'ServiceRequestError',
        new ServiceRequestError('timeout', { code: 'TIMEOUT', retryable: true, service: 'llm' }),
        'SERVICE_UNAVAILABLE',
      ],
      ['CircuitBreakerOpenError', new CircuitBreakerOpenError('open', 1000), 'SERVICE_UNAVAILABLE'],
      ['ExtractionConfigurationError', new ExtractionConfigurationError('no provider'), 'CONFIGURATION_ERROR'],
      ['Error', new Error('unknown'), 'INTERNAL_ERROR'],
    ])('should map %s to its category', (_name, error, category) => {
      expect(ExtractorError.fromUnknown(error).category).toBe(category);
    });

    it('should map a ZodError to a validation error', () => {
      const result = z.object({ k: z.number() }).safeParse({ k: 'x' });
      expect(result.success).toBe(false);
      const zodError = result.success ? new ZodError([]) : result.error;
      expect(ExtractorError.fromUnknown(zodError).category).toBe('VALIDATION_ERROR');
    });

    it('should keep the error code and details of custom errors', () => {
      const error = ExtractorError.fromUnknown(
        new EmbeddingError('Embedding service unavailable', 'SERVICE_UNAVAILABLE', { model: 'test-embed' })
      );
      expect(error.message).toBe('Embedding service unavailable');
      expect(error.details).toMatchObject({
        originalName: 'EmbeddingError',
        errorCode: 'SERVICE_UNAVAILABLE',
        errorDetails: { model: 'test-embed' },
      });
    });

    it('should honor the default category for unmapped errors', () => {
      expect(ExtractorError.fromUnknown(new Error('x'), 'PARTIAL_BATCH_FAILURE').category).toBe('PARTIAL_BATCH_FAILURE');
    });

    it('should wrap non-Error values', () => {
      const error = ExtractorError.fromUnknown('plain string');
      expect(error.category).toBe('INTERNAL_ERROR');
      expect(error.message).toBe('plain string');
      expect(error.details).toEqual({ originalValue: 'plain string' });
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS AND FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

describe('getRecoveryHint', () => {
  it('should point service failures at the health tool', () => {
    expect(getRecoveryHint('SERVICE_UNAVAILABLE').tool).toBe('extract_health');
  });

  it('should point zero-evidence values at feedback', () => {
    expect(getRecoveryHint('ZERO_EVIDENCE').tool).toBe('extract_record_feedback');
  });
});

describe('formatErrorResponse', () => {
  it('should include category, message, recovery and details', () => {
    const response = formatErrorResponse(configurationError('missing templates dir', { dir: '/nope' }));
    expect(response).toEqual({
      success: false,
      error: {
        category: 'CONFIGURATION_ERROR',
        message: 'missing templates dir',
        recovery: getRecoveryHint('CONFIGURATION_ERROR'),
        details: { dir: '/nope' },
      },
    });
  });
});

describe('exampleNotFoundError', () => {
  it('should name the example and the browsing tool', () => {
    const error = exampleNotFoundError('ex-1');
    expect(error.category).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Example not found: ex-1. Use extract_list_examples to browse stored examples.');
    expect(error.details).toEqual({ exampleId: 'ex-1' });
  });
});
