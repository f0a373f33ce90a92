/**
 * Tests for shared tool utilities and tool registration
 *
 * @module tests/unit/tools/shared
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { describe, it, expect, afterEach } from 'vitest';
import type { ServerContext } from '../../../src/server/context.js';
import { createToolModules, registerAllTools } from '../../../src/server/register-tools.js';
import { formatResponse, handleError } from '../../../src/tools/shared.js';
import { ValidationError } from '../../../src/utils/validation.js';
import { answeringLLM, createTestContext, safeClose } from '../helpers.js';

describe('formatResponse', () => {
  it('should pass small results through', () => {
    const response = formatResponse({ success: true, data: { count: 1 } });
    expect(JSON.parse(response.content[0].text)).toEqual({ success: true, data: { count: 1 } });
    expect(response.isError).toBeUndefined();
  });

  it('should truncate the largest arrays of an oversized result', () => {
    const items = Array.from({ length: 3000 }, (_, i) => `${i}:${'x'.repeat(300)}`);
    const response = formatResponse({ items, count: 3000 });

    const body = JSON.parse(response.content[0].text);
    expect(body.items).toHaveLength(50);
    expect(body.items[0]).toBe(items[0]);
    expect(body._items_total).toBe(3000);
    expect(body.count).toBe(3000);
    expect(body._response_truncated.truncated_fields).toEqual(['items (3000 → 50)']);
  });
});

describe('handleError', () => {
  it('should format the error with a recovery hint', () => {
    const response = handleError(new ValidationError('k: Expected number'));
    expect(response.isError).toBe(true);
    const body = JSON.parse(response.content[0].text);
    expect(body.success).toBe(false);
    expect(body.error.category).toBe('VALIDATION_ERROR');
    expect(body.error.message).toBe('k: Expected number');
    expect(body.error.recovery.tool).toBe('extract_fields');
  });
});

describe('registerAllTools', () => {
  let ctx: ServerContext | undefined;

  afterEach(() => {
    safeClose(ctx?.database);
  });

  it('should register every tool once', () => {
    ctx = createTestContext(answeringLLM({}));
    const server = new McpServer({ name: 'test-server', version: '0.0.0' });

    expect(registerAllTools(server, ctx)).toBe(9);
    const names = createToolModules(ctx).flatMap((module) => Object.keys(module));
    expect(names).toEqual([
      'extract_fields',
      'extract_document',
      'extract_record_feedback',
      'extract_quality_stats',
      'extract_run_curation',
      'extract_list_examples',
      'extract_get_example',
      'extract_seed_examples',
      'extract_health',
    ]);
  });
});
