/**
 * Startup Validation
 *
 * Logs configuration problems that disable individual features without
 * stopping the server.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import fs from 'fs';
import type { ServerContext } from './context.js';

/**
 * @returns The warnings that were logged
 */
export function validateStartupDependencies(ctx: ServerContext): string[] {
  const warnings: string[] = [];

  if (!fs.existsSync(ctx.config.templatesDir)) {
    warnings.push(
      `Templates directory ${ctx.config.templatesDir} does not exist. extract_document and extract_fields without a schema will fail. Set EXTRACTOR_TEMPLATES_DIR.`
    );
  }
  if (!ctx.embedder) {
    warnings.push('No embedding provider configured. Extraction will run without retrieved examples.');
  }
  if (!ctx.config.learning.enabled) {
    warnings.push('EXTRACTOR_LEARNING_ENABLED is off. Verified results will not be promoted to examples.');
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  return warnings;
}
