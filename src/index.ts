/**
 * RAG Field Extractor MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes schema-driven field extraction, feedback and example curation
 * tools via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

// Load .env from multiple candidate locations (first found wins):
// 1. EXTRACTOR_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (development)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.EXTRACTOR_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

// Default templates directory ships next to the package
if (!process.env.EXTRACTOR_TEMPLATES_DIR) {
  const bundled = path.resolve(__dirname, '..', 'templates');
  if (fs.existsSync(bundled) && !fs.existsSync(path.resolve(process.cwd(), 'templates'))) {
    process.env.EXTRACTOR_TEMPLATES_DIR = bundled;
  }
}

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServerContext } from './server/context.js';
import { registerAllTools } from './server/register-tools.js';
import { validateStartupDependencies } from './server/startup.js';

// =============================================================================
// SERVER INITIALIZATION
// =============================================================================

const ctx = createServerContext();

const server = new McpServer({
  name: 'rag-field-extractor',
  version: '0.1.0',
});

// =============================================================================
// TOOL REGISTRATION
// =============================================================================

const toolCount = registerAllTools(server, ctx);

// =============================================================================
// SERVER STARTUP
// =============================================================================

async function main(): Promise<void> {
  validateStartupDependencies(ctx);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('RAG Field Extractor MCP Server running on stdio');
  console.error(`Tools registered: ${toolCount}`);
  console.error(`Example store: ${ctx.database.getPath()}`);
}

// Graceful shutdown handler
function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  server
    .close()
    .then(() => {
      ctx.database.close();
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err) => {
      console.error(`[Shutdown] Error closing server: ${err}`);
      process.exit(1);
    });
  // Force exit after 5s if graceful shutdown hangs
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 5000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
