/**
 * Shared Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';
import { createExtractionTools } from '../tools/extraction.js';
import { createFeedbackTools } from '../tools/feedback.js';
import { createQualityTools } from '../tools/quality.js';
import { createHealthTools } from '../tools/health.js';
import type { ServerContext } from './context.js';

/**
 * All tool modules in registration order
 */
export function createToolModules(ctx: ServerContext): Record<string, ToolDefinition>[] {
  return [createExtractionTools(ctx), createFeedbackTools(ctx), createQualityTools(ctx), createHealthTools(ctx)];
}

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 * @throws Error if two modules declare the same tool name
 */
export function registerAllTools(server: McpServer, ctx: ServerContext): number {
  const registeredToolNames = new Set<string>();
  let toolCount = 0;

  for (const toolModule of createToolModules(ctx)) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
      }
      registeredToolNames.add(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
      toolCount++;
    }
  }

  return toolCount;
}
