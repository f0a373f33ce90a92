/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
export interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}
