/**
 * Tool plumbing for the hybrid-search MCP server
 *
 * Every search_* tool is a ToolDefinition: zod input fields plus a handler
 * that answers with one JSON text block, success or failure alike. Logs go
 * to stderr; stdout carries the JSON-RPC stream.
 *
 * @module tools/shared
 */

import type { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL SHAPES
// ═══════════════════════════════════════════════════════════════════════════════

/** A single JSON text block, as registered with the MCP server */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }> };

/** Receives raw arguments; each handler validates its own */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

export interface ToolDefinition {
  description: string;
  /** Field name to zod schema, passed to McpServer.tool as the input shape */
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Wrap a result object as pretty-printed JSON text
 */
export function formatResponse(result: unknown): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
  };
}

/**
 * Map any thrown value onto its error category, log it and answer
 * `{success: false, error}`
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return formatResponse(formatErrorResponse(mcpError));
}
