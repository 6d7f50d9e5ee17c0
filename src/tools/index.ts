/**
 * MCP Tool Module Exports
 *
 * Barrel export for all tool modules.
 *
 * @module tools
 */

import type { ToolDefinition } from './shared.js';
import { databaseTools } from './database.js';
import { ingestionTools } from './ingestion.js';
import { searchTools } from './search.js';
import { evaluationTools } from './evaluation.js';
import { configTools } from './config.js';

export * from './shared.js';
export * from './database.js';
export * from './ingestion.js';
export * from './search.js';
export * from './evaluation.js';
export * from './config.js';
export * from './results.js';

/**
 * Every tool the server registers, by name
 */
export const allTools: Record<string, ToolDefinition> = {
  ...databaseTools,
  ...ingestionTools,
  ...searchTools,
  ...evaluationTools,
  ...configTools,
};
