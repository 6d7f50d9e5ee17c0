/**
 * MCP Server Module Exports
 *
 * Re-exports all server components for external use.
 *
 * @module server
 */

// Error handling
export {
  MCPError,
  formatErrorResponse,
  validationError,
  databaseNotSelectedError,
  databaseNotFoundError,
  type ErrorCategory,
} from './errors.js';

// Type definitions
export {
  type ToolResult,
  type ToolResultSuccess,
  type ToolResultFailure,
  type ToolError,
  type ServerState,
  type DatabaseListItem,
  type DatabaseSelectResult,
  successResult,
  failureResult,
} from './types.js';

// State management
export {
  state,
  requireDatabase,
  getEmbedder,
  selectDatabase,
  selectOrCreateDatabase,
  clearDatabase,
  getConfig,
  setConfig,
  resetState,
  type DatabaseServices,
} from './state.js';
