/**
 * Hybrid Search MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes database, ingestion, search, evaluation and config tools via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
dotenv.config();

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadSearchConfig } from './services/search/config.js';
import { DatabaseService } from './services/storage/database/index.js';
import { setConfig, selectDatabase } from './server/index.js';
import { allTools } from './tools/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

const server = new McpServer({
  name: 'hybrid-search-mcp',
  version: '1.0.0',
});

for (const [name, tool] of Object.entries(allTools)) {
  server.tool(name, tool.description, tool.inputSchema, tool.handler);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

async function main() {
  // FAIL FAST: an invalid configuration stops the server before it accepts requests
  const config = loadSearchConfig();
  setConfig(config);

  if (DatabaseService.exists(config.database, config.storagePath)) {
    selectDatabase(config.database);
    console.error(`[INFO] Selected database "${config.database}"`);
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Hybrid Search MCP Server running on stdio');
  console.error(`Tools registered: ${Object.keys(allTools).length}`);
}

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
