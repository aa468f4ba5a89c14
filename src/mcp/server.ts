/**
 * @fileoverview tagnotes MCP server.
 * Exposes build information assembly as MCP tools over stdio.
 *
 * @module mcp/server
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { registerTools } from './tools/index.js';

// ============================================================
// Server Configuration
// ============================================================

export const SERVER_NAME = 'tagnotes';
export const SERVER_VERSION = '0.1.0';

// ============================================================
// Server Instance
// ============================================================

export function createServer(): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerTools(server);

  return server;
}

// ============================================================
// Main Entry Point
// ============================================================

export async function startServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();

  // Log to stderr (never stdout - that's for JSON-RPC)
  console.error(`[tagnotes-mcp] Starting server v${SERVER_VERSION}`);

  await server.connect(transport);

  console.error('[tagnotes-mcp] Server connected and ready');
}
