#!/usr/bin/env node
/**
 * @fileoverview tagnotes MCP server CLI entry point.
 * Run with: npx tagnotes-mcp
 *
 * @module mcp
 */

import { startServer } from './server.js';

process.on('SIGINT', () => {
  console.error('[tagnotes-mcp] Received SIGINT, shutting down...');
  process.exit(0);
});

process.on('SIGTERM', () => {
  console.error('[tagnotes-mcp] Received SIGTERM, shutting down...');
  process.exit(0);
});

startServer().catch((error: unknown) => {
  console.error('[tagnotes-mcp] Fatal error:', error);
  process.exit(1);
});
