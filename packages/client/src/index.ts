#!/usr/bin/env node

/**
 * treeport MCP entry point
 */

import { TreeportMCPServer } from './mcp-server.js';
import { loadClientConfig } from './config.js';

const mcpServer = new TreeportMCPServer(loadClientConfig());

process.on('SIGINT', () => {
  mcpServer
    .close()
    .then(() => process.exit(0))
    .catch((error) => {
      console.error('[MCP Server] Error during shutdown:', error);
      process.exit(1);
    });
});

mcpServer.run().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
