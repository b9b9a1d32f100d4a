#!/usr/bin/env node

/**
 * treeport Server Entry Point
 */

import { BrowseServer } from './server.js';
import { loadConfig } from './config.js';
import type { ServerConfig } from './types.js';

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error('[Server]', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

const config = readConfig();

const server = new BrowseServer(config);

const shutdown = async (signal: string) => {
  console.log(`\n[Server] Received ${signal}, shutting down...`);
  try {
    await server.close();
    console.log('[Server] Shutdown complete');
    process.exit(0);
  } catch (error) {
    console.error('[Server] Error during shutdown:', error);
    process.exit(1);
  }
};

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

process.on('uncaughtException', (error) => {
  console.error('[Server] Uncaught exception:', error);
  void shutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  console.error('[Server] Unhandled rejection:', reason);
  void shutdown('unhandledRejection');
});

server
  .start()
  .then(({ port, healthPort }) => {
    console.log(`
treeport server
  Listening:   ${config.host}:${port}
  Root:        ${config.root}
  Root scope:  ${config.rootScope}${config.confine ? ' (confined)' : ''}
  Health:      ${healthPort === undefined ? 'disabled' : `http://${config.host}:${healthPort}/health`}

Press Ctrl+C to stop
`);
  })
  .catch((error) => {
    console.error('[Server] Failed to start:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
