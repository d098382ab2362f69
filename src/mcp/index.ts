#!/usr/bin/env node
/**
 * @fileoverview digraph-augment MCP Server CLI entry point.
 * Run with: npx digraph-augment-mcp
 *
 * @module mcp
 */

import { startServer } from './server.js';
import { createConsoleLogger } from '../utils/logger.js';

const logger = createConsoleLogger('info');

// Handle graceful shutdown
process.on('SIGINT', () => {
  logger.info('Received SIGINT, shutting down...');
  process.exit(0);
});

process.on('SIGTERM', () => {
  logger.info('Received SIGTERM, shutting down...');
  process.exit(0);
});

startServer().catch((error: unknown) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
