/**
 * @fileoverview digraph-augment MCP Server - Main entry point.
 * Exposes condensation, classification and augmentation as tools.
 *
 * @module mcp/server
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import type { DigraphAugmentConfig } from '../types/config.js';
import { getDefault, loadConfig } from '../state/config.js';
import { createConsoleLogger } from '../utils/logger.js';
import { registerTools } from './tools/index.js';

// ============================================================
// Server Configuration
// ============================================================

const SERVER_NAME = 'digraph-augment';
const SERVER_VERSION = '1.0.0';

// ============================================================
// Server Instance
// ============================================================

export function createServer(config: DigraphAugmentConfig = getDefault()): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerTools(server, {
    representative: config.representative,
    logger: createConsoleLogger(config.logLevel),
  });

  return server;
}

// ============================================================
// Main Entry Point
// ============================================================

export async function startServer(directory: string = process.cwd()): Promise<void> {
  const loaded = await loadConfig(directory);
  const config = loaded.ok ? loaded.value : getDefault();
  const logger = createConsoleLogger(config.logLevel);

  if (!loaded.ok) {
    logger.warn(`${loaded.error.message}; using defaults`);
  }

  const server = createServer(config);
  const transport = new StdioServerTransport();

  // Log to stderr (never stdout - that's for JSON-RPC)
  logger.info(`Starting server v${SERVER_VERSION}`);

  await server.connect(transport);

  logger.info('Server connected and ready');
}
