/**
 * bpfledger — MCP Server
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { registerQueryTool } from './tools/query.js';
import { registerImportTool } from './tools/import.js';
import { registerMutateTool } from './tools/mutate.js';
import { registerResources } from './resources.js';

/**
 * Create a fully configured MCP server with all bpfledger tools and resources.
 *
 * @param db - The better-sqlite3 database instance (already migrated)
 * @param logger - Logger for tool activity; silent by default
 */
export function createMcpServer(db: Database.Database, logger: Logger = silentLogger): McpServer {
  const server = new McpServer({
    name: 'bpfledger',
    version: '0.1.0',
  });

  // Register tools (3 tools total)
  registerQueryTool(server, db);
  registerImportTool(server, db, logger);
  registerMutateTool(server, db, logger);

  // Register resources
  registerResources(server, db);

  return server;
}
