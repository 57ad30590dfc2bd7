/**
 * bpfledger — MCP stdio runner
 *
 * Opens (and migrates) the database at `dbPath` and serves it over stdio.
 */

import Database from 'better-sqlite3';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Logger } from '../logger.js';
import { migrateDatabase } from '../db/migrate.js';
import { createMcpServer } from './server.js';

export async function serveStdio(dbPath: string, logger: Logger): Promise<void> {
  const db = new Database(dbPath);
  migrateDatabase(db, logger);

  const server = createMcpServer(db, logger);
  server.server.onclose = () => {
    db.close();
    logger.info('MCP transport closed');
  };

  await server.connect(new StdioServerTransport());
  logger.info({ dbPath }, 'MCP server listening on stdio');
}
