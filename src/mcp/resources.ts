/**
 * bpfledger — MCP Resources
 *
 * Read-only resources for browsing the BPF program store.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { ProgramRepository } from '../db/repository/program-repository.js';
import { summarizeStore } from './tools/query.js';
import { jsonText, programView } from './views.js';

export function registerResources(server: McpServer, db: Database.Database): void {
  const programRepo = new ProgramRepository(db);

  // 1. bpfledger://summary — Row counts
  server.resource(
    'summary',
    'bpfledger://summary',
    { description: 'Row counts of programs (by state), links, maps and program-map associations' },
    async (uri) => ({
      contents: [{ uri: uri.href, mimeType: 'application/json', text: jsonText(summarizeStore(db)) }],
    }),
  );

  // 2. bpfledger://programs — Program list
  server.resource(
    'programs',
    'bpfledger://programs',
    { description: 'List of all BPF programs ordered by id' },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: jsonText(programRepo.findAll().map(programView)),
        },
      ],
    }),
  );
}
