/**
 * bpfledger — MCP Mutate Tool
 *
 * delete_program removes a program together with its links and map
 * associations (ON DELETE CASCADE). Maps themselves are kept.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { uintSchema } from '../../codec/uint-blob.js';
import { ProgramRepository } from '../../db/repository/program-repository.js';
import type { Logger } from '../../logger.js';

export function registerMutateTool(server: McpServer, db: Database.Database, logger: Logger): void {
  const programRepo = new ProgramRepository(db);

  server.tool(
    'delete_program',
    'Delete a BPF program and its links and map associations',
    {
      id: z.string().describe('Program id (decimal)'),
    },
    async ({ id }) => {
      const parsed = uintSchema(64).safeParse(id);
      if (!parsed.success) {
        return { content: [{ type: 'text', text: `Invalid id: ${id}` }], isError: true };
      }
      try {
        const deleted = programRepo.delete(parsed.data);
        if (!deleted) {
          return { content: [{ type: 'text', text: `Program not found: ${id}` }], isError: true };
        }
        logger.info({ id }, 'program deleted');
        return { content: [{ type: 'text', text: `Deleted program ${id}` }] };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { content: [{ type: 'text', text: `Delete failed: ${message}` }], isError: true };
      }
    },
  );
}
