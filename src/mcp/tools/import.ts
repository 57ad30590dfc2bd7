/**
 * bpfledger — MCP Import Tool
 *
 * Tool for importing bpftool JSON output into the store.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { importBpftoolFiles } from '../../engine/importer.js';
import type { Logger } from '../../logger.js';

export function registerImportTool(server: McpServer, db: Database.Database, logger: Logger): void {
  server.tool(
    'import_bpftool',
    'Import `bpftool prog/map/link show --json` output files into the BPF program store',
    {
      programs: z.string().describe('Path to `bpftool prog show --json` output'),
      maps: z.string().describe('Path to `bpftool map show --json` output'),
      links: z.string().describe('Path to `bpftool link show --json` output'),
    },
    async ({ programs, maps, links }) => {
      try {
        const result = importBpftoolFiles(db, { programs, maps, links }, logger);
        const summary = [
          `Imported ${result.programs} programs, ${result.maps} maps, ${result.links} links, ${result.programMaps} program-map associations`,
          `Attached programs: ${result.attachedPrograms}`,
          `Skipped: ${result.skipped.programs} programs, ${result.skipped.links} links, ${result.skipped.programMaps} program-map associations`,
        ].join('\n');
        return { content: [{ type: 'text', text: summary }] };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { content: [{ type: 'text', text: `Import failed: ${message}` }], isError: true };
      }
    },
  );
}
