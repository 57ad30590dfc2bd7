/**
 * bpfledger — MCP Query Tool (unified)
 *
 * Single read-only 'query' tool with an 'action' parameter.
 *
 * Actions: list_programs, get_program, list_links, list_maps, summary
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { uintSchema } from '../../codec/uint-blob.js';
import { NotFoundError } from '../../db/errors.js';
import { ProgramRepository } from '../../db/repository/program-repository.js';
import { LinkRepository } from '../../db/repository/link-repository.js';
import { MapRepository } from '../../db/repository/map-repository.js';
import { ProgramMapRepository } from '../../db/repository/program-map-repository.js';
import { PROGRAM_STATES } from '../../types/entities.js';
import { jsonText, linkView, mapView, programView } from '../views.js';

export interface StoreSummary {
  programs: Record<string, number>;
  links: number;
  maps: number;
  programMaps: number;
}

/** Row counts per entity, programs broken down by state. */
export function summarizeStore(db: Database.Database): StoreSummary {
  const programRepo = new ProgramRepository(db);
  const programs: Record<string, number> = {};
  for (const state of PROGRAM_STATES) {
    programs[state] = programRepo.findByState(state).length;
  }
  return {
    programs,
    links: new LinkRepository(db).findAll().length,
    maps: new MapRepository(db).findAll().length,
    programMaps: new ProgramMapRepository(db).findAll().length,
  };
}

function errorResult(text: string) {
  return { content: [{ type: 'text' as const, text }], isError: true };
}

function textResult(value: unknown) {
  return { content: [{ type: 'text' as const, text: jsonText(value) }] };
}

const idParam = uintSchema(64);

export function registerQueryTool(server: McpServer, db: Database.Database): void {
  const programRepo = new ProgramRepository(db);
  const linkRepo = new LinkRepository(db);
  const mapRepo = new MapRepository(db);

  server.tool(
    'query',
    'Query the BPF program store. Actions: list_programs, get_program, list_links, list_maps, summary',
    {
      action: z.enum(['list_programs', 'get_program', 'list_links', 'list_maps', 'summary']),
      // Parameters for list_programs
      state: z.enum(PROGRAM_STATES).optional().describe('Program state filter'),
      // Parameters for get_program
      id: z.string().optional().describe('Program id (decimal)'),
      // Parameters for list_links / list_maps
      programId: z.string().optional().describe('Restrict to one program (decimal id)'),
    },
    async ({ action, state, id, programId }) => {
      let programFilter: bigint | undefined;
      if (programId !== undefined) {
        const parsed = idParam.safeParse(programId);
        if (!parsed.success) return errorResult(`Invalid programId: ${programId}`);
        programFilter = parsed.data;
      }

      switch (action) {
        case 'list_programs': {
          const programs = state ? programRepo.findByState(state) : programRepo.findAll();
          return textResult(programs.map(programView));
        }
        case 'get_program': {
          if (!id) return errorResult('id parameter required for get_program');
          const parsed = idParam.safeParse(id);
          if (!parsed.success) return errorResult(`Invalid id: ${id}`);
          try {
            const program = programRepo.findById(parsed.data);
            return textResult({
              ...programView(program),
              links: linkRepo.findByProgramId(program.id).map(linkView),
              maps: mapRepo.findByProgramId(program.id).map(mapView),
            });
          } catch (err) {
            if (err instanceof NotFoundError) return errorResult(`Program not found: ${id}`);
            throw err;
          }
        }
        case 'list_links': {
          const links =
            programFilter === undefined ? linkRepo.findAll() : linkRepo.findByProgramId(programFilter);
          return textResult(links.map(linkView));
        }
        case 'list_maps': {
          const maps =
            programFilter === undefined ? mapRepo.findAll() : mapRepo.findByProgramId(programFilter);
          return textResult(maps.map(mapView));
        }
        case 'summary':
          return textResult(summarizeStore(db));
      }
    },
  );
}
