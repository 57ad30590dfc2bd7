/**
 * bpfledger — CLI commands
 *
 *   bpfledger import <db> <programs> <maps> <links>
 *   bpfledger inspect <db> [--compact]
 *   bpfledger serve [--db <path>]
 *
 * Command output goes to stdout through `write`; logs go to stderr.
 */

import fs from 'node:fs';
import { Command } from 'commander';
import Database from 'better-sqlite3';
import type { Config } from '../config.js';
import type { Logger } from '../logger.js';
import { migrateDatabase } from '../db/migrate.js';
import { importBpftoolFiles } from '../engine/importer.js';
import { formatReport, inspectDatabase } from '../engine/inspector.js';
import { serveStdio } from '../mcp/stdio.js';

export interface CliContext {
  config: Config;
  logger: Logger;
  write: (line: string) => void;
}

export function createProgram(context: CliContext): Command {
  const { config, logger, write } = context;
  const program = new Command();

  program
    .name('bpfledger')
    .description('Lifecycle store for BPF programs, links and maps')
    .version('0.1.0');

  program
    .command('import')
    .description('Import bpftool prog/map/link JSON output into a database')
    .argument('<db>', 'SQLite database path (created if missing)')
    .argument('<programs>', 'output of `bpftool prog show --json`')
    .argument('<maps>', 'output of `bpftool map show --json`')
    .argument('<links>', 'output of `bpftool link show --json`')
    .action((dbPath: string, programs: string, maps: string, links: string) => {
      const db = new Database(dbPath);
      try {
        migrateDatabase(db, logger);
        const result = importBpftoolFiles(db, { programs, maps, links }, logger);
        write(
          `Imported ${result.programs} programs, ${result.maps} maps, ${result.links} links, ` +
            `${result.programMaps} program-map associations`,
        );
      } finally {
        db.close();
      }
    });

  program
    .command('inspect')
    .description('Print the contents of a database')
    .argument('<db>', 'SQLite database path')
    .option('--compact', 'one line per value, truncated to 100 characters', false)
    .action((dbPath: string, options: { compact: boolean }) => {
      if (!fs.existsSync(dbPath)) {
        throw new Error(`Database not found: ${dbPath}`);
      }
      const db = new Database(dbPath, { readonly: true, fileMustExist: true });
      try {
        for (const line of formatReport(inspectDatabase(db), { compact: options.compact })) {
          write(line);
        }
      } finally {
        db.close();
      }
    });

  program
    .command('serve')
    .description('Serve a database to MCP clients over stdio')
    .option('--db <path>', 'SQLite database path', config.dbPath)
    .action(async (options: { db: string }) => {
      await serveStdio(options.db, logger);
    });

  return program;
}
