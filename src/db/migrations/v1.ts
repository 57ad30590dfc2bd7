/**
 * Migration v1: Create the BPF lifecycle schema
 *
 * Programs, links, maps and the program/map association table.
 */

import type Database from 'better-sqlite3';
import type { Migration } from './index.js';
import { SCHEMA_SQL } from '../schema.js';

const migration: Migration = {
  version: 1,
  description: 'Create bpf_programs, bpf_links, bpf_maps and bpf_program_maps',
  up(db: Database.Database): void {
    db.exec(SCHEMA_SQL);
  },
};

export default migration;
