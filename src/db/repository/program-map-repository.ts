import type Database from 'better-sqlite3';
import type { ProgramMap } from '../../types/entities.js';
import { decodeId, encodeId } from '../columns.js';
import { withStoreErrors } from '../errors.js';

/**
 * Raw row shape returned by better-sqlite3 for the `bpf_program_maps` table.
 */
interface ProgramMapRow {
  program_id: Buffer;
  map_id: Buffer;
}

function rowToProgramMap(row: ProgramMapRow): ProgramMap {
  return {
    programId: decodeId(row.program_id),
    mapId: decodeId(row.map_id),
  };
}

function pairKey(programId: bigint, mapId: bigint): string {
  return `${programId}/${mapId}`;
}

/**
 * Repository for the `bpf_program_maps` association table.
 *
 * Rows have no identity of their own and disappear when either the program
 * or the map is deleted.
 */
export class ProgramMapRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Associate a map with a program. Throws ConflictError if the pair exists
   * and ForeignKeyViolationError if either side is missing.
   */
  create(programId: bigint, mapId: bigint): ProgramMap {
    withStoreErrors('bpf_program_maps', pairKey(programId, mapId), () =>
      this.db
        .prepare<[Buffer, Buffer]>(
          'INSERT INTO bpf_program_maps (program_id, map_id) VALUES (?, ?)',
        )
        .run(encodeId(programId), encodeId(mapId)),
    );
    return { programId, mapId };
  }

  /**
   * Associate a map with a program unless the pair already exists.
   * Returns true if a row was inserted.
   */
  ensure(programId: bigint, mapId: bigint): boolean {
    const result = withStoreErrors('bpf_program_maps', pairKey(programId, mapId), () =>
      this.db
        .prepare<[Buffer, Buffer]>(
          'INSERT OR IGNORE INTO bpf_program_maps (program_id, map_id) VALUES (?, ?)',
        )
        .run(encodeId(programId), encodeId(mapId)),
    );
    return result.changes > 0;
  }

  /** Return every association, ordered by program then map. */
  findAll(): ProgramMap[] {
    const rows = withStoreErrors('bpf_program_maps', '*', () =>
      this.db
        .prepare<[], ProgramMapRow>(
          'SELECT program_id, map_id FROM bpf_program_maps ORDER BY program_id, map_id',
        )
        .all(),
    );
    return rows.map(rowToProgramMap);
  }

  findByProgramId(programId: bigint): ProgramMap[] {
    const rows = withStoreErrors('bpf_program_maps', programId.toString(), () =>
      this.db
        .prepare<[Buffer], ProgramMapRow>(
          'SELECT program_id, map_id FROM bpf_program_maps WHERE program_id = ? ORDER BY map_id',
        )
        .all(encodeId(programId)),
    );
    return rows.map(rowToProgramMap);
  }

  findByMapId(mapId: bigint): ProgramMap[] {
    const rows = withStoreErrors('bpf_program_maps', mapId.toString(), () =>
      this.db
        .prepare<[Buffer], ProgramMapRow>(
          'SELECT program_id, map_id FROM bpf_program_maps WHERE map_id = ? ORDER BY program_id',
        )
        .all(encodeId(mapId)),
    );
    return rows.map(rowToProgramMap);
  }

  /** Remove one association. Returns true if a row was deleted. */
  delete(programId: bigint, mapId: bigint): boolean {
    const result = withStoreErrors('bpf_program_maps', pairKey(programId, mapId), () =>
      this.db
        .prepare<[Buffer, Buffer]>(
          'DELETE FROM bpf_program_maps WHERE program_id = ? AND map_id = ?',
        )
        .run(encodeId(programId), encodeId(mapId)),
    );
    return result.changes > 0;
  }

  /** Delete every association. Returns the number of rows deleted. */
  deleteAll(): number {
    const result = withStoreErrors('bpf_program_maps', '*', () =>
      this.db.prepare('DELETE FROM bpf_program_maps').run(),
    );
    return result.changes;
  }
}
