import type Database from 'better-sqlite3';
import type { BpfMap } from '../../types/entities.js';
import type { CreateMapInput } from '../../types/repository.js';
import { decodeId, encodeId, orNull, orUndefined } from '../columns.js';
import { NotFoundError, withStoreErrors } from '../errors.js';

/**
 * Raw row shape returned by better-sqlite3 for the `bpf_maps` table.
 */
interface MapRow {
  id: Buffer;
  name: string;
  map_type: string | null;
  key_size: number | null;
  value_size: number | null;
  max_entries: number | null;
  created_at: string;
  updated_at: string;
}

type MapInsertParams = [
  Buffer,
  string,
  string | null,
  number | null,
  number | null,
  number | null,
  string,
  string,
];

const COLUMNS_SQL = 'id, name, map_type, key_size, value_size, max_entries, created_at, updated_at';

/** Maps a snake_case DB row to a camelCase BpfMap entity. */
function rowToMap(row: MapRow): BpfMap {
  return {
    id: decodeId(row.id),
    name: row.name,
    mapType: orUndefined(row.map_type),
    keySize: orUndefined(row.key_size),
    valueSize: orUndefined(row.value_size),
    maxEntries: orUndefined(row.max_entries),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function insertParams(input: CreateMapInput, now: string): MapInsertParams {
  return [
    encodeId(input.id),
    input.name,
    orNull(input.mapType),
    orNull(input.keySize),
    orNull(input.valueSize),
    orNull(input.maxEntries),
    now,
    now,
  ];
}

/**
 * Repository for the `bpf_maps` table.
 *
 * Maps exist independently of programs; the `bpf_program_maps` table links
 * them (see ProgramMapRepository).
 */
export class MapRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new Map and return the full entity. */
  create(input: CreateMapInput): BpfMap {
    const now = new Date().toISOString();

    withStoreErrors('bpf_maps', input.id.toString(), () =>
      this.db
        .prepare<MapInsertParams>(
          `INSERT INTO bpf_maps (${COLUMNS_SQL}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(...insertParams(input, now)),
    );

    return { ...input, createdAt: now, updatedAt: now };
  }

  /** Find a Map by its primary key. Throws NotFoundError if absent. */
  findById(id: bigint): BpfMap {
    const row = withStoreErrors('bpf_maps', id.toString(), () =>
      this.db
        .prepare<[Buffer], MapRow>(`SELECT ${COLUMNS_SQL} FROM bpf_maps WHERE id = ?`)
        .get(encodeId(id)),
    );
    if (!row) {
      throw new NotFoundError('bpf_maps', id.toString());
    }
    return rowToMap(row);
  }

  /** Return all Maps in id order. */
  findAll(): BpfMap[] {
    const rows = withStoreErrors('bpf_maps', '*', () =>
      this.db.prepare<[], MapRow>(`SELECT ${COLUMNS_SQL} FROM bpf_maps ORDER BY id`).all(),
    );
    return rows.map(rowToMap);
  }

  /** Return the Maps associated with a program, in id order. */
  findByProgramId(programId: bigint): BpfMap[] {
    const rows = withStoreErrors('bpf_maps', programId.toString(), () =>
      this.db
        .prepare<[Buffer], MapRow>(
          `SELECT m.id, m.name, m.map_type, m.key_size, m.value_size, m.max_entries,
                  m.created_at, m.updated_at
           FROM bpf_maps m
           JOIN bpf_program_maps pm ON pm.map_id = m.id
           WHERE pm.program_id = ?
           ORDER BY m.id`,
        )
        .all(encodeId(programId)),
    );
    return rows.map(rowToMap);
  }

  /**
   * Write the full state of an existing Map and bump `updated_at`.
   * Throws NotFoundError if the Map does not exist.
   */
  update(map: BpfMap): BpfMap {
    const now = new Date().toISOString();

    const result = withStoreErrors('bpf_maps', map.id.toString(), () =>
      this.db
        .prepare<[string, string | null, number | null, number | null, number | null, string, Buffer]>(
          `UPDATE bpf_maps
           SET name = ?, map_type = ?, key_size = ?, value_size = ?, max_entries = ?, updated_at = ?
           WHERE id = ?`,
        )
        .run(
          map.name,
          orNull(map.mapType),
          orNull(map.keySize),
          orNull(map.valueSize),
          orNull(map.maxEntries),
          now,
          encodeId(map.id),
        ),
    );
    if (result.changes === 0) {
      throw new NotFoundError('bpf_maps', map.id.toString());
    }

    return { ...map, updatedAt: now };
  }

  /** Insert a Map, or overwrite the row that already holds its id. */
  upsert(input: CreateMapInput): BpfMap {
    const now = new Date().toISOString();

    withStoreErrors('bpf_maps', input.id.toString(), () =>
      this.db
        .prepare<MapInsertParams>(
          `INSERT INTO bpf_maps (${COLUMNS_SQL}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             name = excluded.name,
             map_type = excluded.map_type,
             key_size = excluded.key_size,
             value_size = excluded.value_size,
             max_entries = excluded.max_entries,
             updated_at = excluded.updated_at`,
        )
        .run(...insertParams(input, now)),
    );

    return this.findById(input.id);
  }

  /** Delete a Map by id. Returns true if a row was deleted. */
  delete(id: bigint): boolean {
    const result = withStoreErrors('bpf_maps', id.toString(), () =>
      this.db.prepare<[Buffer]>('DELETE FROM bpf_maps WHERE id = ?').run(encodeId(id)),
    );
    return result.changes > 0;
  }

  /** Delete every Map. Returns the number of rows deleted. */
  deleteAll(): number {
    const result = withStoreErrors('bpf_maps', '*', () =>
      this.db.prepare('DELETE FROM bpf_maps').run(),
    );
    return result.changes;
  }
}
