import type Database from 'better-sqlite3';
import { u32, u64 } from '../../codec/uint-blob.js';
import type {
  Program,
  ProgramKind,
  ProgramLocation,
  ProgramState,
} from '../../types/entities.js';
import type { CreateProgramInput } from '../../types/repository.js';
import {
  decodeFlag,
  decodeId,
  decodeOptional,
  decodeOptionalNumber,
  encodeFlag,
  encodeId,
  encodeOptional,
  fromSqliteBool,
  orNull,
  orUndefined,
  toSqliteBool,
} from '../columns.js';
import { NotFoundError, withStoreErrors } from '../errors.js';

/**
 * Raw row shape returned by better-sqlite3 for the `bpf_programs` table.
 * Column names are snake_case as defined in the schema. The same shape is
 * bound as named parameters on insert and update.
 */
interface ProgramRow {
  id: Buffer;
  name: string;
  description: string | null;
  kind: ProgramKind;
  state: ProgramState;
  location_type: 'file' | 'image';
  file_path: string | null;
  image_url: string | null;
  image_pull_policy: string | null;
  username: string | null;
  password: string | null;
  map_pin_path: string;
  map_owner_id: Buffer | null;
  program_bytes: Buffer | null;
  metadata: string;
  global_data: string;
  retprobe: number | null;
  fn_name: string | null;
  kernel_name: string | null;
  kernel_program_type: Buffer | null;
  kernel_loaded_at: string | null;
  kernel_tag: string | null;
  kernel_gpl_compatible: Buffer | null;
  kernel_btf_id: Buffer | null;
  kernel_bytes_xlated: number | null;
  kernel_jited: Buffer | null;
  kernel_bytes_jited: number | null;
  kernel_verified_insns: number | null;
  kernel_map_ids: string;
  kernel_bytes_memlock: number | null;
  created_at: string;
  updated_at: string;
}

const COLUMNS = [
  'id',
  'name',
  'description',
  'kind',
  'state',
  'location_type',
  'file_path',
  'image_url',
  'image_pull_policy',
  'username',
  'password',
  'map_pin_path',
  'map_owner_id',
  'program_bytes',
  'metadata',
  'global_data',
  'retprobe',
  'fn_name',
  'kernel_name',
  'kernel_program_type',
  'kernel_loaded_at',
  'kernel_tag',
  'kernel_gpl_compatible',
  'kernel_btf_id',
  'kernel_bytes_xlated',
  'kernel_jited',
  'kernel_bytes_jited',
  'kernel_verified_insns',
  'kernel_map_ids',
  'kernel_bytes_memlock',
  'created_at',
  'updated_at',
] as const satisfies ReadonlyArray<keyof ProgramRow>;

/** Columns rewritten by update / upsert: everything but the key and created_at. */
const MUTABLE_COLUMNS = COLUMNS.filter((c) => c !== 'id' && c !== 'created_at');

const SELECT_SQL = `SELECT ${COLUMNS.join(', ')} FROM bpf_programs`;

const INSERT_SQL = `INSERT INTO bpf_programs (${COLUMNS.join(', ')})
  VALUES (${COLUMNS.map((c) => `@${c}`).join(', ')})`;

const UPDATE_SQL = `UPDATE bpf_programs
  SET ${MUTABLE_COLUMNS.map((c) => `${c} = @${c}`).join(', ')}
  WHERE id = @id`;

const UPSERT_SQL = `${INSERT_SQL}
  ON CONFLICT(id) DO UPDATE SET ${MUTABLE_COLUMNS.map((c) => `${c} = excluded.${c}`).join(', ')}`;

function rowToLocation(row: ProgramRow): ProgramLocation {
  if (row.location_type === 'image') {
    return {
      type: 'image',
      url: row.image_url ?? '',
      pullPolicy: orUndefined(row.image_pull_policy),
      username: orUndefined(row.username),
      password: orUndefined(row.password),
    };
  }
  return { type: 'file', path: row.file_path ?? '' };
}

/** Maps a snake_case DB row to a camelCase Program entity. */
function rowToProgram(row: ProgramRow): Program {
  return {
    id: decodeId(row.id),
    name: row.name,
    description: orUndefined(row.description),
    kind: row.kind,
    state: row.state,
    location: rowToLocation(row),
    mapPinPath: row.map_pin_path,
    mapOwnerId: decodeOptional(u64, row.map_owner_id),
    programBytes: row.program_bytes ?? Buffer.alloc(0),
    metadata: row.metadata,
    globalData: row.global_data,
    retprobe: fromSqliteBool(row.retprobe),
    fnName: orUndefined(row.fn_name),
    kernelName: orUndefined(row.kernel_name),
    kernelProgramType: decodeOptionalNumber(u32, row.kernel_program_type),
    kernelLoadedAt: orUndefined(row.kernel_loaded_at),
    kernelTag: orUndefined(row.kernel_tag),
    kernelGplCompatible: decodeFlag(row.kernel_gpl_compatible),
    kernelBtfId: decodeOptionalNumber(u32, row.kernel_btf_id),
    kernelBytesXlated: orUndefined(row.kernel_bytes_xlated),
    kernelJited: decodeFlag(row.kernel_jited),
    kernelBytesJited: orUndefined(row.kernel_bytes_jited),
    kernelVerifiedInsns: orUndefined(row.kernel_verified_insns),
    kernelMapIds: row.kernel_map_ids,
    kernelBytesMemlock: orUndefined(row.kernel_bytes_memlock),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** Maps a Program entity to the row bound as named statement parameters. */
function programToRow(program: Program): ProgramRow {
  const { location } = program;
  return {
    id: encodeId(program.id),
    name: program.name,
    description: orNull(program.description),
    kind: program.kind,
    state: program.state,
    location_type: location.type,
    file_path: location.type === 'file' ? location.path : null,
    image_url: location.type === 'image' ? location.url : null,
    image_pull_policy: location.type === 'image' ? orNull(location.pullPolicy) : null,
    username: location.type === 'image' ? orNull(location.username) : null,
    password: location.type === 'image' ? orNull(location.password) : null,
    map_pin_path: program.mapPinPath,
    map_owner_id: encodeOptional(u64, program.mapOwnerId),
    program_bytes: program.programBytes.length > 0 ? program.programBytes : null,
    metadata: program.metadata,
    global_data: program.globalData,
    retprobe: toSqliteBool(program.retprobe),
    fn_name: orNull(program.fnName),
    kernel_name: orNull(program.kernelName),
    kernel_program_type: encodeOptional(u32, program.kernelProgramType),
    kernel_loaded_at: orNull(program.kernelLoadedAt),
    kernel_tag: orNull(program.kernelTag),
    kernel_gpl_compatible: encodeFlag(program.kernelGplCompatible),
    kernel_btf_id: encodeOptional(u32, program.kernelBtfId),
    kernel_bytes_xlated: orNull(program.kernelBytesXlated),
    kernel_jited: encodeFlag(program.kernelJited),
    kernel_bytes_jited: orNull(program.kernelBytesJited),
    kernel_verified_insns: orNull(program.kernelVerifiedInsns),
    kernel_map_ids: program.kernelMapIds,
    kernel_bytes_memlock: orNull(program.kernelBytesMemlock),
    created_at: program.createdAt,
    updated_at: program.updatedAt,
  };
}

/** Fills defaults and stamps both timestamps with `now`. */
function newProgram(input: CreateProgramInput, now: string): Program {
  return {
    ...input,
    state: input.state ?? 'pre_load',
    metadata: input.metadata ?? '{}',
    globalData: input.globalData ?? '{}',
    kernelMapIds: input.kernelMapIds ?? '[]',
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Repository for the `bpf_programs` table.
 *
 * All queries use prepared statements. Deleting a program removes its links
 * and program/map rows through ON DELETE CASCADE.
 */
export class ProgramRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Insert a new Program and return the full entity.
   * Throws ConflictError if the id is already taken.
   */
  create(input: CreateProgramInput): Program {
    const program = newProgram(input, new Date().toISOString());

    withStoreErrors('bpf_programs', program.id.toString(), () =>
      this.db.prepare<ProgramRow>(INSERT_SQL).run(programToRow(program)),
    );

    return program;
  }

  /** Find a Program by its primary key. Throws NotFoundError if absent. */
  findById(id: bigint): Program {
    const row = withStoreErrors('bpf_programs', id.toString(), () =>
      this.db.prepare<[Buffer], ProgramRow>(`${SELECT_SQL} WHERE id = ?`).get(encodeId(id)),
    );
    if (!row) {
      throw new NotFoundError('bpf_programs', id.toString());
    }
    return rowToProgram(row);
  }

  /** Return all Programs in id order. */
  findAll(): Program[] {
    const rows = withStoreErrors('bpf_programs', '*', () =>
      this.db.prepare<[], ProgramRow>(`${SELECT_SQL} ORDER BY id`).all(),
    );
    return rows.map(rowToProgram);
  }

  /** Return all Programs in the given lifecycle state, in id order. */
  findByState(state: ProgramState): Program[] {
    const rows = withStoreErrors('bpf_programs', state, () =>
      this.db
        .prepare<[string], ProgramRow>(`${SELECT_SQL} WHERE state = ? ORDER BY id`)
        .all(state),
    );
    return rows.map(rowToProgram);
  }

  /**
   * Replace every column of an existing Program with `program` and bump
   * `updated_at`. `created_at` is left as stored. Throws NotFoundError if
   * the Program does not exist.
   */
  update(program: Program): Program {
    const updated: Program = { ...program, updatedAt: new Date().toISOString() };

    const result = withStoreErrors('bpf_programs', program.id.toString(), () =>
      this.db.prepare<ProgramRow>(UPDATE_SQL).run(programToRow(updated)),
    );
    if (result.changes === 0) {
      throw new NotFoundError('bpf_programs', program.id.toString());
    }

    return updated;
  }

  /**
   * Insert a Program, or overwrite the row that already holds its id.
   * The kernel recycles program ids, so a reused id replaces the old record
   * in place; links and map associations of that row are kept.
   */
  upsert(input: CreateProgramInput): Program {
    const program = newProgram(input, new Date().toISOString());

    withStoreErrors('bpf_programs', program.id.toString(), () =>
      this.db.prepare<ProgramRow>(UPSERT_SQL).run(programToRow(program)),
    );

    return this.findById(program.id);
  }

  /** Delete a Program by id. Returns true if a row was deleted. */
  delete(id: bigint): boolean {
    const result = withStoreErrors('bpf_programs', id.toString(), () =>
      this.db.prepare<[Buffer]>('DELETE FROM bpf_programs WHERE id = ?').run(encodeId(id)),
    );
    return result.changes > 0;
  }

  /** Delete every Program. Returns the number of rows deleted. */
  deleteAll(): number {
    const result = withStoreErrors('bpf_programs', '*', () =>
      this.db.prepare('DELETE FROM bpf_programs').run(),
    );
    return result.changes;
  }
}
