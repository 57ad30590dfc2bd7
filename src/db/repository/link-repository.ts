import type Database from 'better-sqlite3';
import type { Link, LinkState } from '../../types/entities.js';
import type { CreateLinkInput } from '../../types/repository.js';
import { decodeId, encodeId, orNull, orUndefined } from '../columns.js';
import { NotFoundError, withStoreErrors } from '../errors.js';

/**
 * Raw row shape returned by better-sqlite3 for the `bpf_links` table.
 */
interface LinkRow {
  id: Buffer;
  program_id: Buffer;
  link_type: string | null;
  target: string | null;
  state: LinkState;
  created_at: string;
  updated_at: string;
}

const SELECT_SQL = `SELECT id, program_id, link_type, target, state, created_at, updated_at
  FROM bpf_links`;

/** Maps a snake_case DB row to a camelCase Link entity. */
function rowToLink(row: LinkRow): Link {
  return {
    id: decodeId(row.id),
    programId: decodeId(row.program_id),
    linkType: orUndefined(row.link_type),
    target: orUndefined(row.target),
    state: row.state,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Repository for the `bpf_links` table.
 *
 * A link always belongs to exactly one program; inserting a link for a
 * program that does not exist fails with ForeignKeyViolationError.
 */
export class LinkRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new Link and return the full entity. */
  create(input: CreateLinkInput): Link {
    const now = new Date().toISOString();

    withStoreErrors('bpf_links', input.id.toString(), () =>
      this.db
        .prepare<[Buffer, Buffer, string | null, string | null, LinkState, string, string]>(
          `INSERT INTO bpf_links (id, program_id, link_type, target, state, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          encodeId(input.id),
          encodeId(input.programId),
          orNull(input.linkType),
          orNull(input.target),
          input.state,
          now,
          now,
        ),
    );

    return {
      id: input.id,
      programId: input.programId,
      linkType: input.linkType,
      target: input.target,
      state: input.state,
      createdAt: now,
      updatedAt: now,
    };
  }

  /** Find a Link by its primary key. Throws NotFoundError if absent. */
  findById(id: bigint): Link {
    const row = withStoreErrors('bpf_links', id.toString(), () =>
      this.db.prepare<[Buffer], LinkRow>(`${SELECT_SQL} WHERE id = ?`).get(encodeId(id)),
    );
    if (!row) {
      throw new NotFoundError('bpf_links', id.toString());
    }
    return rowToLink(row);
  }

  /** Return all Links in id order. */
  findAll(): Link[] {
    const rows = withStoreErrors('bpf_links', '*', () =>
      this.db.prepare<[], LinkRow>(`${SELECT_SQL} ORDER BY id`).all(),
    );
    return rows.map(rowToLink);
  }

  /** Return the Links owned by a program, in id order. */
  findByProgramId(programId: bigint): Link[] {
    const rows = withStoreErrors('bpf_links', programId.toString(), () =>
      this.db
        .prepare<[Buffer], LinkRow>(`${SELECT_SQL} WHERE program_id = ? ORDER BY id`)
        .all(encodeId(programId)),
    );
    return rows.map(rowToLink);
  }

  /**
   * Write the full state of an existing Link and bump `updated_at`.
   * Throws NotFoundError if the Link does not exist.
   */
  update(link: Link): Link {
    const now = new Date().toISOString();

    const result = withStoreErrors('bpf_links', link.id.toString(), () =>
      this.db
        .prepare<[Buffer, string | null, string | null, LinkState, string, Buffer]>(
          `UPDATE bpf_links
           SET program_id = ?, link_type = ?, target = ?, state = ?, updated_at = ?
           WHERE id = ?`,
        )
        .run(
          encodeId(link.programId),
          orNull(link.linkType),
          orNull(link.target),
          link.state,
          now,
          encodeId(link.id),
        ),
    );
    if (result.changes === 0) {
      throw new NotFoundError('bpf_links', link.id.toString());
    }

    return { ...link, updatedAt: now };
  }

  /** Insert a Link, or overwrite the row that already holds its id. */
  upsert(input: CreateLinkInput): Link {
    const now = new Date().toISOString();

    withStoreErrors('bpf_links', input.id.toString(), () =>
      this.db
        .prepare<[Buffer, Buffer, string | null, string | null, LinkState, string, string]>(
          `INSERT INTO bpf_links (id, program_id, link_type, target, state, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             program_id = excluded.program_id,
             link_type = excluded.link_type,
             target = excluded.target,
             state = excluded.state,
             updated_at = excluded.updated_at`,
        )
        .run(
          encodeId(input.id),
          encodeId(input.programId),
          orNull(input.linkType),
          orNull(input.target),
          input.state,
          now,
          now,
        ),
    );

    return this.findById(input.id);
  }

  /** Delete a Link by id. Returns true if a row was deleted. */
  delete(id: bigint): boolean {
    const result = withStoreErrors('bpf_links', id.toString(), () =>
      this.db.prepare<[Buffer]>('DELETE FROM bpf_links WHERE id = ?').run(encodeId(id)),
    );
    return result.changes > 0;
  }

  /** Delete every Link. Returns the number of rows deleted. */
  deleteAll(): number {
    const result = withStoreErrors('bpf_links', '*', () =>
      this.db.prepare('DELETE FROM bpf_links').run(),
    );
    return result.changes;
  }
}
