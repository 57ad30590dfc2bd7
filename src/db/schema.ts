/**
 * bpfledger — SQLite schema
 *
 * This schema is the single source of truth for the database structure.
 *
 * Kernel identifiers are unsigned and may exceed SQLite's signed 64-bit
 * INTEGER, so they are BLOB columns holding the fixed-width big-endian
 * encoding from src/codec/uint-blob.ts. Each BLOB column checks its byte
 * length against the declared width.
 */

export const SCHEMA_SQL = `
-- ============================================================
-- BPF programs
-- ============================================================
CREATE TABLE IF NOT EXISTS bpf_programs (
  id                     BLOB PRIMARY KEY NOT NULL CHECK (length(id) = 8),  -- u64
  name                   TEXT NOT NULL,
  description            TEXT,
  kind                   TEXT NOT NULL
    CHECK (kind IN ('xdp', 'tc', 'tcx', 'tracepoint', 'kprobe', 'uprobe', 'fentry', 'fexit')),
  state                  TEXT NOT NULL
    CHECK (state IN ('pre_load', 'loaded', 'attached')),
  location_type          TEXT NOT NULL
    CHECK (location_type IN ('file', 'image')),
  file_path              TEXT,
  image_url              TEXT,
  image_pull_policy      TEXT,
  username               TEXT,
  password               TEXT,
  map_pin_path           TEXT NOT NULL,
  map_owner_id           BLOB CHECK (map_owner_id IS NULL OR length(map_owner_id) = 8),  -- u64
  program_bytes          BLOB,                  -- NULL when empty
  metadata               TEXT NOT NULL DEFAULT '{}',
  global_data            TEXT NOT NULL DEFAULT '{}',
  retprobe               INTEGER,               -- kprobe / uprobe only
  fn_name                TEXT,                  -- fentry / fexit only

  -- populated after the kernel accepts the program
  kernel_name            TEXT,
  kernel_program_type    BLOB CHECK (kernel_program_type IS NULL OR length(kernel_program_type) = 4),      -- u32
  kernel_loaded_at       TEXT,
  kernel_tag             TEXT,
  kernel_gpl_compatible  BLOB CHECK (kernel_gpl_compatible IS NULL OR length(kernel_gpl_compatible) = 1),  -- u8 flag
  kernel_btf_id          BLOB CHECK (kernel_btf_id IS NULL OR length(kernel_btf_id) = 4),                  -- u32
  kernel_bytes_xlated    INTEGER,
  kernel_jited           BLOB CHECK (kernel_jited IS NULL OR length(kernel_jited) = 1),                    -- u8 flag
  kernel_bytes_jited     INTEGER,
  kernel_verified_insns  INTEGER,
  kernel_map_ids         TEXT NOT NULL DEFAULT '[]',
  kernel_bytes_memlock   INTEGER,

  created_at             TEXT NOT NULL,
  updated_at             TEXT NOT NULL,

  CHECK (
    (location_type = 'file' AND file_path IS NOT NULL)
    OR (location_type = 'image' AND image_url IS NOT NULL)
  ),
  CHECK (kind NOT IN ('fentry', 'fexit') OR fn_name IS NOT NULL),
  CHECK (kind NOT IN ('kprobe', 'uprobe') OR retprobe IS NOT NULL)
);

CREATE INDEX IF NOT EXISTS idx_bpf_programs_state ON bpf_programs(state);

-- ============================================================
-- BPF links (one program, many links)
-- ============================================================
CREATE TABLE IF NOT EXISTS bpf_links (
  id             BLOB PRIMARY KEY NOT NULL CHECK (length(id) = 8),          -- u64
  program_id     BLOB NOT NULL CHECK (length(program_id) = 8),              -- u64
  link_type      TEXT,
  target         TEXT,                                                      -- interface, cgroup path, ...
  state          TEXT NOT NULL CHECK (state IN ('pre_attach', 'attached')),
  created_at     TEXT NOT NULL,
  updated_at     TEXT NOT NULL,
  FOREIGN KEY (program_id) REFERENCES bpf_programs(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_bpf_links_program ON bpf_links(program_id);

-- ============================================================
-- BPF maps (shared between programs)
-- ============================================================
CREATE TABLE IF NOT EXISTS bpf_maps (
  id             BLOB PRIMARY KEY NOT NULL CHECK (length(id) = 8),          -- u64
  name           TEXT NOT NULL,
  map_type       TEXT,
  key_size       INTEGER,
  value_size     INTEGER,
  max_entries    INTEGER,
  created_at     TEXT NOT NULL,
  updated_at     TEXT NOT NULL
);

-- ============================================================
-- Program <-> Map
-- ============================================================
CREATE TABLE IF NOT EXISTS bpf_program_maps (
  program_id     BLOB NOT NULL,
  map_id         BLOB NOT NULL,
  PRIMARY KEY (program_id, map_id),
  FOREIGN KEY (program_id) REFERENCES bpf_programs(id) ON DELETE CASCADE,
  FOREIGN KEY (map_id)     REFERENCES bpf_maps(id)     ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_bpf_program_maps_map ON bpf_program_maps(map_id);
`;
