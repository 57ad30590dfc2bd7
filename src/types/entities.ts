/**
 * bpfledger - Entity type definitions
 *
 * These interfaces map to the SQL tables defined in src/db/schema.ts.
 * Property names are camelCase conversions of the snake_case column names.
 *
 * Conventions:
 *   TEXT            -> string
 *   INTEGER         -> number
 *   BOOLEAN INTEGER -> boolean
 *   u64 BLOB        -> bigint (identifiers, see src/codec/uint-blob.ts)
 *   u32 BLOB        -> number
 *   u8 flag BLOB    -> boolean
 *   nullable col    -> optional property (?)
 *   All timestamps  -> string (ISO 8601)
 */

// ============================================================
// Closed value sets
// ============================================================

export const PROGRAM_KINDS = [
  'xdp',
  'tc',
  'tcx',
  'tracepoint',
  'kprobe',
  'uprobe',
  'fentry',
  'fexit',
] as const;
export type ProgramKind = (typeof PROGRAM_KINDS)[number];

/** pre_load → loaded → attached. No back-transitions. */
export const PROGRAM_STATES = ['pre_load', 'loaded', 'attached'] as const;
export type ProgramState = (typeof PROGRAM_STATES)[number];

export const LINK_STATES = ['pre_attach', 'attached'] as const;
export type LinkState = (typeof LINK_STATES)[number];

// ============================================================
// bpf_programs
// ============================================================

/** Where the program object comes from: a local file or an OCI image. */
export type ProgramLocation =
  | { type: 'file'; path: string }
  | {
      type: 'image';
      url: string;
      pullPolicy?: string;
      username?: string;
      password?: string;
    };

/** Fields reported by the kernel once it has accepted the program. */
export interface KernelInfo {
  kernelName?: string;
  kernelProgramType?: number;
  kernelLoadedAt?: string;
  kernelTag?: string;
  kernelGplCompatible?: boolean;
  kernelBtfId?: number;
  kernelBytesXlated?: number;
  kernelJited?: boolean;
  kernelBytesJited?: number;
  kernelVerifiedInsns?: number;
  /** JSON array of map ids, `'[]'` when unknown. */
  kernelMapIds: string;
  kernelBytesMemlock?: number;
}

/** A kernel-loadable BPF program. */
export interface Program extends KernelInfo {
  id: bigint;
  name: string;
  description?: string;
  kind: ProgramKind;
  state: ProgramState;
  location: ProgramLocation;
  mapPinPath: string;
  mapOwnerId?: bigint;
  programBytes: Buffer;
  /** JSON object, `'{}'` by default. */
  metadata: string;
  /** JSON object, `'{}'` by default. */
  globalData: string;
  retprobe?: boolean;
  fnName?: string;
  createdAt: string;
  updatedAt: string;
}

// ============================================================
// bpf_links
// ============================================================

/** An attachment of a program to a hook point (interface, cgroup, ...). */
export interface Link {
  id: bigint;
  programId: bigint;
  linkType?: string;
  target?: string;
  state: LinkState;
  createdAt: string;
  updatedAt: string;
}

// ============================================================
// bpf_maps
// ============================================================

export interface BpfMap {
  id: bigint;
  name: string;
  mapType?: string;
  keySize?: number;
  valueSize?: number;
  maxEntries?: number;
  createdAt: string;
  updatedAt: string;
}

// ============================================================
// bpf_program_maps
// ============================================================

/** Association between a program and a map it uses. */
export interface ProgramMap {
  programId: bigint;
  mapId: bigint;
}
