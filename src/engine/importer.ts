/**
 * bpfledger — bpftool JSON importer
 *
 * `bpftool prog show --json` / `map show --json` / `link show --json` の出力を
 * 読み込み、リポジトリの upsert 契約を使ってストアに一括で書き込む。
 * importBpftool() はコアロジック（ファイルシステム非依存・テスト可能）。
 * importBpftoolFiles() はファイル読み込みの薄いラッパー。
 */

import type Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { uintSchema } from '../codec/uint-blob.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ProgramKind, ProgramState } from '../types/entities.js';
import type { ImportDocuments, ImportPaths, ImportResult } from '../types/engine.js';
import { progTypeFromBpftool } from '../types/bpf.js';
import { ProgramRepository } from '../db/repository/program-repository.js';
import { LinkRepository } from '../db/repository/link-repository.js';
import { MapRepository } from '../db/repository/map-repository.js';
import { ProgramMapRepository } from '../db/repository/program-map-repository.js';
import { advanceState } from './lifecycle.js';

// ---------------------------------------------------------------------------
// bpftool JSON スキーマ
// ---------------------------------------------------------------------------

const idSchema = uintSchema(64);

/** `pinned` は bpftool のバージョンにより文字列または文字列配列。 */
const PinnedSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => (Array.isArray(value) ? value[0] : value));

export const BpftoolProgramSchema = z.object({
  id: idSchema,
  type: z.string(),
  name: z.string().optional(),
  tag: z.string().optional(),
  gpl_compatible: z.boolean().optional(),
  /** UNIX 秒（-j 出力）または整形済み文字列 */
  loaded_at: z.union([z.number(), z.string()]).optional(),
  bytes_xlated: z.number().int().nonnegative().optional(),
  jited: z.boolean().optional(),
  bytes_jited: z.number().int().nonnegative().optional(),
  bytes_memlock: z.number().int().nonnegative().optional(),
  verified_insns: z.number().int().nonnegative().optional(),
  map_ids: z.array(idSchema).optional(),
  btf_id: z.number().int().nonnegative().optional(),
  pinned: PinnedSchema,
});
export type BpftoolProgram = z.infer<typeof BpftoolProgramSchema>;

export const BpftoolMapSchema = z.object({
  id: idSchema,
  type: z.string().optional(),
  name: z.string().optional(),
  key_size: z.number().int().nonnegative().optional(),
  bytes_key: z.number().int().nonnegative().optional(),
  value_size: z.number().int().nonnegative().optional(),
  bytes_value: z.number().int().nonnegative().optional(),
  max_entries: z.number().int().nonnegative().optional(),
});
export type BpftoolMap = z.infer<typeof BpftoolMapSchema>;

export const BpftoolLinkSchema = z.object({
  id: idSchema,
  prog_id: idSchema,
  type: z.string().optional(),
  attach_type: z.string().optional(),
  target: z.string().optional(),
  devname: z.string().optional(),
  tp_name: z.string().optional(),
  pinned: PinnedSchema,
});
export type BpftoolLink = z.infer<typeof BpftoolLinkSchema>;

// ---------------------------------------------------------------------------
// エラー
// ---------------------------------------------------------------------------

export class ImportValidationError extends Error {
  readonly document: string;

  constructor(document: string, message: string, options?: ErrorOptions) {
    super(`${document}: ${message}`, options);
    this.name = 'ImportValidationError';
    this.document = document;
  }
}

function parseDocument<T extends z.ZodTypeAny>(
  document: string,
  schema: T,
  raw: unknown,
): z.output<T>[] {
  const parsed = z.array(schema).safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `[${issue.path.join('.')}] ${issue.message}`)
      .join('; ');
    throw new ImportValidationError(document, issues);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// 変換
// ---------------------------------------------------------------------------

/** bpftool の program type → 本ストアの kind。対応表にないものは取り込まない。 */
const KIND_BY_BPFTOOL_TYPE = new Map<string, ProgramKind>([
  ['xdp', 'xdp'],
  ['sched_cls', 'tc'],
  ['tracepoint', 'tracepoint'],
  ['kprobe', 'kprobe'],
  ['tracing', 'fentry'],
]);

function toIsoTimestamp(value: number | string | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number') return new Date(value * 1000).toISOString();
  return value;
}

function linkTarget(link: BpftoolLink): string | undefined {
  return link.target ?? link.devname ?? link.tp_name;
}

// ---------------------------------------------------------------------------
// importBpftool
// ---------------------------------------------------------------------------

/**
 * パース済み JSON ドキュメントを検証し、1 トランザクションでストアに upsert する。
 *
 * 1. maps を upsert
 * 2. 対応する kind を持つ programs を loaded 状態で upsert（既存行の状態は後退させない）
 * 3. programs の map_ids から bpf_program_maps を作成（存在しない map はスキップ）
 * 4. 既知の program を参照する links を upsert（それ以外はスキップ）
 * 5. link を持つ program を attached に遷移
 *
 * @throws ImportValidationError ドキュメントがスキーマに合わない場合
 */
export function importBpftool(
  db: Database.Database,
  documents: ImportDocuments,
  logger: Logger = silentLogger,
): ImportResult {
  const programs = parseDocument('programs', BpftoolProgramSchema, documents.programs);
  const maps = parseDocument('maps', BpftoolMapSchema, documents.maps);
  const links = parseDocument('links', BpftoolLinkSchema, documents.links);

  const programRepo = new ProgramRepository(db);
  const mapRepo = new MapRepository(db);
  const linkRepo = new LinkRepository(db);
  const programMapRepo = new ProgramMapRepository(db);

  const run = db.transaction((): ImportResult => {
    const result: ImportResult = {
      programs: 0,
      maps: 0,
      links: 0,
      programMaps: 0,
      attachedPrograms: 0,
      skipped: { programs: 0, links: 0, programMaps: 0 },
    };

    // 1. maps
    for (const map of maps) {
      mapRepo.upsert({
        id: map.id,
        name: map.name ?? `map_${map.id}`,
        mapType: map.type,
        keySize: map.key_size ?? map.bytes_key,
        valueSize: map.value_size ?? map.bytes_value,
        maxEntries: map.max_entries,
      });
      result.maps++;
    }
    const knownMapIds = new Set(mapRepo.findAll().map((m) => m.id));
    const storedStates = new Map<bigint, ProgramState>(
      programRepo.findAll().map((p) => [p.id, p.state]),
    );

    // 2. programs
    for (const prog of programs) {
      const kind = KIND_BY_BPFTOOL_TYPE.get(prog.type);
      if (kind === undefined) {
        logger.debug({ id: prog.id.toString(), type: prog.type }, 'skipping unsupported program type');
        result.skipped.programs++;
        continue;
      }
      const name = prog.name ?? `unknown_program_${prog.id}`;
      const stored = storedStates.get(prog.id);
      programRepo.upsert({
        id: prog.id,
        name,
        kind,
        state: stored === undefined ? 'loaded' : advanceState(stored, 'loaded'),
        location: { type: 'file', path: prog.pinned ?? '' },
        mapPinPath: prog.pinned ? path.posix.dirname(prog.pinned) : '',
        programBytes: Buffer.alloc(0),
        retprobe: kind === 'kprobe' ? false : undefined,
        fnName: kind === 'fentry' ? name : undefined,
        kernelName: prog.name,
        kernelProgramType: progTypeFromBpftool(prog.type),
        kernelLoadedAt: toIsoTimestamp(prog.loaded_at),
        kernelTag: prog.tag,
        kernelGplCompatible: prog.gpl_compatible,
        kernelBtfId: prog.btf_id,
        kernelBytesXlated: prog.bytes_xlated,
        kernelJited: prog.jited,
        kernelBytesJited: prog.bytes_jited,
        kernelVerifiedInsns: prog.verified_insns,
        kernelMapIds: JSON.stringify((prog.map_ids ?? []).map((id) => id.toString())),
        kernelBytesMemlock: prog.bytes_memlock,
      });
      result.programs++;

      // 3. program ↔ map
      for (const mapId of prog.map_ids ?? []) {
        if (!knownMapIds.has(mapId)) {
          result.skipped.programMaps++;
          continue;
        }
        if (programMapRepo.ensure(prog.id, mapId)) {
          result.programMaps++;
        }
      }
    }
    const knownProgramIds = new Set(programRepo.findAll().map((p) => p.id));

    // 4. links
    const linkedProgramIds = new Set<bigint>();
    for (const link of links) {
      if (!knownProgramIds.has(link.prog_id)) {
        logger.debug(
          { id: link.id.toString(), programId: link.prog_id.toString() },
          'skipping link to unknown program',
        );
        result.skipped.links++;
        continue;
      }
      linkRepo.upsert({
        id: link.id,
        programId: link.prog_id,
        linkType: link.type ?? link.attach_type,
        target: linkTarget(link),
        state: 'attached',
      });
      linkedProgramIds.add(link.prog_id);
      result.links++;
    }

    // 5. attached への遷移
    for (const programId of linkedProgramIds) {
      const program = programRepo.findById(programId);
      if (program.state !== 'attached') {
        programRepo.update({ ...program, state: advanceState(program.state, 'attached') });
      }
      result.attachedPrograms++;
    }

    return result;
  });

  const result = run();
  logger.info(result, 'bpftool import complete');
  return result;
}

/**
 * 3 つの JSON ファイルを読み込み、importBpftool() に渡す。
 */
export function importBpftoolFiles(
  db: Database.Database,
  paths: ImportPaths,
  logger: Logger = silentLogger,
): ImportResult {
  return importBpftool(
    db,
    {
      programs: readJsonFile(paths.programs),
      maps: readJsonFile(paths.maps),
      links: readJsonFile(paths.links),
    },
    logger,
  );
}

function readJsonFile(filePath: string): unknown {
  const resolved = path.resolve(filePath);
  const content = fs.readFileSync(resolved, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ImportValidationError(resolved, `invalid JSON: ${message}`, { cause: err });
  }
}
