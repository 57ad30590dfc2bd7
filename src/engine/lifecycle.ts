/**
 * bpfledger — Lifecycle engine
 *
 * プログラムの状態遷移 (pre_load → loaded → attached) と、
 * 複数ステップからなる attach 操作をまとめる。
 * attach 系はすべて 1 トランザクションで実行し、途中で失敗した場合は
 * better-sqlite3 の db.transaction() がロールバックして元のエラーを再送出する。
 */

import type Database from 'better-sqlite3';
import type {
  BpfMap,
  KernelInfo,
  Link,
  Program,
  ProgramMap,
  ProgramState,
} from '../types/entities.js';
import type { AttachLinkInput, AttachMapInput, KernelInfoInput } from '../types/repository.js';
import { ProgramRepository } from '../db/repository/program-repository.js';
import { LinkRepository } from '../db/repository/link-repository.js';
import { MapRepository } from '../db/repository/map-repository.js';
import { ProgramMapRepository } from '../db/repository/program-map-repository.js';

// ============================================================
// 結果型
// ============================================================

/** attachLink() の戻り値。更新後の Program と作成された Link。 */
export interface AttachLinkResult {
  program: Program;
  link: Link;
}

/** attachMap() の戻り値。作成された Map と関連行。 */
export interface AttachMapResult {
  map: BpfMap;
  programMap: ProgramMap;
}

// ============================================================
// 状態遷移
// ============================================================

const STATE_ORDER: Record<ProgramState, number> = {
  pre_load: 0,
  loaded: 1,
  attached: 2,
};

/**
 * 線形な状態遷移を適用する。後退する遷移は無視し、現在の状態を返す。
 */
export function advanceState(current: ProgramState, next: ProgramState): ProgramState {
  return STATE_ORDER[next] > STATE_ORDER[current] ? next : current;
}

// ============================================================
// attachLink
// ============================================================

/**
 * 既存の Program にカーネルが払い出した Link を紐づける。
 *
 * 1 トランザクション内で以下を実行する:
 *   (a) Link 行を kernel link id で挿入（state = attached）
 *   (b) Program の state を attached に遷移
 *   (c) 更新後の Program 行を保存
 *
 * いずれかが失敗した場合は何も残らない。
 *
 * @param db      better-sqlite3 の Database インスタンス
 * @param program 対象の Program（呼び出し側が保持している状態）
 * @param link    Link の記述（種別・ターゲット）
 * @param linkId  カーネルが割り当てた link id
 */
export function attachLink(
  db: Database.Database,
  program: Program,
  link: AttachLinkInput,
  linkId: bigint,
): AttachLinkResult {
  const programRepo = new ProgramRepository(db);
  const linkRepo = new LinkRepository(db);

  const run = db.transaction((): AttachLinkResult => {
    const created = linkRepo.create({
      id: linkId,
      programId: program.id,
      linkType: link.linkType,
      target: link.target,
      state: 'attached',
    });

    const updated = programRepo.update({
      ...program,
      state: advanceState(program.state, 'attached'),
    });

    return { program: updated, link: created };
  });

  return run();
}

// ============================================================
// attachMap
// ============================================================

/**
 * 新しい Map を作成し、既存の Program に関連づける。
 *
 * Map 行と bpf_program_maps 行の挿入を 1 トランザクションで行う。
 * Program が存在しない場合は ForeignKeyViolationError となり、Map 行も残らない。
 */
export function attachMap(
  db: Database.Database,
  program: Program,
  map: AttachMapInput,
  mapId: bigint,
): AttachMapResult {
  const mapRepo = new MapRepository(db);
  const programMapRepo = new ProgramMapRepository(db);

  const run = db.transaction((): AttachMapResult => {
    const created = mapRepo.create({ ...map, id: mapId });
    const programMap = programMapRepo.create(program.id, created.id);
    return { map: created, programMap };
  });

  return run();
}

// ============================================================
// recordKernelInfo
// ============================================================

function mergeKernelInfo(current: KernelInfo, info: KernelInfoInput): KernelInfo {
  return {
    kernelName: info.kernelName ?? current.kernelName,
    kernelProgramType: info.kernelProgramType ?? current.kernelProgramType,
    kernelLoadedAt: info.kernelLoadedAt ?? current.kernelLoadedAt,
    kernelTag: info.kernelTag ?? current.kernelTag,
    kernelGplCompatible: info.kernelGplCompatible ?? current.kernelGplCompatible,
    kernelBtfId: info.kernelBtfId ?? current.kernelBtfId,
    kernelBytesXlated: info.kernelBytesXlated ?? current.kernelBytesXlated,
    kernelJited: info.kernelJited ?? current.kernelJited,
    kernelBytesJited: info.kernelBytesJited ?? current.kernelBytesJited,
    kernelVerifiedInsns: info.kernelVerifiedInsns ?? current.kernelVerifiedInsns,
    kernelMapIds: info.kernelMapIds ?? current.kernelMapIds,
    kernelBytesMemlock: info.kernelBytesMemlock ?? current.kernelBytesMemlock,
  };
}

/**
 * カーネルから取得したイントロスペクション情報を Program に書き込む。
 *
 * 状態遷移とは別の書き込みとして扱う。pre_load の Program は loaded に進み、
 * loaded / attached の Program は状態を維持する。
 * 値が undefined のキーは保存済みの値を保つ。
 * kernelLoadedAt がどちらにもない場合は現在時刻を記録する。
 */
export function recordKernelInfo(
  db: Database.Database,
  programId: bigint,
  info: KernelInfoInput,
): Program {
  const programRepo = new ProgramRepository(db);

  const run = db.transaction((): Program => {
    const current = programRepo.findById(programId);
    const merged = mergeKernelInfo(current, info);
    return programRepo.update({
      ...current,
      ...merged,
      kernelLoadedAt: merged.kernelLoadedAt ?? new Date().toISOString(),
      state: advanceState(current.state, 'loaded'),
    });
  });

  return run();
}
