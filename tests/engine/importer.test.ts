/**
 * bpfledger — bpftool importer テスト
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { migrateDatabase } from '../../src/db/migrate.js';
import { ProgramRepository } from '../../src/db/repository/program-repository.js';
import { LinkRepository } from '../../src/db/repository/link-repository.js';
import { MapRepository } from '../../src/db/repository/map-repository.js';
import { ProgramMapRepository } from '../../src/db/repository/program-map-repository.js';
import {
  ImportValidationError,
  importBpftool,
  importBpftoolFiles,
} from '../../src/engine/importer.js';
import { attachLink } from '../../src/engine/lifecycle.js';
import type { ImportPaths } from '../../src/types/engine.js';

const FIXTURES = fileURLToPath(new URL('../fixtures/bpftool/', import.meta.url));

const FIXTURE_PATHS: ImportPaths = {
  programs: path.join(FIXTURES, 'prog.json'),
  maps: path.join(FIXTURES, 'map.json'),
  links: path.join(FIXTURES, 'link.json'),
};

describe('importBpftoolFiles', () => {
  let db: InstanceType<typeof Database>;

  beforeEach(() => {
    db = new Database(':memory:');
    migrateDatabase(db);
  });

  it('取り込んだ件数とスキップ件数を返す', () => {
    const result = importBpftoolFiles(db, FIXTURE_PATHS);

    expect(result).toEqual({
      programs: 4,
      maps: 2,
      links: 3,
      programMaps: 3,
      attachedPrograms: 3,
      skipped: { programs: 1, links: 1, programMaps: 1 },
    });
  });

  it('bpftool の型を kind に対応づけ、カーネル情報を保存する', () => {
    importBpftoolFiles(db, FIXTURE_PATHS);
    const programs = new ProgramRepository(db);

    const xdp = programs.findById(42n);
    expect(xdp.kind).toBe('xdp');
    expect(xdp.state).toBe('attached');
    expect(xdp.location).toEqual({ type: 'file', path: '/sys/fs/bpf/xdp_pass' });
    expect(xdp.mapPinPath).toBe('/sys/fs/bpf');
    expect(xdp.kernelProgramType).toBe(6);
    expect(xdp.kernelTag).toBe('3b185187f1855c4c');
    expect(xdp.kernelLoadedAt).toBe('2026-01-01T00:00:00.000Z');
    expect(xdp.kernelJited).toBe(true);
    expect(xdp.kernelBtfId).toBe(12);
    expect(xdp.kernelMapIds).toBe('["7","8"]');
    expect(xdp.programBytes).toHaveLength(0);

    expect(programs.findById(43n).kind).toBe('tc');
    expect(programs.findById(43n).kernelProgramType).toBe(3);
    expect(programs.findById(44n).retprobe).toBe(false);

    const fentry = programs.findById(45n);
    expect(fentry.kind).toBe('fentry');
    expect(fentry.fnName).toBe('fentry_exec');
    expect(fentry.state).toBe('loaded');
    expect(fentry.kernelProgramType).toBe(26);

    expect(programs.findAll().map((p) => p.id)).toEqual([42n, 43n, 44n, 45n]);
  });

  it('link のターゲットと種別、map のサイズを保存する', () => {
    importBpftoolFiles(db, FIXTURE_PATHS);

    const links = new LinkRepository(db).findAll();
    expect(links.map((l) => [l.id, l.linkType, l.target, l.state])).toEqual([
      [100n, 'xdp', 'eth0', 'attached'],
      [101n, 'tcx', 'eth1', 'attached'],
      [103n, 'perf_event', undefined, 'attached'],
    ]);

    const flows = new MapRepository(db).findById(7n);
    expect(flows).toMatchObject({ name: 'flows', mapType: 'hash', keySize: 4, valueSize: 8 });
    expect(new ProgramMapRepository(db).findByMapId(7n).map((pm) => pm.programId)).toEqual([
      42n,
      43n,
    ]);
  });

  it('同じ入力を 2 回取り込んでも行は増えない', () => {
    importBpftoolFiles(db, FIXTURE_PATHS);
    const second = importBpftoolFiles(db, FIXTURE_PATHS);

    expect(second.programMaps).toBe(0);
    expect(second.attachedPrograms).toBe(3);
    expect(new ProgramRepository(db).findAll()).toHaveLength(4);
    expect(new LinkRepository(db).findAll()).toHaveLength(3);
    expect(new ProgramMapRepository(db).findAll()).toHaveLength(3);
  });

  describe('不正な入力', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bpfledger-import-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('JSON として読めないファイルは ImportValidationError', () => {
      const broken = path.join(dir, 'prog.json');
      fs.writeFileSync(broken, '[{"id": 1,');

      expect(() => importBpftoolFiles(db, { ...FIXTURE_PATHS, programs: broken })).toThrow(
        ImportValidationError,
      );
      expect(new MapRepository(db).findAll()).toEqual([]);
    });
  });
});

describe('importBpftool', () => {
  let db: InstanceType<typeof Database>;

  beforeEach(() => {
    db = new Database(':memory:');
    migrateDatabase(db);
  });

  it('u64 の最大値を文字列 id で受け付ける', () => {
    importBpftool(db, {
      programs: [{ id: '18446744073709551615', type: 'xdp', name: 'edge' }],
      maps: [],
      links: [],
    });

    expect(new ProgramRepository(db).findById(18446744073709551615n).name).toBe('edge');
  });

  it('スキーマに合わない要素は document 名付きの ImportValidationError', () => {
    let caught: unknown;
    try {
      importBpftool(db, { programs: [], maps: [{ id: -1 }], links: [] });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ImportValidationError);
    if (caught instanceof ImportValidationError) {
      expect(caught.document).toBe('maps');
      expect(caught.message.startsWith('maps: [0.id]')).toBe(true);
    }
  });

  it('配列でないドキュメントは拒否し、何も書き込まない', () => {
    expect(() =>
      importBpftool(db, {
        programs: [{ id: 1, type: 'xdp', name: 'ok' }],
        maps: [],
        links: { id: 1 },
      }),
    ).toThrow(ImportValidationError);
    expect(new ProgramRepository(db).findAll()).toEqual([]);
  });

  it('name のない program には id から名前を付ける', () => {
    importBpftool(db, { programs: [{ id: 9, type: 'tracepoint' }], maps: [], links: [] });
    expect(new ProgramRepository(db).findById(9n).name).toBe('unknown_program_9');
  });

  it('link を含まない再取り込みでも attached の program は loaded に戻らない', () => {
    const programs = new ProgramRepository(db);
    const program = programs.create({
      id: 42n,
      name: 'xdp_pass',
      kind: 'xdp',
      location: { type: 'file', path: '/opt/bpf/xdp_pass.o' },
      mapPinPath: '/sys/fs/bpf/xdp_pass',
      programBytes: Buffer.alloc(0),
    });
    attachLink(db, program, { target: 'eth0' }, 100n);

    const result = importBpftool(db, {
      programs: [{ id: 42, type: 'xdp', name: 'xdp_pass' }],
      maps: [],
      links: [],
    });

    expect(result.programs).toBe(1);
    expect(result.attachedPrograms).toBe(0);
    expect(programs.findById(42n).state).toBe('attached');
    expect(new LinkRepository(db).findByProgramId(42n)).toHaveLength(1);
  });

  it('既存の pre_load の program は loaded に進む', () => {
    const programs = new ProgramRepository(db);
    programs.create({
      id: 7n,
      name: 'trace_exec',
      kind: 'tracepoint',
      location: { type: 'file', path: '/opt/bpf/trace_exec.o' },
      mapPinPath: '/sys/fs/bpf/trace_exec',
      programBytes: Buffer.alloc(0),
    });

    importBpftool(db, { programs: [{ id: 7, type: 'tracepoint' }], maps: [], links: [] });

    expect(programs.findById(7n).state).toBe('loaded');
  });
});
