/**
 * bpfledger — Inspector テスト
 */

import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { migrateDatabase } from '../../src/db/migrate.js';
import { ProgramRepository } from '../../src/db/repository/program-repository.js';
import { MapRepository } from '../../src/db/repository/map-repository.js';
import {
  categorizeTable,
  formatHex,
  formatReport,
  inspectDatabase,
} from '../../src/engine/inspector.js';
import type { InspectionReport } from '../../src/engine/inspector.js';

function cellValue(report: InspectionReport, table: string, column: string): string | undefined {
  const found = report.tables.find((t) => t.name === table);
  return found?.rows[0]?.find((c) => c.column === column)?.value;
}

describe('inspector', () => {
  let db: InstanceType<typeof Database>;

  beforeEach(() => {
    db = new Database(':memory:');
    migrateDatabase(db);
  });

  it('categorizeTable - 既知のテーブル以外は Miscellaneous', () => {
    expect(categorizeTable('bpf_programs')).toBe('Programs');
    expect(categorizeTable('bpf_program_maps')).toBe('Program Maps');
    expect(categorizeTable('notes')).toBe('Miscellaneous');
  });

  it('formatHex - 先頭 10 バイトまで表示する', () => {
    expect(formatHex(Buffer.from([0xab, 0x01]))).toBe('[AB 01] (2 bytes)');
    expect(formatHex(Buffer.from([...Array(12).keys()]))).toBe(
      '[00 01 02 03 04 05 06 07 08 09 ...] (12 bytes)',
    );
    expect(formatHex(Buffer.alloc(0))).toBe('[] (0 bytes)');
  });

  it('BLOB 列を宣言幅でデコードし、program type は名前で表示する', () => {
    new ProgramRepository(db).create({
      id: 18446744073709551615n,
      name: 'xdp_pass',
      kind: 'xdp',
      location: { type: 'file', path: '/opt/bpf/xdp_pass.o' },
      mapPinPath: '/sys/fs/bpf',
      programBytes: Buffer.from([...Array(12).keys()]),
      kernelProgramType: 6,
      kernelGplCompatible: true,
      kernelJited: false,
      kernelBtfId: 4294967295,
    });

    const report = inspectDatabase(db);

    expect(report.counts.Programs).toBe(1);
    expect(cellValue(report, 'bpf_programs', 'id')).toBe('18446744073709551615');
    expect(cellValue(report, 'bpf_programs', 'kernel_program_type')).toBe('BPF_PROG_TYPE_XDP');
    expect(cellValue(report, 'bpf_programs', 'kernel_gpl_compatible')).toBe('true');
    expect(cellValue(report, 'bpf_programs', 'kernel_jited')).toBe('false');
    expect(cellValue(report, 'bpf_programs', 'kernel_btf_id')).toBe('4294967295');
    expect(cellValue(report, 'bpf_programs', 'program_bytes')).toBe(
      '[00 01 02 03 04 05 06 07 08 09 ...] (12 bytes)',
    );
    expect(cellValue(report, 'bpf_programs', 'map_owner_id')).toBe('NULL');
  });

  it('宣言幅と合わない BLOB は 16 進で表示する', () => {
    new ProgramRepository(db).create({
      id: 1n,
      name: 'p',
      kind: 'xdp',
      location: { type: 'file', path: '/tmp/p.o' },
      mapPinPath: '',
      programBytes: Buffer.alloc(0),
    });
    db.pragma('ignore_check_constraints = ON');
    db.prepare<[Buffer]>('UPDATE bpf_programs SET kernel_btf_id = ?').run(Buffer.from([1, 2]));

    expect(cellValue(inspectDatabase(db), 'bpf_programs', 'kernel_btf_id')).toBe(
      '[01 02] (2 bytes)',
    );
  });

  it('未知のテーブルは Miscellaneous として最後に並ぶ', () => {
    db.exec("CREATE TABLE notes (body TEXT, raw BLOB); INSERT INTO notes VALUES ('hello', x'ABCD')");

    const report = inspectDatabase(db);

    expect(report.tables.map((t) => t.name)).toEqual([
      'bpf_programs',
      'bpf_links',
      'bpf_maps',
      'bpf_program_maps',
      'notes',
    ]);
    expect(report.counts.Miscellaneous).toBe(1);
    expect(cellValue(report, 'notes', 'body')).toBe('hello');
    expect(cellValue(report, 'notes', 'raw')).toBe('[AB CD] (2 bytes)');
  });

  it('formatReport - サマリとセクションを出力する', () => {
    new MapRepository(db).create({ id: 7n, name: 'flows' });

    const lines = formatReport(inspectDatabase(db));

    expect(lines.slice(0, 16)).toEqual([
      'Summary',
      '  Programs: 0',
      '  Links: 0',
      '  Maps: 1',
      '  Program Maps: 0',
      '  Miscellaneous: 0',
      '',
      '== Programs: bpf_programs (0 rows) ==',
      '',
      '== Links: bpf_links (0 rows) ==',
      '',
      '== Maps: bpf_maps (1 rows) ==',
      '[1]',
      '  id: 7',
      '  name: flows',
      '  map_type: NULL',
    ]);
  });

  it('formatReport - JSON 列は通常は整形、compact では 1 行で切り詰める', () => {
    new ProgramRepository(db).create({
      id: 1n,
      name: 'p',
      description: 'x'.repeat(150),
      kind: 'xdp',
      location: { type: 'file', path: '/tmp/p.o' },
      mapPinPath: '',
      programBytes: Buffer.alloc(0),
      metadata: '{"owner":"ops","tags":["a"]}',
    });
    const report = inspectDatabase(db);

    const pretty = formatReport(report);
    const start = pretty.indexOf('  metadata: {');
    expect(pretty.slice(start, start + 6)).toEqual([
      '  metadata: {',
      '    "owner": "ops",',
      '    "tags": [',
      '      "a"',
      '    ]',
      '  }',
    ]);
    expect(pretty).toContain('  kernel_map_ids: []');

    const compact = formatReport(report, { compact: true });
    expect(compact).toContain('  metadata: {"owner":"ops","tags":["a"]}');
    expect(compact).toContain(`  description: ${'x'.repeat(97)}...`);
  });
});
