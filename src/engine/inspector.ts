/**
 * bpfledger — Database inspector
 *
 * ストアの SQLite ファイルを読み取り専用で走査し、人間が読める形に整形する。
 * BLOB 列は宣言された幅でデコードし、幅が合わないものや幅を持たないものは
 * 先頭 10 バイトの 16 進表記で表示する。
 */

import type Database from 'better-sqlite3';
import { UintCodecError, uintCodec } from '../codec/uint-blob.js';
import type { UintWidth } from '../codec/uint-blob.js';
import { progTypeName } from '../types/bpf.js';

// ============================================================
// 型
// ============================================================

export const TABLE_CATEGORIES = ['Programs', 'Links', 'Maps', 'Program Maps', 'Miscellaneous'] as const;
export type TableCategory = (typeof TABLE_CATEGORIES)[number];

export interface InspectedCell {
  column: string;
  /** 1 行に収まる表示文字列 */
  value: string;
  /** JSON テキスト列のパース結果。整形表示に使う。 */
  json?: unknown;
}

export interface InspectedTable {
  name: string;
  category: TableCategory;
  rows: InspectedCell[][];
}

export interface InspectionReport {
  /** カテゴリごとの行数 */
  counts: Record<TableCategory, number>;
  tables: InspectedTable[];
}

export interface FormatOptions {
  compact?: boolean;
}

// ============================================================
// 列の宣言
// ============================================================

const CATEGORY_BY_TABLE = new Map<string, TableCategory>([
  ['bpf_programs', 'Programs'],
  ['bpf_links', 'Links'],
  ['bpf_maps', 'Maps'],
  ['bpf_program_maps', 'Program Maps'],
]);

/** BLOB 列の宣言幅。src/db/schema.ts の CHECK 制約と一致させる。 */
const BLOB_WIDTHS = new Map<string, ReadonlyMap<string, UintWidth>>([
  [
    'bpf_programs',
    new Map<string, UintWidth>([
      ['id', 64],
      ['map_owner_id', 64],
      ['kernel_program_type', 32],
      ['kernel_gpl_compatible', 8],
      ['kernel_btf_id', 32],
      ['kernel_jited', 8],
    ]),
  ],
  [
    'bpf_links',
    new Map<string, UintWidth>([
      ['id', 64],
      ['program_id', 64],
    ]),
  ],
  ['bpf_maps', new Map<string, UintWidth>([['id', 64]])],
  [
    'bpf_program_maps',
    new Map<string, UintWidth>([
      ['program_id', 64],
      ['map_id', 64],
    ]),
  ],
]);

const FLAG_COLUMNS = new Set(['kernel_gpl_compatible', 'kernel_jited']);
const JSON_COLUMNS = new Set(['metadata', 'global_data', 'kernel_map_ids']);

const HEX_PREVIEW_BYTES = 10;
const COMPACT_MAX_LENGTH = 100;

export function categorizeTable(name: string): TableCategory {
  return CATEGORY_BY_TABLE.get(name) ?? 'Miscellaneous';
}

// ============================================================
// セル表示
// ============================================================

/** `[AA BB ...] (n bytes)` 形式。先頭 10 バイトのみ表示する。 */
export function formatHex(bytes: Buffer): string {
  const preview = [...bytes.subarray(0, HEX_PREVIEW_BYTES)]
    .map((b) => b.toString(16).toUpperCase().padStart(2, '0'))
    .join(' ');
  const ellipsis = bytes.length > HEX_PREVIEW_BYTES ? ' ...' : '';
  return `[${preview}${ellipsis}] (${bytes.length} bytes)`;
}

function renderBlob(table: string, column: string, bytes: Buffer): string {
  const width = BLOB_WIDTHS.get(table)?.get(column);
  if (width === undefined) return formatHex(bytes);

  let value: bigint;
  try {
    value = uintCodec(width).decode(bytes);
  } catch (err) {
    if (err instanceof UintCodecError) return formatHex(bytes);
    throw err;
  }

  if (column === 'kernel_program_type') return progTypeName(Number(value));
  if (FLAG_COLUMNS.has(column)) return value !== 0n ? 'true' : 'false';
  return value.toString();
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    if (err instanceof SyntaxError) return { ok: false };
    throw err;
  }
}

export function renderCell(table: string, column: string, value: unknown): InspectedCell {
  if (value === null || value === undefined) return { column, value: 'NULL' };
  if (Buffer.isBuffer(value)) return { column, value: renderBlob(table, column, value) };
  if (typeof value === 'string' && JSON_COLUMNS.has(column)) {
    const parsed = parseJson(value);
    if (parsed.ok) {
      return { column, value: JSON.stringify(parsed.value), json: parsed.value };
    }
  }
  return { column, value: String(value) };
}

// ============================================================
// inspectDatabase
// ============================================================

/**
 * ユーザーテーブルをすべて読み取り、カテゴリ別に分類したレポートを返す。
 * 書き込みは行わない。
 */
export function inspectDatabase(db: Database.Database): InspectionReport {
  const tableNames = db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    )
    .all()
    .map((row) => row.name);

  const counts: Record<TableCategory, number> = {
    Programs: 0,
    Links: 0,
    Maps: 0,
    'Program Maps': 0,
    Miscellaneous: 0,
  };

  const tables = tableNames.map((name): InspectedTable => {
    const category = categorizeTable(name);
    const quoted = `"${name.replaceAll('"', '""')}"`;
    const rows = db
      .prepare<[], Record<string, unknown>>(`SELECT * FROM ${quoted}`)
      .all()
      .map((row) => Object.entries(row).map(([column, value]) => renderCell(name, column, value)));
    counts[category] += rows.length;
    return { name, category, rows };
  });

  // 主要テーブルを先に、Miscellaneous を最後に並べる
  tables.sort(
    (a, b) => TABLE_CATEGORIES.indexOf(a.category) - TABLE_CATEGORIES.indexOf(b.category),
  );

  return { counts, tables };
}

// ============================================================
// formatReport
// ============================================================

function truncate(text: string): string {
  return text.length > COMPACT_MAX_LENGTH ? `${text.slice(0, COMPACT_MAX_LENGTH - 3)}...` : text;
}

function formatCell(cell: InspectedCell, compact: boolean): string[] {
  if (compact) return [`  ${cell.column}: ${truncate(cell.value)}`];
  if (cell.json === undefined || typeof cell.json !== 'object' || cell.json === null) {
    return [`  ${cell.column}: ${cell.value}`];
  }
  const [first = '', ...rest] = JSON.stringify(cell.json, null, 2).split('\n');
  return [`  ${cell.column}: ${first}`, ...rest.map((line) => `  ${line}`)];
}

/**
 * レポートをテキスト行に整形する。先頭にサマリ、続いてテーブルごとのセクション。
 * compact では JSON を 1 行で出し、各値を 100 文字で切り詰める。
 */
export function formatReport(report: InspectionReport, options: FormatOptions = {}): string[] {
  const compact = options.compact ?? false;
  const lines: string[] = ['Summary'];
  for (const category of TABLE_CATEGORIES) {
    lines.push(`  ${category}: ${report.counts[category]}`);
  }

  for (const table of report.tables) {
    lines.push('');
    lines.push(`== ${table.category}: ${table.name} (${table.rows.length} rows) ==`);
    table.rows.forEach((row, index) => {
      lines.push(`[${index + 1}]`);
      for (const cell of row) {
        lines.push(...formatCell(cell, compact));
      }
    });
  }

  return lines;
}
