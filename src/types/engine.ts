/**
 * bpfledger — Engine layer type definitions
 *
 * Engine 層の入出力型。MCP / CLI から再利用する。
 */

// ============================================================
// Import
// ============================================================

/** importBpftoolFiles() の入力。bpftool の JSON 出力 3 ファイルのパス。 */
export interface ImportPaths {
  programs: string;
  maps: string;
  links: string;
}

/** importBpftool() の入力。パース前の JSON ドキュメント。 */
export interface ImportDocuments {
  programs: unknown;
  maps: unknown;
  links: unknown;
}

/** 取り込まなかったレコードの件数。 */
export interface ImportSkipped {
  /** 対応する kind がない program type */
  programs: number;
  /** 存在しない program を参照する link */
  links: number;
  /** 存在しない map を参照する map_ids 要素 */
  programMaps: number;
}

/** importBpftool() の戻り値。upsert した件数とスキップ件数。 */
export interface ImportResult {
  programs: number;
  maps: number;
  links: number;
  programMaps: number;
  attachedPrograms: number;
  skipped: ImportSkipped;
}
