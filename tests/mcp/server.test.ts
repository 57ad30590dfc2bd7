/**
 * bpfledger — MCP Server 統合テスト
 *
 * InMemoryTransport でサーバーとクライアントをインメモリ接続し、
 * 全ツール・リソースの動作を検証する。
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { migrateDatabase } from '../../src/db/migrate.js';
import { createMcpServer } from '../../src/mcp/server.js';
import { ProgramRepository } from '../../src/db/repository/program-repository.js';
import { LinkRepository } from '../../src/db/repository/link-repository.js';
import { attachLink, attachMap } from '../../src/engine/lifecycle.js';

const FIXTURES = fileURLToPath(new URL('../fixtures/bpftool/', import.meta.url));

const TextContentSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
  isError: z.boolean().optional(),
});

const ResourceSchema = z.object({
  contents: z.array(z.object({ uri: z.string(), text: z.string() })).min(1),
});

/** ツール結果の先頭テキストと isError を取り出す */
function toolText(result: unknown): { text: string; isError: boolean } {
  const parsed = TextContentSchema.parse(result);
  return { text: parsed.content[0].text, isError: parsed.isError ?? false };
}

function toolJson(result: unknown): unknown {
  return JSON.parse(toolText(result).text);
}

describe('MCP Server', () => {
  let db: InstanceType<typeof Database>;
  let client: Client;
  let programs: ProgramRepository;

  function seedProgram(id: bigint, name: string) {
    return programs.create({
      id,
      name,
      kind: 'xdp',
      location: {
        type: 'image',
        url: 'quay.io/example/xdp:latest',
        username: 'test-user',
        password: 'test-secret',
      },
      mapPinPath: '/sys/fs/bpf',
      programBytes: Buffer.from([1, 2, 3]),
    });
  }

  beforeEach(async () => {
    db = new Database(':memory:');
    migrateDatabase(db);
    programs = new ProgramRepository(db);

    const server = createMcpServer(db);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    await server.connect(serverTransport);
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
  });

  // =========================================================
  // 登録確認
  // =========================================================

  it('3 ツールが登録されている', async () => {
    const result = await client.listTools();
    const toolNames = result.tools.map((t) => t.name).sort();

    expect(toolNames).toEqual(['delete_program', 'import_bpftool', 'query']);
  });

  it('リソースが登録されている', async () => {
    const result = await client.listResources();
    const uris = result.resources.map((r) => r.uri).sort();

    expect(uris).toEqual(['bpfledger://programs', 'bpfledger://summary']);
  });

  // =========================================================
  // query
  // =========================================================

  it('list_programs — 空の場合は空配列', async () => {
    const result = await client.callTool({ name: 'query', arguments: { action: 'list_programs' } });
    expect(toolJson(result)).toEqual([]);
  });

  it('list_programs — id は 10 進文字列、パスワードは伏せる', async () => {
    seedProgram(18446744073709551615n, 'edge');

    const result = await client.callTool({ name: 'query', arguments: { action: 'list_programs' } });
    const list = z
      .array(
        z.object({
          id: z.string(),
          name: z.string(),
          programBytesLength: z.number(),
          location: z.object({ password: z.string() }),
        }),
      )
      .parse(toolJson(result));

    expect(list).toHaveLength(1);
    expect(list[0].id).toBe('18446744073709551615');
    expect(list[0].programBytesLength).toBe(3);
    expect(list[0].location.password).toBe('********');
  });

  it('list_programs — state で絞り込む', async () => {
    const program = seedProgram(1n, 'attached_prog');
    seedProgram(2n, 'idle_prog');
    attachLink(db, program, { target: 'eth0' }, 100n);

    const result = await client.callTool({
      name: 'query',
      arguments: { action: 'list_programs', state: 'attached' },
    });
    const list = z.array(z.object({ name: z.string() })).parse(toolJson(result));
    expect(list.map((p) => p.name)).toEqual(['attached_prog']);
  });

  it('get_program — link と map を含めて返す', async () => {
    const program = seedProgram(1n, 'prog');
    const { program: attached } = attachLink(db, program, { linkType: 'xdp', target: 'eth0' }, 100n);
    attachMap(db, attached, { name: 'flows' }, 4294967295n);

    const result = await client.callTool({
      name: 'query',
      arguments: { action: 'get_program', id: '1' },
    });
    const detail = z
      .object({
        state: z.string(),
        links: z.array(z.object({ id: z.string(), target: z.string() })),
        maps: z.array(z.object({ id: z.string(), name: z.string() })),
      })
      .parse(toolJson(result));

    expect(detail.state).toBe('attached');
    expect(detail.links).toEqual([expect.objectContaining({ id: '100', target: 'eth0' })]);
    expect(detail.maps).toEqual([expect.objectContaining({ id: '4294967295', name: 'flows' })]);
  });

  it('get_program — 存在しない id / 不正な id / id なしはエラー', async () => {
    const missing = toolText(
      await client.callTool({ name: 'query', arguments: { action: 'get_program', id: '9' } }),
    );
    expect(missing).toEqual({ text: 'Program not found: 9', isError: true });

    const invalid = toolText(
      await client.callTool({ name: 'query', arguments: { action: 'get_program', id: 'abc' } }),
    );
    expect(invalid).toEqual({ text: 'Invalid id: abc', isError: true });

    const absent = toolText(
      await client.callTool({ name: 'query', arguments: { action: 'get_program' } }),
    );
    expect(absent).toEqual({ text: 'id parameter required for get_program', isError: true });
  });

  it('list_links / list_maps — programId で絞り込む', async () => {
    const first = seedProgram(1n, 'first');
    const second = seedProgram(2n, 'second');
    attachLink(db, first, { target: 'eth0' }, 100n);
    attachLink(db, second, { target: 'eth1' }, 200n);
    attachMap(db, first, { name: 'first_map' }, 10n);

    const links = z
      .array(z.object({ id: z.string() }))
      .parse(
        toolJson(
          await client.callTool({
            name: 'query',
            arguments: { action: 'list_links', programId: '2' },
          }),
        ),
      );
    expect(links.map((l) => l.id)).toEqual(['200']);

    const maps = z
      .array(z.object({ name: z.string() }))
      .parse(toolJson(await client.callTool({ name: 'query', arguments: { action: 'list_maps' } })));
    expect(maps.map((m) => m.name)).toEqual(['first_map']);
  });

  it('summary — 状態別の件数を返す', async () => {
    const program = seedProgram(1n, 'p1');
    seedProgram(2n, 'p2');
    attachLink(db, program, { target: 'eth0' }, 100n);

    const result = await client.callTool({ name: 'query', arguments: { action: 'summary' } });
    expect(toolJson(result)).toEqual({
      programs: { pre_load: 1, loaded: 0, attached: 1 },
      links: 1,
      maps: 0,
      programMaps: 0,
    });
  });

  // =========================================================
  // import_bpftool
  // =========================================================

  it('import_bpftool — ファイルを取り込んで件数を返す', async () => {
    const result = await client.callTool({
      name: 'import_bpftool',
      arguments: {
        programs: path.join(FIXTURES, 'prog.json'),
        maps: path.join(FIXTURES, 'map.json'),
        links: path.join(FIXTURES, 'link.json'),
      },
    });

    expect(toolText(result)).toEqual({
      text: [
        'Imported 4 programs, 2 maps, 3 links, 3 program-map associations',
        'Attached programs: 3',
        'Skipped: 1 programs, 1 links, 1 program-map associations',
      ].join('\n'),
      isError: false,
    });
    expect(programs.findAll()).toHaveLength(4);
  });

  it('import_bpftool — 存在しないファイルはエラー', async () => {
    const result = await client.callTool({
      name: 'import_bpftool',
      arguments: {
        programs: path.join(FIXTURES, 'missing.json'),
        maps: path.join(FIXTURES, 'map.json'),
        links: path.join(FIXTURES, 'link.json'),
      },
    });

    const { text, isError } = toolText(result);
    expect(isError).toBe(true);
    expect(text.startsWith('Import failed: ENOENT')).toBe(true);
  });

  // =========================================================
  // delete_program
  // =========================================================

  it('delete_program — program と link を削除する', async () => {
    const program = seedProgram(1n, 'doomed');
    attachLink(db, program, { target: 'eth0' }, 100n);

    const result = await client.callTool({ name: 'delete_program', arguments: { id: '1' } });

    expect(toolText(result)).toEqual({ text: 'Deleted program 1', isError: false });
    expect(programs.findAll()).toEqual([]);
    expect(new LinkRepository(db).findAll()).toEqual([]);
  });

  it('delete_program — 存在しない program はエラー', async () => {
    const result = await client.callTool({ name: 'delete_program', arguments: { id: '5' } });
    expect(toolText(result)).toEqual({ text: 'Program not found: 5', isError: true });
  });

  // =========================================================
  // リソース
  // =========================================================

  it('bpfledger://summary — 件数を返す', async () => {
    seedProgram(1n, 'p1');

    const result = ResourceSchema.parse(await client.readResource({ uri: 'bpfledger://summary' }));
    const summary: unknown = JSON.parse(result.contents[0].text);

    expect(result.contents[0].uri).toBe('bpfledger://summary');
    expect(summary).toEqual({
      programs: { pre_load: 1, loaded: 0, attached: 0 },
      links: 0,
      maps: 0,
      programMaps: 0,
    });
  });

  it('bpfledger://programs — id 順の一覧を返す', async () => {
    seedProgram(256n, 'b');
    seedProgram(255n, 'a');

    const result = ResourceSchema.parse(await client.readResource({ uri: 'bpfledger://programs' }));
    const list = z.array(z.object({ id: z.string() })).parse(JSON.parse(result.contents[0].text));

    expect(list.map((p) => p.id)).toEqual(['255', '256']);
  });
});
