/**
 * bpfledger — Lifecycle store for BPF programs, links and maps
 *
 * MCP Server エントリポイント。
 * stdio トランスポートで LLM Agent と接続する。
 */

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { serveStdio } from './mcp/stdio.js';

const config = loadConfig();
const logger = createLogger(config.logLevel, 'bpfledger-mcp');

await serveStdio(config.dbPath, logger);
