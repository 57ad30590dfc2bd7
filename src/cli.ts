/**
 * bpfledger — CLI entry point
 */

import { ConfigError, loadConfig } from './config.js';
import type { Config } from './config.js';
import { createLogger } from './logger.js';
import { createProgram } from './cli/program.js';

async function main(): Promise<void> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    process.stderr.write(`${err.message}\n`);
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(config.logLevel, 'bpfledger');
  const program = createProgram({
    config,
    logger,
    write: (line) => process.stdout.write(`${line}\n`),
  });

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ err }, message);
    process.exitCode = 1;
  }
}

void main();
