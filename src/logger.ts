/**
 * bpfledger — Logger
 *
 * pino writes to stderr so stdout stays reserved for CLI output and the MCP
 * stdio transport.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(level: LogLevel, name = 'bpfledger'): Logger {
  return pino(
    {
      name,
      level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

/** Default for library calls made without a logger (tests, embedding). */
export const silentLogger: Logger = pino({ level: 'silent' });
