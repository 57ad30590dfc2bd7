/**
 * bpfledger — Configuration
 *
 * Environment variables, validated once at start-up.
 */

import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';

const EnvSchema = z.object({
  BPFLEDGER_DB_PATH: z.string().min(1).default('bpfledger.db'),
  BPFLEDGER_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface Config {
  dbPath: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Parse configuration from `env` (defaults to process.env). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return {
    dbPath: parsed.data.BPFLEDGER_DB_PATH,
    logLevel: parsed.data.BPFLEDGER_LOG_LEVEL,
  };
}
