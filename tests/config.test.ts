import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('未設定なら既定値を使う', () => {
    expect(loadConfig({})).toEqual({ dbPath: 'bpfledger.db', logLevel: 'info' });
  });

  it('環境変数を読む', () => {
    expect(
      loadConfig({ BPFLEDGER_DB_PATH: '/var/lib/bpfledger/store.db', BPFLEDGER_LOG_LEVEL: 'debug' }),
    ).toEqual({ dbPath: '/var/lib/bpfledger/store.db', logLevel: 'debug' });
  });

  it('不正なログレベルは ConfigError', () => {
    expect(() => loadConfig({ BPFLEDGER_LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    expect(() => loadConfig({ BPFLEDGER_LOG_LEVEL: 'verbose' })).toThrow(
      /^Invalid configuration: BPFLEDGER_LOG_LEVEL: /,
    );
  });

  it('空の DB パスは ConfigError', () => {
    expect(() => loadConfig({ BPFLEDGER_DB_PATH: '' })).toThrow(ConfigError);
  });
});
