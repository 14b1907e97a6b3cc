import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, parseEnvFile } from '../src/config.js';

describe('parseEnvFile', () => {
  it('reads keys, strips quotes and skips comments', () => {
    const content = 'A=1\n# comment\n\nB="x y"\nC=\'q\'\nnot a pair\n  D = spaced  \n';
    expect(parseEnvFile(content)).toEqual({ A: '1', B: 'x y', C: 'q', D: 'spaced' });
  });

  it('keeps everything after the first equals sign', () => {
    expect(parseEnvFile('URL=a=b')).toEqual({ URL: 'a=b' });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ehlang-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeEnv(content: string, at: string = dir): void {
    fs.writeFileSync(path.join(at, '.env'), content);
  }

  it('defaults to production with no overrides', () => {
    writeEnv('');
    expect(loadConfig(dir, {})).toEqual({ environment: 'production' });
  });

  it('reads values from a .env file', () => {
    writeEnv('EHLANG_ENV=development\nEHLANG_LOG_LEVEL=debug\nEHLANG_MAX_SOURCE_LENGTH=500\n');
    expect(loadConfig(dir, {})).toEqual({
      environment: 'development',
      logLevel: 'debug',
      maxSourceLength: 500,
    });
  });

  it('finds a .env file in a parent directory', () => {
    writeEnv('EHLANG_LOG_LEVEL=warn');
    const nested = path.join(dir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    expect(loadConfig(nested, {}).logLevel).toBe('warn');
  });

  it('prefers the process environment over the .env file', () => {
    writeEnv('EHLANG_ENV=development\nEHLANG_LOG_LEVEL=debug');
    const config = loadConfig(dir, { EHLANG_ENV: 'test' });
    expect(config.environment).toBe('test');
    expect(config.logLevel).toBe('debug');
  });

  it('treats empty values as unset', () => {
    writeEnv('EHLANG_LOG_LEVEL=');
    expect(loadConfig(dir, { EHLANG_ENV: '' })).toEqual({ environment: 'production' });
  });

  it('rejects an unknown log level', () => {
    writeEnv('');
    expect(() => loadConfig(dir, { EHLANG_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => loadConfig(dir, { EHLANG_LOG_LEVEL: 'loud' })).toThrow(/^Invalid EHLANG_LOG_LEVEL: /);
  });

  it('names the variable behind a bad limit', () => {
    writeEnv('EHLANG_MAX_SOURCE_LENGTH=0');
    try {
      loadConfig(dir, {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ key: 'EHLANG_MAX_SOURCE_LENGTH' });
    }
  });
});
