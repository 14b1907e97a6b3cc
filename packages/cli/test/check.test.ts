import { createMockLogger } from '@ehlang/logger/mock';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { checkCommand, checkFile, collectFiles, runCheck } from '../src/commands/check.js';
import { trapExit } from './exit.js';

describe('check', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ehlang-check-'));
    fs.mkdirSync(path.join(dir, 'nested'));
    fs.mkdirSync(path.join(dir, 'node_modules'));
    fs.writeFileSync(path.join(dir, 'good.eh'), 'x : int;\n');
    fs.writeFileSync(path.join(dir, 'nested', 'bad.eh'), 'x : int');
    fs.writeFileSync(path.join(dir, 'node_modules', 'skip.eh'), 'x : int;');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'not a program');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('collectFiles', () => {
    it('finds .eh files below a directory in sorted order', () => {
      expect(collectFiles([dir])).toEqual([path.join(dir, 'good.eh'), path.join(dir, 'nested', 'bad.eh')]);
    });

    it('takes files as given', () => {
      const file = path.join(dir, 'notes.txt');
      expect(collectFiles([file])).toEqual([file]);
    });

    it('warns about and skips missing paths', () => {
      const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger = createMockLogger();
      const missing = path.join(dir, 'missing.eh');

      expect(collectFiles([missing], logger)).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith('path_not_found', { path: missing });
      expect(stderr).toHaveBeenCalledWith(`Path not found: ${missing}`);
    });
  });

  describe('checkFile', () => {
    it('reports no error for a valid file', () => {
      const file = path.join(dir, 'good.eh');
      expect(checkFile(file)).toEqual({ path: file, error: null });
    });

    it('reports the first syntax error with its position', () => {
      const file = path.join(dir, 'nested', 'bad.eh');
      expect(checkFile(file)).toEqual({
        path: file,
        error: {
          line: 1,
          column: 8,
          message: "Expected ';' after variable declaration, found end of input",
        },
      });
    });

    it('reports a source over the limit without a position', () => {
      const file = path.join(dir, 'good.eh');
      expect(checkFile(file, { limits: { maxSourceLength: 3 } }).error).toEqual({
        line: 0,
        column: 0,
        message: 'Source exceeds maximum length of 3 characters',
      });
    });

    it('logs through a per-file child logger', () => {
      const logger = createMockLogger();
      const file = path.join(dir, 'good.eh');
      checkFile(file, { logger });
      expect(logger.child).toHaveBeenCalledWith({ file });
    });
  });

  describe('runCheck', () => {
    const config = { environment: 'production' } as const;
    const failure = "    ✗ error  Line 1, column 8: Expected ';' after variable declaration, found end of input";

    function printed(spy: { mock: { calls: unknown[][] } }): string[] {
      return spy.mock.calls.map((call) => call.map(String).join(' '));
    }

    it('prints a pretty report and fails when any file fails', () => {
      const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
      const good = path.join(dir, 'good.eh');
      const bad = path.join(dir, 'nested', 'bad.eh');

      expect(runCheck([dir], { color: false }, config)).toBe(1);
      expect(printed(stdout)).toEqual([
        '',
        `  ${good}`,
        '    ✓ No issues',
        '',
        `  ${bad}`,
        failure,
        '',
        '  Found 1 error in 2 files',
        '',
      ]);
    });

    it('lists only failing files when quiet', () => {
      const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
      const bad = path.join(dir, 'nested', 'bad.eh');

      expect(runCheck([dir], { color: false, quiet: true }, config)).toBe(1);
      expect(printed(stdout)).toEqual(['', `  ${bad}`, failure, '', '  Found 1 error in 2 files', '']);
    });

    it('passes when every file parses', () => {
      const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
      const good = path.join(dir, 'good.eh');

      expect(runCheck([good], { color: false }, config)).toBe(0);
      expect(printed(stdout)).toEqual(['', `  ${good}`, '    ✓ No issues', '', '  ✓ All 1 files passed', '']);
    });

    it('prints a JSON report', () => {
      const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
      const good = path.join(dir, 'good.eh');
      const bad = path.join(dir, 'nested', 'bad.eh');

      expect(runCheck([dir], { format: 'json' }, config)).toBe(1);
      expect(stdout).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(stdout.mock.calls[0][0]))).toEqual({
        files: [
          { path: good, errors: [] },
          {
            path: bad,
            errors: [
              {
                line: 1,
                column: 8,
                message: "Expected ';' after variable declaration, found end of input",
                severity: 'error',
                code: 'SYNTAX_ERROR',
              },
            ],
          },
        ],
        summary: { files: 2, errors: 1 },
      });
    });

    it('succeeds quietly when there is nothing to check', () => {
      const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
      const empty = path.join(dir, 'empty');
      fs.mkdirSync(empty);

      expect(runCheck([empty], {}, config)).toBe(0);
      expect(printed(stdout)).toEqual(['No files found to check']);
    });

    it('exits with the check result from the command line', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      trapExit();

      await expect(
        checkCommand.parseAsync([path.join(dir, 'nested'), '--format', 'json'], { from: 'user' }),
      ).rejects.toMatchObject({ name: 'ExitSignal', code: 1 });
    });
  });
});
