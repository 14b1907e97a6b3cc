/**
 * ehlang check command
 *
 * Parses each file (directories are searched for *.eh) and reports the first
 * syntax error of every file that fails.
 */

import { tryParse, type ParseOptions } from '@ehlang/frontend';
import type { Logger } from '@ehlang/logger';
import chalk from 'chalk';
import { Command } from 'commander';
import { globSync } from 'glob';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { loadConfig, type EhlangConfig } from '../config.js';
import { createCliLogger } from '../logging.js';

export interface CheckDiagnostic {
  line: number;
  column: number;
  message: string;
}

export interface CheckResult {
  path: string;
  error: CheckDiagnostic | null;
}

export interface CheckOptions {
  format?: string;
  quiet?: boolean;
  color?: boolean;
}

export const checkCommand = new Command('check')
  .description('Check ehlang files for syntax errors')
  .argument('[paths...]', 'Files or directories to check', ['.'])
  .option('--format <type>', 'Output format: pretty, json', 'pretty')
  .option('--quiet', 'Only output on errors')
  .option('--no-color', 'Disable colored output')
  .action((paths: string[], options: CheckOptions) => {
    process.exit(runCheck(paths, options));
  });

/**
 * Check `paths` and print a report. Returns the exit code: 0 when every file
 * parses, 1 when any fails, 2 on unexpected errors.
 */
export function runCheck(paths: string[], options: CheckOptions, config?: EhlangConfig): number {
  try {
    const resolved = config ?? loadConfig();
    const logger = createCliLogger(resolved, 'check');
    const files = collectFiles(paths, logger);

    if (files.length === 0) {
      if (!options.quiet) {
        console.log('No files found to check');
      }
      return 0;
    }

    const parseOptions: ParseOptions = {
      logger,
      limits: resolved.maxSourceLength ? { maxSourceLength: resolved.maxSourceLength } : undefined,
    };
    const results = files.map((file) => checkFile(file, parseOptions));

    if (options.format === 'json') {
      reportJson(results);
    } else {
      reportPretty(results, options);
    }

    return results.some((r) => r.error !== null) ? 1 : 0;
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    return 2;
  }
}

/**
 * Expand paths into the list of files to check. Directories contribute every
 * *.eh file below them; missing paths are logged and skipped.
 */
export function collectFiles(paths: string[], logger?: Logger): string[] {
  const files: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(p);

    if (!fs.existsSync(resolved)) {
      logger?.warn('path_not_found', { path: p });
      console.error(`Path not found: ${p}`);
      continue;
    }

    if (fs.statSync(resolved).isDirectory()) {
      const found = globSync('**/*.eh', {
        cwd: resolved,
        absolute: true,
        ignore: ['**/node_modules/**', '**/dist/**'],
      });
      files.push(...found.sort());
    } else {
      files.push(resolved);
    }
  }

  return files;
}

/**
 * Parse one file and report its syntax error, if any
 */
export function checkFile(filePath: string, options: ParseOptions = {}): CheckResult {
  const content = fs.readFileSync(filePath, 'utf-8');
  const logger = options.logger?.child({ file: filePath });
  const result = tryParse(content, { ...options, logger });

  if (result.success) {
    return { path: filePath, error: null };
  }

  const position = result.error.position;
  return {
    path: filePath,
    error: {
      line: position?.line ?? 0,
      column: position?.column ?? 0,
      message: result.error.reason,
    },
  };
}

function reportPretty(results: CheckResult[], options: CheckOptions): void {
  const c =
    options.color === false
      ? {
          red: (s: string) => s,
          green: (s: string) => s,
          gray: (s: string) => s,
        }
      : chalk;

  let totalErrors = 0;

  for (const result of results) {
    if (options.quiet && !result.error) continue;

    console.log();
    console.log(`  ${result.path}`);

    if (!result.error) {
      console.log(`    ${c.green('✓')} No issues`);
      continue;
    }

    const { line, column, message } = result.error;
    console.log(`    ${c.red('✗')} error  Line ${line}, column ${column}: ${message}`);
    totalErrors++;
  }

  console.log();

  if (totalErrors === 0) {
    console.log(c.green(`  ✓ All ${results.length} files passed`));
  } else {
    console.log(
      c.gray(
        `  Found ${totalErrors} error${totalErrors !== 1 ? 's' : ''} in ${results.length} file${results.length !== 1 ? 's' : ''}`,
      ),
    );
  }

  console.log();
}

function reportJson(results: CheckResult[]): void {
  const output = {
    files: results.map((r) => ({
      path: r.path,
      errors: r.error ? [{ ...r.error, severity: 'error', code: 'SYNTAX_ERROR' }] : [],
    })),
    summary: {
      files: results.length,
      errors: results.filter((r) => r.error !== null).length,
    },
  };

  console.log(JSON.stringify(output, null, 2));
}
