/**
 * ehlang unparse command
 *
 * Parses a file and prints its canonical source. Nothing is printed to
 * stdout when the file does not parse.
 */

import { tryParse, unparse } from '@ehlang/frontend';
import { Command } from 'commander';
import * as fs from 'node:fs';
import { loadConfig, type EhlangConfig } from '../config.js';
import { createCliLogger } from '../logging.js';

export interface UnparseCommandOptions {
  output?: string;
}

export const unparseCommand = new Command('unparse')
  .description('Print the canonical form of an ehlang file')
  .argument('<file>', 'Source file to parse')
  .option('-o, --output <file>', 'Write the canonical text to a file instead of stdout')
  .action((file: string, options: UnparseCommandOptions) => {
    process.exit(runUnparse(file, options));
  });

/**
 * Parse `file` and write its canonical text. Returns the exit code: 0 on
 * success, 1 when the file does not parse, 2 on unexpected errors.
 */
export function runUnparse(file: string, options: UnparseCommandOptions, config?: EhlangConfig): number {
  try {
    const resolved = config ?? loadConfig();
    const logger = createCliLogger(resolved, 'unparse').child({ file });
    const content = fs.readFileSync(file, 'utf-8');

    const result = tryParse(content, {
      logger,
      limits: resolved.maxSourceLength ? { maxSourceLength: resolved.maxSourceLength } : undefined,
    });

    if (!result.success) {
      console.error(`${file}: ${result.error.message}`);
      return 1;
    }

    const text = unparse(result.program);

    if (options.output) {
      fs.writeFileSync(options.output, text);
      logger.info('unparse_written', { output: options.output, length: text.length });
    } else {
      process.stdout.write(text);
    }

    return 0;
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    return 2;
  }
}
