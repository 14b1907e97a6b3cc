import { createLogger, type Logger } from '@ehlang/logger';
import type { EhlangConfig } from './config.js';

/**
 * Logger for CLI commands. Entries go to stderr so stdout carries only
 * command output.
 */
export function createCliLogger(config: EhlangConfig, command: string): Logger {
  return createLogger({
    environment: config.environment,
    minLevel: config.logLevel,
    sink: (line) => process.stderr.write(`${line}\n`),
  }).child({ command });
}
