/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root, and validates it.
 */

import { LOG_LEVELS } from '@ehlang/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

const ConfigSchema = z.object({
  environment: z.enum(['test', 'development', 'production']).default('production'),
  logLevel: z.enum(LOG_LEVELS).optional(),
  maxSourceLength: z.coerce.number().int().positive().optional(),
});

export type EhlangConfig = z.infer<typeof ConfigSchema>;

/** Environment variable behind each configuration field */
const ENV_KEYS: Record<keyof EhlangConfig, string> = {
  environment: 'EHLANG_ENV',
  logLevel: 'EHLANG_LOG_LEVEL',
  maxSourceLength: 'EHLANG_MAX_SOURCE_LENGTH',
};

/**
 * Thrown when a configuration value does not validate
 */
export class ConfigError extends Error {
  /** Environment variable holding the bad value */
  readonly key: string;

  constructor(message: string, key: string) {
    super(message);
    this.name = 'ConfigError';
    this.key = key;
  }
}

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath)) {
      return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Load ehlang configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * @throws {ConfigError} If a value is present but invalid
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): EhlangConfig {
  const envFile = findEnvFile(cwd) ?? {};
  const raw: Record<string, string> = {};

  for (const [field, key] of Object.entries(ENV_KEYS)) {
    // Process environment overrides the .env file
    const value = env[key] ?? envFile[key];
    if (value !== undefined && value !== '') {
      raw[field] = value;
    }
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = String(issue.path[0]);
    const key = Object.entries(ENV_KEYS).find(([name]) => name === field)?.[1] ?? field;
    throw new ConfigError(`Invalid ${key}: ${issue.message}`, key);
  }

  return parsed.data;
}
