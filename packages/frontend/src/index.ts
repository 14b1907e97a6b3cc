/**
 * @ehlang/frontend
 *
 * Scanner, parser and unparser for ehlang, a small imperative teaching
 * language. `parse` turns source text into a typed AST; `unparse` turns any
 * AST back into canonical source that parses to the same tree.
 */

import type { Logger } from '@ehlang/logger';
import { EhError, EhRangeError, EhSyntaxError } from './errors';
import type { Program } from './parser/ast';
import { Parser } from './parser/parser';
import { ParserError } from './parser/parser-error';
import { countNodes } from './parser/visit';

// Re-export error types
export { EhError, EhRangeError, EhSyntaxError };

// Re-export the building blocks
export * from './lexer/index';
export * from './parser/index';
export * from './unparser/index';

/**
 * Default limits for parsing
 */
export const DEFAULT_LIMITS = {
  /** Maximum source length in characters */
  maxSourceLength: 1_000_000,
} as const;

/**
 * Options for parsing
 */
export interface ParseOptions {
  /** Receives parse_started, parse_succeeded and parse_failed events */
  logger?: Logger;
  /** Override default limits (set to Infinity to disable) */
  limits?: Partial<{ [K in keyof typeof DEFAULT_LIMITS]: number }>;
}

/**
 * Outcome of `tryParse`: a program on success, the error otherwise
 */
export type ParseResult =
  | { success: true; program: Program }
  | { success: false; error: EhError };

/**
 * Parse ehlang source into a program
 *
 * @throws {EhSyntaxError} If the source cannot be scanned or parsed
 * @throws {EhRangeError} If the source exceeds `limits.maxSourceLength`
 *
 * @example
 * ```ts
 * const program = parse('x : int = 5;');
 * program.globals[0].type // => 'VarDecl'
 * ```
 */
export function parse(source: string, options: ParseOptions = {}): Program {
  const limits = { ...DEFAULT_LIMITS, ...options.limits };
  const logger = options.logger;

  if (source.length > limits.maxSourceLength) {
    throw new EhRangeError(
      `Source exceeds maximum length of ${limits.maxSourceLength} characters`,
      source,
    );
  }

  logger?.debug('parse_started', { length: source.length });

  const parser = new Parser();
  let program: Program;

  try {
    program = parser.parse(source);
  } catch (error) {
    if (error instanceof ParserError) {
      logger?.info('parse_failed', { reason: error.reason, position: error.position });
      throw new EhSyntaxError(error.reason, source, error.position);
    }
    throw error;
  }

  logger?.debug('parse_succeeded', {
    globals: program.globals.length,
    nodes: countNodes(program),
  });

  return program;
}

/**
 * Parse without throwing on bad input
 *
 * @example
 * ```ts
 * const result = tryParse('a : int = 1 < 2 < 3;');
 * if (!result.success) console.error(result.error.message);
 * ```
 */
export function tryParse(source: string, options: ParseOptions = {}): ParseResult {
  try {
    return { success: true, program: parse(source, options) };
  } catch (error) {
    if (error instanceof EhError) {
      return { success: false, error };
    }
    throw error;
  }
}
