/**
 * Error types for the ehlang front end
 *
 * All errors include the source text and optional position information.
 */

import type { SourcePoint } from './lexer/token';

/**
 * Base class for front-end errors
 */
export abstract class EhError extends Error {
  /** The source that caused the error */
  readonly source: string;
  /** Position where the error occurred (if available) */
  readonly position: SourcePoint | null;
  /** The message without the position suffix */
  readonly reason: string;

  constructor(message: string, source: string, position: SourcePoint | null = null) {
    const fullMessage = position
      ? `${message} at line ${position.line}, column ${position.column}`
      : message;
    super(fullMessage);
    this.name = this.constructor.name;
    this.source = source;
    this.position = position;
    this.reason = message;
  }
}

/**
 * Thrown when source text cannot be scanned or parsed
 */
export class EhSyntaxError extends EhError {
  constructor(message: string, source: string, position: SourcePoint | null = null) {
    super(message, source, position);
  }
}

/**
 * Thrown when limits are exceeded (source length)
 */
export class EhRangeError extends EhError {
  constructor(message: string, source: string, position: SourcePoint | null = null) {
    super(message, source, position);
  }
}
