import type { SourcePoint } from '../lexer/token';

/**
 * Error thrown during parsing
 */
export class ParserError extends Error {
  /** The source that failed to parse */
  readonly source: string;
  /** The message without the position suffix */
  readonly reason: string;
  /** Position where the error occurred */
  readonly position: SourcePoint | null;

  constructor(message: string, source: string, position: SourcePoint | null) {
    const fullMessage = position
      ? `${message} at line ${position.line}, column ${position.column}`
      : message;
    super(fullMessage);
    this.name = 'ParserError';
    this.reason = message;
    this.source = source;
    this.position = position;
  }
}
