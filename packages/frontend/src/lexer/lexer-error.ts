import type { SourcePoint } from './token';

/**
 * Error thrown during lexical analysis
 */
export class LexerError extends Error {
  /** The source that failed to tokenize */
  readonly source: string;
  /** The message without the position suffix */
  readonly reason: string;
  /** Position where the error occurred */
  readonly position: SourcePoint;

  constructor(message: string, source: string, position: SourcePoint) {
    const fullMessage = `${message} at line ${position.line}, column ${position.column}`;
    super(fullMessage);
    this.name = 'LexerError';
    this.reason = message;
    this.source = source;
    this.position = position;
  }
}
