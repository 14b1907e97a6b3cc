import { TOKEN_SPELLINGS, TokenType, type PlainTokenType } from './token-types';

/**
 * A single point in the source, for error reporting
 */
export interface SourcePoint {
  /** 1-based line number */
  line: number;
  /** 1-based column number */
  column: number;
}

/**
 * Source span. The end column is one past the last character.
 */
export interface Position {
  readonly startLine: number;
  readonly startCol: number;
  readonly endLine: number;
  readonly endCol: number;
}

/** Synthetic span for nodes with no source text, e.g. an empty program */
export const EMPTY_POSITION: Position = Object.freeze({
  startLine: 0,
  startCol: 0,
  endLine: 0,
  endCol: 0,
});

/**
 * Render a span for diagnostics: `[1,1]-[1,12]`
 */
export function span(pos: Position): string {
  return `[${pos.startLine},${pos.startCol}]-[${pos.endLine},${pos.endCol}]`;
}

/**
 * Span from the start of `first` to the end of `last`
 */
export function mergePositions(first: Position, last: Position): Position {
  return {
    startLine: first.startLine,
    startCol: first.startCol,
    endLine: last.endLine,
    endCol: last.endCol,
  };
}

export function startOf(pos: Position): SourcePoint {
  return { line: pos.startLine, column: pos.startCol };
}

interface BaseToken {
  readonly pos: Position;
}

/** Identifier */
export interface IDToken extends BaseToken {
  readonly type: typeof TokenType.ID;
  readonly name: string;
}

/** Integer literal */
export interface IntLitToken extends BaseToken {
  readonly type: typeof TokenType.INTLITERAL;
  readonly value: number;
}

/** String literal, with escapes already decoded */
export interface StrToken extends BaseToken {
  readonly type: typeof TokenType.STRINGLITERAL;
  readonly value: string;
}

/**
 * Input the scanner could not turn into a token. The parser reports
 * `message` as a syntax error when it reaches this token.
 */
export interface ErrorToken extends BaseToken {
  readonly type: typeof TokenType.ERROR;
  readonly message: string;
}

/** Keyword, operator, punctuation or end of input */
export interface PlainToken extends BaseToken {
  readonly type: PlainTokenType;
}

/**
 * A token produced by the scanner
 */
export type Token = IDToken | IntLitToken | StrToken | ErrorToken | PlainToken;

/**
 * Human-readable description of a token for syntax errors
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.ID:
      return `identifier '${token.name}'`;
    case TokenType.INTLITERAL:
      return `integer literal ${token.value}`;
    case TokenType.STRINGLITERAL:
      return `string literal ${JSON.stringify(token.value)}`;
    case TokenType.ERROR:
      return `invalid input (${token.message})`;
    case TokenType.EOF:
      return TOKEN_SPELLINGS.EOF;
    default:
      return `'${TOKEN_SPELLINGS[token.type]}'`;
  }
}

/**
 * Pull-based token stream. Each call yields the next token; once `EOF` has
 * been returned every further call returns it again.
 */
export interface TokenSource {
  next(): Token;
}
