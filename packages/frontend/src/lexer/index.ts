export { Scanner, scan } from './lexer';
export { LexerError } from './lexer-error';
export { KEYWORDS, TOKEN_SPELLINGS, TokenType, type PlainTokenType } from './token-types';
export {
  EMPTY_POSITION,
  describeToken,
  mergePositions,
  span,
  startOf,
  type IDToken,
  type IntLitToken,
  type ErrorToken,
  type PlainToken,
  type Position,
  type SourcePoint,
  type StrToken,
  type Token,
  type TokenSource,
} from './token';
