/**
 * Token types for the ehlang scanner
 *
 * Keyword and operator spellings are fixed by the language; `TOKEN_SPELLINGS`
 * is the single table the scanner, the parser's diagnostics and the unparser
 * agree on.
 */

export const TokenType = {
  // Payload-bearing
  ID: 'ID', // foo, counter, Point
  INTLITERAL: 'INTLITERAL', // 42
  STRINGLITERAL: 'STRINGLITERAL', // "hello"

  // Literal keywords
  TRUE: 'TRUE', // true
  FALSE: 'FALSE', // false
  EH: 'EH', // eh?

  // Type keywords
  INT: 'INT', // int
  BOOL: 'BOOL', // bool
  VOID: 'VOID', // void
  IMMUTABLE: 'IMMUTABLE', // immutable
  REF: 'REF', // ref
  CUSTOM: 'CUSTOM', // custom

  // Statement keywords
  IF: 'IF', // if
  ELSE: 'ELSE', // else
  WHILE: 'WHILE', // while
  RETURN: 'RETURN', // return
  MAYBE: 'MAYBE', // maybe
  MEANS: 'MEANS', // means
  OTHERWISE: 'OTHERWISE', // otherwise
  FROMCONSOLE: 'FROMCONSOLE', // fromconsole
  TOCONSOLE: 'TOCONSOLE', // toconsole

  // Arithmetic operators
  CROSS: 'CROSS', // +
  DASH: 'DASH', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /

  // Comparison operators
  EQUALS: 'EQUALS', // ==
  NOTEQUALS: 'NOTEQUALS', // !=
  LESS: 'LESS', // <
  LESSEQ: 'LESSEQ', // <=
  GREATER: 'GREATER', // >
  GREATEREQ: 'GREATEREQ', // >=

  // Logical operators
  AND: 'AND', // and
  OR: 'OR', // or
  NOT: 'NOT', // not, !

  // Statement operators
  ASSIGN: 'ASSIGN', // =
  POSTINC: 'POSTINC', // ++
  POSTDEC: 'POSTDEC', // --
  ARROW: 'ARROW', // ->

  // Punctuation
  COLON: 'COLON', // :
  COMMA: 'COMMA', // ,
  LCURLY: 'LCURLY', // {
  RCURLY: 'RCURLY', // }
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  SEMICOL: 'SEMICOL', // ;

  // Unscannable input, carrying the lexical error
  ERROR: 'ERROR',

  // End of input
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

/** Token types whose tokens carry nothing but a position */
export type PlainTokenType = Exclude<
  TokenType,
  | typeof TokenType.ID
  | typeof TokenType.INTLITERAL
  | typeof TokenType.STRINGLITERAL
  | typeof TokenType.ERROR
>;

/**
 * Canonical source spelling of every plain token
 */
export const TOKEN_SPELLINGS: Record<PlainTokenType, string> = {
  TRUE: 'true',
  FALSE: 'false',
  EH: 'eh?',
  INT: 'int',
  BOOL: 'bool',
  VOID: 'void',
  IMMUTABLE: 'immutable',
  REF: 'ref',
  CUSTOM: 'custom',
  IF: 'if',
  ELSE: 'else',
  WHILE: 'while',
  RETURN: 'return',
  MAYBE: 'maybe',
  MEANS: 'means',
  OTHERWISE: 'otherwise',
  FROMCONSOLE: 'fromconsole',
  TOCONSOLE: 'toconsole',
  CROSS: '+',
  DASH: '-',
  STAR: '*',
  SLASH: '/',
  EQUALS: '==',
  NOTEQUALS: '!=',
  LESS: '<',
  LESSEQ: '<=',
  GREATER: '>',
  GREATEREQ: '>=',
  AND: 'and',
  OR: 'or',
  NOT: '!',
  ASSIGN: '=',
  POSTINC: '++',
  POSTDEC: '--',
  ARROW: '->',
  COLON: ':',
  COMMA: ',',
  LCURLY: '{',
  RCURLY: '}',
  LPAREN: '(',
  RPAREN: ')',
  SEMICOL: ';',
  EOF: 'end of input',
};

/**
 * Reserved words, mapped to the token they scan as
 */
export const KEYWORDS: ReadonlyMap<string, PlainTokenType> = new Map<string, PlainTokenType>([
  ['int', TokenType.INT],
  ['bool', TokenType.BOOL],
  ['void', TokenType.VOID],
  ['immutable', TokenType.IMMUTABLE],
  ['ref', TokenType.REF],
  ['custom', TokenType.CUSTOM],
  ['if', TokenType.IF],
  ['else', TokenType.ELSE],
  ['while', TokenType.WHILE],
  ['return', TokenType.RETURN],
  ['maybe', TokenType.MAYBE],
  ['means', TokenType.MEANS],
  ['otherwise', TokenType.OTHERWISE],
  ['fromconsole', TokenType.FROMCONSOLE],
  ['toconsole', TokenType.TOCONSOLE],
  ['true', TokenType.TRUE],
  ['false', TokenType.FALSE],
  ['and', TokenType.AND],
  ['or', TokenType.OR],
  ['not', TokenType.NOT],
]);
