import { LexerError } from './lexer-error';
import {
  startOf,
  type ErrorToken,
  type Position,
  type SourcePoint,
  type Token,
  type TokenSource,
} from './token';
import { KEYWORDS, TokenType, type PlainTokenType } from './token-types';

/** Largest value an integer literal may hold */
const MAX_INT_LITERAL = 2147483647;

/**
 * Scanner for ehlang source text
 *
 * Tokens are produced on demand by `next`, so the parser never sees input
 * beyond its lookahead. Unscannable input becomes an `ERROR` token; after
 * an `ERROR` or `EOF` token the scanner keeps returning that same token.
 */
export class Scanner implements TokenSource {
  private input: string = '';
  private position: number = 0;
  private line: number = 1;
  private column: number = 1;
  private final: Token | null = null;

  constructor(input: string = '') {
    this.reset(input);
  }

  /**
   * Start scanning a new source string
   */
  reset(input: string): void {
    this.input = input;
    this.position = 0;
    this.line = 1;
    this.column = 1;
    this.final = null;
  }

  /**
   * Scan the next token
   */
  next(): Token {
    if (this.final) return this.final;

    this.skipWhitespaceAndComments();

    if (this.isAtEnd()) {
      const end = this.currentPoint();
      this.final = { type: TokenType.EOF, pos: this.makePosition(end, end) };
      return this.final;
    }

    const token = this.nextToken();
    if (token.type === TokenType.ERROR) {
      this.final = token;
    }
    return token;
  }

  /**
   * Tokenize a whole source string, up to and including EOF
   *
   * @throws {LexerError} At the first unscannable input
   */
  tokenize(input: string): Token[] {
    this.reset(input);

    const tokens: Token[] = [];
    let token = this.next();

    while (token.type !== TokenType.EOF) {
      if (token.type === TokenType.ERROR) {
        throw new LexerError(token.message, this.input, startOf(token.pos));
      }
      tokens.push(token);
      token = this.next();
    }

    tokens.push(token);
    return tokens;
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.position];
  }

  private peekNext(): string {
    if (this.position + 1 >= this.input.length) return '\0';
    return this.input[this.position + 1];
  }

  private advance(): string {
    const char = this.input[this.position];
    this.position++;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private currentPoint(): SourcePoint {
    return { line: this.line, column: this.column };
  }

  private makePosition(start: SourcePoint, end: SourcePoint): Position {
    return {
      startLine: start.line,
      startCol: start.column,
      endLine: end.line,
      endCol: end.column,
    };
  }

  private plain(type: PlainTokenType, start: SourcePoint): Token {
    return { type, pos: this.makePosition(start, this.currentPoint()) };
  }

  private error(message: string, at: SourcePoint): ErrorToken {
    return {
      type: TokenType.ERROR,
      message,
      pos: this.makePosition(at, this.currentPoint()),
    };
  }

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
        this.advance();
      } else if (char === '/' && this.peekNext() === '/') {
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private nextToken(): Token {
    const start = this.currentPoint();
    const char = this.peek();

    if (char === '"') {
      return this.string(start);
    }

    if (this.isDigit(char)) {
      return this.number(start);
    }

    if (this.isAlpha(char)) {
      return this.identifier(start);
    }

    return this.operator(start);
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char);
  }

  private string(start: SourcePoint): Token {
    this.advance(); // consume opening quote
    let value = '';

    while (!this.isAtEnd() && this.peek() !== '"') {
      if (this.peek() === '\\') {
        const escapeStart = this.currentPoint();
        this.advance(); // consume backslash
        if (this.isAtEnd()) {
          return this.error('Unterminated string literal', start);
        }
        const escaped = this.advance();
        switch (escaped) {
          case 'n':
            value += '\n';
            break;
          case 't':
            value += '\t';
            break;
          case '"':
            value += '"';
            break;
          case '\\':
            value += '\\';
            break;
          default:
            return this.error(`Invalid escape sequence '\\${escaped}' in string literal`, escapeStart);
        }
      } else if (this.peek() === '\n') {
        return this.error('Unterminated string literal', start);
      } else {
        value += this.advance();
      }
    }

    if (this.isAtEnd()) {
      return this.error('Unterminated string literal', start);
    }

    this.advance(); // consume closing quote
    return {
      type: TokenType.STRINGLITERAL,
      value,
      pos: this.makePosition(start, this.currentPoint()),
    };
  }

  private number(start: SourcePoint): Token {
    let digits = '';

    while (!this.isAtEnd() && this.isDigit(this.peek())) {
      digits += this.advance();
    }

    const value = Number(digits);
    if (value > MAX_INT_LITERAL) {
      return this.error(`Integer literal ${digits} is too large`, start);
    }

    return {
      type: TokenType.INTLITERAL,
      value,
      pos: this.makePosition(start, this.currentPoint()),
    };
  }

  private identifier(start: SourcePoint): Token {
    let name = '';

    while (!this.isAtEnd() && this.isAlphaNumeric(this.peek())) {
      name += this.advance();
    }

    // `eh?` is the only keyword with punctuation in it
    if (name === 'eh' && this.peek() === '?') {
      this.advance();
      return this.plain(TokenType.EH, start);
    }

    const keyword = KEYWORDS.get(name);
    if (keyword) {
      return this.plain(keyword, start);
    }

    return {
      type: TokenType.ID,
      name,
      pos: this.makePosition(start, this.currentPoint()),
    };
  }

  private operator(start: SourcePoint): Token {
    const char = this.advance();

    switch (char) {
      // Single-character tokens
      case '(':
        return this.plain(TokenType.LPAREN, start);
      case ')':
        return this.plain(TokenType.RPAREN, start);
      case '{':
        return this.plain(TokenType.LCURLY, start);
      case '}':
        return this.plain(TokenType.RCURLY, start);
      case ',':
        return this.plain(TokenType.COMMA, start);
      case ':':
        return this.plain(TokenType.COLON, start);
      case ';':
        return this.plain(TokenType.SEMICOL, start);
      case '*':
        return this.plain(TokenType.STAR, start);
      case '/':
        return this.plain(TokenType.SLASH, start);

      case '+':
        if (this.peek() === '+') {
          this.advance();
          return this.plain(TokenType.POSTINC, start);
        }
        return this.plain(TokenType.CROSS, start);

      case '-':
        if (this.peek() === '-') {
          this.advance();
          return this.plain(TokenType.POSTDEC, start);
        }
        if (this.peek() === '>') {
          this.advance();
          return this.plain(TokenType.ARROW, start);
        }
        return this.plain(TokenType.DASH, start);

      // Comparison, equality and assignment
      case '>':
        if (this.peek() === '=') {
          this.advance();
          return this.plain(TokenType.GREATEREQ, start);
        }
        return this.plain(TokenType.GREATER, start);

      case '<':
        if (this.peek() === '=') {
          this.advance();
          return this.plain(TokenType.LESSEQ, start);
        }
        return this.plain(TokenType.LESS, start);

      case '=':
        if (this.peek() === '=') {
          this.advance();
          return this.plain(TokenType.EQUALS, start);
        }
        return this.plain(TokenType.ASSIGN, start);

      case '!':
        if (this.peek() === '=') {
          this.advance();
          return this.plain(TokenType.NOTEQUALS, start);
        }
        return this.plain(TokenType.NOT, start);

      case '&':
        return this.error("Invalid operator '&'. Use 'and' for logical AND", start);

      case '|':
        return this.error("Invalid operator '|'. Use 'or' for logical OR", start);

      default:
        return this.error(`Unexpected character '${char}'`, start);
    }
  }
}

/**
 * Tokenize `source` with a fresh scanner
 */
export function scan(source: string): Token[] {
  return new Scanner().tokenize(source);
}
