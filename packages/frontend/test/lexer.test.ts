import { describe, expect, it } from 'vitest';
import {
  describeToken,
  EMPTY_POSITION,
  LexerError,
  mergePositions,
  scan,
  Scanner,
  span,
  TokenType,
  type Token,
} from '../src/lexer';

function types(source: string): string[] {
  return scan(source).map((token) => token.type);
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('Scanner', () => {
  describe('declarations', () => {
    it('tokenizes a variable declaration', () => {
      expect(types('x : int = 42;')).toEqual([
        TokenType.ID,
        TokenType.COLON,
        TokenType.INT,
        TokenType.ASSIGN,
        TokenType.INTLITERAL,
        TokenType.SEMICOL,
        TokenType.EOF,
      ]);
    });

    it('records 1-based spans with an exclusive end column', () => {
      const tokens = scan('x : int = 42;');
      expect(tokens.map((token) => span(token.pos))).toEqual([
        '[1,1]-[1,2]',
        '[1,3]-[1,4]',
        '[1,5]-[1,8]',
        '[1,9]-[1,10]',
        '[1,11]-[1,13]',
        '[1,13]-[1,14]',
        '[1,14]-[1,14]',
      ]);
    });

    it('tracks lines and resets the column after a newline', () => {
      const tokens = scan('a\n  bb');
      expect(tokens.map((token) => span(token.pos))).toEqual([
        '[1,1]-[1,2]',
        '[2,3]-[2,5]',
        '[2,5]-[2,5]',
      ]);
    });
  });

  describe('identifiers and keywords', () => {
    it('carries the identifier name', () => {
      const [token] = scan('counter_2');
      expect(token).toMatchObject({ type: TokenType.ID, name: 'counter_2' });
    });

    it('recognizes type and statement keywords', () => {
      expect(types('int bool void immutable ref custom')).toEqual([
        TokenType.INT,
        TokenType.BOOL,
        TokenType.VOID,
        TokenType.IMMUTABLE,
        TokenType.REF,
        TokenType.CUSTOM,
        TokenType.EOF,
      ]);
      expect(types('if else while return maybe means otherwise fromconsole toconsole')).toEqual([
        TokenType.IF,
        TokenType.ELSE,
        TokenType.WHILE,
        TokenType.RETURN,
        TokenType.MAYBE,
        TokenType.MEANS,
        TokenType.OTHERWISE,
        TokenType.FROMCONSOLE,
        TokenType.TOCONSOLE,
        TokenType.EOF,
      ]);
    });

    it('recognizes word operators', () => {
      expect(types('and or not')).toEqual([TokenType.AND, TokenType.OR, TokenType.NOT, TokenType.EOF]);
    });

    it('is case sensitive', () => {
      expect(types('Int TRUE')).toEqual([TokenType.ID, TokenType.ID, TokenType.EOF]);
    });

    it('scans eh? as the placeholder literal', () => {
      const [token] = scan('eh?');
      expect(token.type).toBe(TokenType.EH);
      expect(span(token.pos)).toBe('[1,1]-[1,4]');
    });

    it('scans bare eh as an identifier', () => {
      expect(scan('eh')[0]).toMatchObject({ type: TokenType.ID, name: 'eh' });
    });

    it('does not join eh and a separated question mark', () => {
      expect(() => scan('eh ?')).toThrow("Unexpected character '?' at line 1, column 4");
    });
  });

  describe('operators', () => {
    it('prefers the longest operator', () => {
      expect(types('++ -- -> - + == = != ! <= < >= >')).toEqual([
        TokenType.POSTINC,
        TokenType.POSTDEC,
        TokenType.ARROW,
        TokenType.DASH,
        TokenType.CROSS,
        TokenType.EQUALS,
        TokenType.ASSIGN,
        TokenType.NOTEQUALS,
        TokenType.NOT,
        TokenType.LESSEQ,
        TokenType.LESS,
        TokenType.GREATEREQ,
        TokenType.GREATER,
        TokenType.EOF,
      ]);
    });

    it('scans member access without spaces', () => {
      expect(types('p->x')).toEqual([TokenType.ID, TokenType.ARROW, TokenType.ID, TokenType.EOF]);
    });

    it('rejects C-style logical operators', () => {
      expect(() => scan('x : int = 1 & 2;')).toThrow(
        "Invalid operator '&'. Use 'and' for logical AND at line 1, column 13",
      );
      expect(() => scan('a | b')).toThrow("Invalid operator '|'. Use 'or' for logical OR at line 1, column 3");
    });

    it('rejects unknown characters', () => {
      expect(() => scan('x @')).toThrow("Unexpected character '@' at line 1, column 3");
    });
  });

  describe('literals', () => {
    it('scans integer literals', () => {
      expect(scan('2147483647')[0]).toMatchObject({ type: TokenType.INTLITERAL, value: 2147483647 });
    });

    it('rejects integers beyond 32 bits', () => {
      expect(() => scan('x = 2147483648;')).toThrow(
        'Integer literal 2147483648 is too large at line 1, column 5',
      );
    });

    it('decodes escapes in string literals', () => {
      const [token] = scan('"a\\n\\t\\"\\\\b"');
      expect(token).toMatchObject({ type: TokenType.STRINGLITERAL, value: 'a\n\t"\\b' });
    });

    it('spans a string literal including its quotes', () => {
      expect(span(scan('"ab"')[0].pos)).toBe('[1,1]-[1,5]');
    });

    it('reports an unterminated string at its opening quote', () => {
      expect(() => scan('x "abc')).toThrow('Unterminated string literal at line 1, column 3');
      expect(() => scan('x "ab\ncd"')).toThrow('Unterminated string literal at line 1, column 3');
    });

    it('reports an invalid escape at the backslash', () => {
      expect(() => scan('"a\\qb"')).toThrow(
        "Invalid escape sequence '\\q' in string literal at line 1, column 3",
      );
    });
  });

  describe('whitespace and comments', () => {
    it('skips line comments', () => {
      const tokens = scan('a // hello\nb');
      expect(tokens.map((token) => token.type)).toEqual([TokenType.ID, TokenType.ID, TokenType.EOF]);
      expect(span(tokens[1].pos)).toBe('[2,1]-[2,2]');
    });

    it('keeps a lone slash as division', () => {
      expect(types('a / b')).toEqual([TokenType.ID, TokenType.SLASH, TokenType.ID, TokenType.EOF]);
    });

    it('ends empty input with a single EOF token', () => {
      const tokens = scan('');
      expect(tokens).toHaveLength(1);
      expect(tokens[0].type).toBe(TokenType.EOF);
      expect(span(tokens[0].pos)).toBe('[1,1]-[1,1]');
    });

    it('places EOF after trailing whitespace', () => {
      const tokens = scan('x\n\t');
      expect(span(tokens[1].pos)).toBe('[2,2]-[2,2]');
    });
  });

  describe('errors', () => {
    it('exposes the reason and the point separately', () => {
      const error = captureError(() => scan('ok\n  #'));
      expect(error).toBeInstanceOf(LexerError);
      expect(error).toMatchObject({
        reason: "Unexpected character '#'",
        position: { line: 2, column: 3 },
        source: 'ok\n  #',
      });
    });
  });

  describe('pulling tokens', () => {
    it('scans no further than the token asked for', () => {
      const scanner = new Scanner('x "abc');
      expect(scanner.next()).toMatchObject({ type: TokenType.ID, name: 'x' });
    });

    it('returns unscannable input as an error token', () => {
      const scanner = new Scanner('a @ b');
      scanner.next();
      const token = scanner.next();
      expect(token).toMatchObject({ type: TokenType.ERROR, message: "Unexpected character '@'" });
      expect(span(token.pos)).toBe('[1,3]-[1,4]');
    });

    it('keeps returning the error token', () => {
      const scanner = new Scanner('"open');
      const first = scanner.next();
      expect(first).toMatchObject({ type: TokenType.ERROR, message: 'Unterminated string literal' });
      expect(scanner.next()).toBe(first);
    });

    it('keeps returning EOF at the end', () => {
      const scanner = new Scanner('a');
      scanner.next();
      expect(scanner.next().type).toBe(TokenType.EOF);
      expect(scanner.next().type).toBe(TokenType.EOF);
    });

    it('starts over on reset', () => {
      const scanner = new Scanner('@');
      scanner.next();
      scanner.reset('b');
      expect(scanner.next()).toMatchObject({ type: TokenType.ID, name: 'b' });
    });
  });

  it('resets state between calls', () => {
    const scanner = new Scanner();
    scanner.tokenize('a\nb\nc');
    const tokens = scanner.tokenize('z');
    expect(span(tokens[0].pos)).toBe('[1,1]-[1,2]');
  });
});

describe('position helpers', () => {
  it('merges the start of one span with the end of another', () => {
    const [first, , last] = scan('a : b');
    expect(span(mergePositions(first.pos, last.pos))).toBe('[1,1]-[1,6]');
  });

  it('renders the empty position', () => {
    expect(span(EMPTY_POSITION)).toBe('[0,0]-[0,0]');
  });
});

describe('describeToken', () => {
  const at = EMPTY_POSITION;

  it.each<[Token, string]>([
    [{ type: TokenType.ID, name: 'x', pos: at }, "identifier 'x'"],
    [{ type: TokenType.INTLITERAL, value: 5, pos: at }, 'integer literal 5'],
    [{ type: TokenType.STRINGLITERAL, value: 'a"b', pos: at }, 'string literal "a\\"b"'],
    [{ type: TokenType.EOF, pos: at }, 'end of input'],
    [{ type: TokenType.ERROR, message: "Unexpected character '@'", pos: at }, "invalid input (Unexpected character '@')"],
    [{ type: TokenType.NOT, pos: at }, "'!'"],
    [{ type: TokenType.ARROW, pos: at }, "'->'"],
    [{ type: TokenType.WHILE, pos: at }, "'while'"],
  ])('describes %o', (token, expected) => {
    expect(describeToken(token)).toBe(expected);
  });
});
