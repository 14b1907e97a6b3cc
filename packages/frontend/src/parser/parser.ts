import { Scanner } from '../lexer/lexer';
import {
  EMPTY_POSITION,
  describeToken,
  mergePositions,
  startOf,
  type Position,
  type Token,
  type TokenSource,
} from '../lexer/token';
import { TOKEN_SPELLINGS, TokenType, type PlainTokenType } from '../lexer/token-types';
import type {
  BinaryExp,
  BinaryOperator,
  CallExp,
  ClassDefn,
  ClassMember,
  Decl,
  Exp,
  FnDecl,
  FormalDecl,
  IDNode,
  IfElseStmt,
  IfStmt,
  Loc,
  Program,
  Stmt,
  TypeNode,
  VarDecl,
  WhileStmt,
} from './ast';
import { ParserError } from './parser-error';

const LOGICAL_OR_OPERATORS: ReadonlyMap<TokenType, BinaryOperator> = new Map<TokenType, BinaryOperator>([
  [TokenType.OR, 'Or'],
]);

const LOGICAL_AND_OPERATORS: ReadonlyMap<TokenType, BinaryOperator> = new Map<TokenType, BinaryOperator>([
  [TokenType.AND, 'And'],
]);

const RELATIONAL_OPERATORS: ReadonlyMap<TokenType, BinaryOperator> = new Map<TokenType, BinaryOperator>([
  [TokenType.LESS, 'Less'],
  [TokenType.GREATER, 'Greater'],
  [TokenType.LESSEQ, 'LessEq'],
  [TokenType.GREATEREQ, 'GreaterEq'],
  [TokenType.EQUALS, 'Equals'],
  [TokenType.NOTEQUALS, 'NotEquals'],
]);

const ADDITIVE_OPERATORS: ReadonlyMap<TokenType, BinaryOperator> = new Map<TokenType, BinaryOperator>([
  [TokenType.CROSS, 'Plus'],
  [TokenType.DASH, 'Minus'],
]);

const MULTIPLICATIVE_OPERATORS: ReadonlyMap<TokenType, BinaryOperator> = new Map<
  TokenType,
  BinaryOperator
>([
  [TokenType.STAR, 'Times'],
  [TokenType.SLASH, 'Divide'],
]);

/** Placeholder token before a parse starts */
const END_TOKEN: Token = { type: TokenType.EOF, pos: EMPTY_POSITION };

const END_OF_INPUT: TokenSource = { next: () => END_TOKEN };

/**
 * Recursive descent parser for ehlang programs
 *
 * Operator precedence (lowest to highest):
 * 1. Assignment (=), statement level only
 * 2. Logical OR (or)
 * 3. Logical AND (and)
 * 4. Relational and equality (<, >, <=, >=, ==, !=), non-associative
 * 5. Additive (+, -)
 * 6. Multiplicative (*, /)
 * 7. Unary (!, not, -)
 * 8. Primary (literals, locations, calls, grouping)
 *
 * Every binary level is left-associative except relational, where a second
 * operator at the same level is a syntax error.
 */
export class Parser {
  private tokens: TokenSource = END_OF_INPUT;
  private lookahead: Token = END_TOKEN;
  private last: Token = END_TOKEN;
  private source: string = '';

  /**
   * Parse a source string into a program, scanning it as the parse advances
   */
  parse(source: string): Program {
    return this.run(new Scanner(source), source);
  }

  /**
   * Parse an already scanned token stream. `source` is only used for
   * diagnostics.
   */
  parseTokens(tokens: readonly Token[], source: string = ''): Program {
    if (tokens.length === 0 || tokens[tokens.length - 1].type !== TokenType.EOF) {
      throw new ParserError('Token stream must end with an end-of-input token', source, null);
    }

    let index = 0;
    return this.run({ next: () => tokens[Math.min(index++, tokens.length - 1)] }, source);
  }

  private run(tokens: TokenSource, source: string): Program {
    this.tokens = tokens;
    this.source = source;
    this.lookahead = tokens.next();
    this.last = this.lookahead;

    return this.program();
  }

  // Token navigation. One token of lookahead; nothing past it is scanned.

  private peek(): Token {
    const token = this.lookahead;
    if (token.type === TokenType.ERROR) {
      throw new ParserError(token.message, this.source, startOf(token.pos));
    }
    return token;
  }

  private previous(): Token {
    return this.last;
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.last = this.lookahead;
      this.lookahead = this.tokens.next();
    }
    return this.last;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private matchOperator(table: ReadonlyMap<TokenType, BinaryOperator>): BinaryOperator | null {
    const op = table.get(this.peek().type);
    if (op === undefined) return null;
    this.advance();
    return op;
  }

  private consume(type: PlainTokenType, context: string): Token {
    if (this.check(type)) return this.advance();
    throw this.expected(`'${TOKEN_SPELLINGS[type]}'`, context);
  }

  private error(message: string): ParserError {
    return new ParserError(message, this.source, startOf(this.peek().pos));
  }

  private expected(what: string, context: string): ParserError {
    return this.error(`Expected ${what} ${context}, found ${describeToken(this.peek())}`);
  }

  private makePos(start: { pos: Position }, end: { pos: Position }): Position {
    return mergePositions(start.pos, end.pos);
  }

  // Declarations

  private program(): Program {
    const globals: Decl[] = [];

    while (!this.isAtEnd()) {
      globals.push(this.decl());
    }

    return {
      type: 'Program',
      globals,
      pos:
        globals.length > 0
          ? this.makePos(globals[0], globals[globals.length - 1])
          : EMPTY_POSITION,
    };
  }

  private decl(): Decl {
    const id = this.name('at start of declaration');
    this.consume(TokenType.COLON, `after '${id.name}' in declaration`);

    if (this.check(TokenType.CUSTOM)) {
      return this.classDefn(id);
    }

    if (this.check(TokenType.LPAREN)) {
      return this.fnDecl(id);
    }

    const decl = this.varDecl(id);
    this.consume(TokenType.SEMICOL, 'after variable declaration');
    return decl;
  }

  /** Rest of `name : type [= exp]`, with the colon already consumed */
  private varDecl(id: IDNode): VarDecl {
    const typeNode = this.typeNode();
    let init: Exp | null = null;

    if (this.match(TokenType.ASSIGN)) {
      init = this.exp();
    }

    return {
      type: 'VarDecl',
      id,
      typeNode,
      init,
      pos: this.makePos(id, init ?? typeNode),
    };
  }

  private classDefn(id: IDNode): ClassDefn {
    this.consume(TokenType.CUSTOM, `after '${id.name} :'`);
    this.consume(TokenType.LCURLY, "after 'custom'");

    const members: ClassMember[] = [];

    while (!this.check(TokenType.RCURLY) && !this.isAtEnd()) {
      const memberId = this.name('in class body');
      this.consume(TokenType.COLON, `after member '${memberId.name}'`);

      if (this.check(TokenType.LPAREN)) {
        members.push(this.fnDecl(memberId));
      } else {
        members.push(this.varDecl(memberId));
        this.consume(TokenType.SEMICOL, 'after member declaration');
      }
    }

    this.consume(TokenType.RCURLY, 'to close class body');
    const endToken = this.consume(TokenType.SEMICOL, 'after class definition');

    return {
      type: 'ClassDefn',
      id,
      members,
      pos: this.makePos(id, endToken),
    };
  }

  private fnDecl(id: IDNode): FnDecl {
    this.consume(TokenType.LPAREN, `after '${id.name} :'`);

    const formals: FormalDecl[] = [];

    if (!this.check(TokenType.RPAREN)) {
      do {
        formals.push(this.formalDecl());
      } while (this.match(TokenType.COMMA));
    }

    this.consume(TokenType.RPAREN, 'after formal parameters');
    this.consume(TokenType.ARROW, 'before return type');
    const retType = this.typeNode();
    this.consume(TokenType.LCURLY, 'to open function body');
    const body = this.stmtList();
    const endToken = this.consume(TokenType.RCURLY, 'to close function body');

    return {
      type: 'FnDecl',
      id,
      formals,
      retType,
      body,
      pos: this.makePos(id, endToken),
    };
  }

  private formalDecl(): FormalDecl {
    const id = this.name('in formal parameter list');
    this.consume(TokenType.COLON, `after parameter '${id.name}'`);
    const typeNode = this.typeNode();

    return {
      type: 'FormalDecl',
      id,
      typeNode,
      pos: this.makePos(id, typeNode),
    };
  }

  // Types

  private typeNode(): TypeNode {
    const startToken = this.peek();

    switch (startToken.type) {
      case TokenType.IMMUTABLE: {
        this.advance();
        const sub = this.typeNode();
        return { type: 'ImmutableType', sub, pos: this.makePos(startToken, sub) };
      }
      case TokenType.REF: {
        this.advance();
        const sub = this.typeNode();
        return { type: 'RefType', sub, pos: this.makePos(startToken, sub) };
      }
      case TokenType.INT:
        this.advance();
        return { type: 'IntType', pos: startToken.pos };
      case TokenType.BOOL:
        this.advance();
        return { type: 'BoolType', pos: startToken.pos };
      case TokenType.VOID:
        this.advance();
        return { type: 'VoidType', pos: startToken.pos };
      case TokenType.ID: {
        const id = this.name('as class type');
        return { type: 'ClassType', id, pos: id.pos };
      }
      default:
        throw this.expected('a type', "after ':'");
    }
  }

  // Statements

  private stmtList(): Stmt[] {
    const stmts: Stmt[] = [];

    while (!this.check(TokenType.RCURLY) && !this.isAtEnd()) {
      if (this.check(TokenType.WHILE)) {
        stmts.push(this.whileStmt());
      } else if (this.check(TokenType.IF)) {
        stmts.push(this.ifStmt());
      } else {
        stmts.push(this.stmt());
        this.consume(TokenType.SEMICOL, 'after statement');
      }
    }

    return stmts;
  }

  private whileStmt(): WhileStmt {
    const startToken = this.advance();
    this.consume(TokenType.LPAREN, "after 'while'");
    const cond = this.exp();
    this.consume(TokenType.RPAREN, 'after loop condition');
    this.consume(TokenType.LCURLY, 'to open loop body');
    const body = this.stmtList();
    const endToken = this.consume(TokenType.RCURLY, 'to close loop body');

    return {
      type: 'While',
      cond,
      body,
      pos: this.makePos(startToken, endToken),
    };
  }

  private ifStmt(): IfStmt | IfElseStmt {
    const startToken = this.advance();
    this.consume(TokenType.LPAREN, "after 'if'");
    const cond = this.exp();
    this.consume(TokenType.RPAREN, 'after if condition');
    this.consume(TokenType.LCURLY, 'to open if body');
    const body = this.stmtList();
    const thenEnd = this.consume(TokenType.RCURLY, 'to close if body');

    if (!this.match(TokenType.ELSE)) {
      return {
        type: 'If',
        cond,
        body,
        pos: this.makePos(startToken, thenEnd),
      };
    }

    this.consume(TokenType.LCURLY, "after 'else'");
    const bodyFalse = this.stmtList();
    const endToken = this.consume(TokenType.RCURLY, 'to close else body');

    return {
      type: 'IfElse',
      cond,
      bodyTrue: body,
      bodyFalse,
      pos: this.makePos(startToken, endToken),
    };
  }

  private stmt(): Stmt {
    const startToken = this.peek();

    switch (startToken.type) {
      case TokenType.FROMCONSOLE: {
        this.advance();
        const dst = this.loc(this.name("after 'fromconsole'"));
        return { type: 'FromConsole', dst, pos: this.makePos(startToken, dst) };
      }
      case TokenType.TOCONSOLE: {
        this.advance();
        const src = this.exp();
        return { type: 'ToConsole', src, pos: this.makePos(startToken, src) };
      }
      case TokenType.RETURN: {
        this.advance();
        if (this.check(TokenType.SEMICOL)) {
          return { type: 'Return', exp: null, pos: startToken.pos };
        }
        const exp = this.exp();
        return { type: 'Return', exp, pos: this.makePos(startToken, exp) };
      }
      case TokenType.MAYBE: {
        this.advance();
        const dst = this.loc(this.name("after 'maybe'"));
        this.consume(TokenType.MEANS, 'after maybe target');
        const src1 = this.exp();
        this.consume(TokenType.OTHERWISE, "after 'means' value");
        const src2 = this.exp();
        return { type: 'Maybe', dst, src1, src2, pos: this.makePos(startToken, src2) };
      }
      case TokenType.ID:
        return this.nameStmt();
      default:
        throw this.expected('a statement', 'in block');
    }
  }

  /**
   * Statements that start with a name: a declaration when a colon follows,
   * otherwise assignment, call, increment or decrement of a location.
   */
  private nameStmt(): Stmt {
    const id = this.name('at start of statement');

    if (this.match(TokenType.COLON)) {
      return this.varDecl(id);
    }

    const dst = this.loc(id);

    if (this.match(TokenType.ASSIGN)) {
      const src = this.exp();
      return { type: 'Assign', dst, src, pos: this.makePos(dst, src) };
    }

    if (this.check(TokenType.LPAREN)) {
      const call = this.callExp(dst);
      return { type: 'CallStmt', call, pos: call.pos };
    }

    if (this.match(TokenType.POSTINC)) {
      return { type: 'PostInc', loc: dst, pos: this.makePos(dst, this.previous()) };
    }

    if (this.match(TokenType.POSTDEC)) {
      return { type: 'PostDec', loc: dst, pos: this.makePos(dst, this.previous()) };
    }

    throw this.expected("'=', '(', '++' or '--'", 'after location');
  }

  // Expression parsing - precedence climbing

  private exp(): Exp {
    return this.logicalOr();
  }

  private binary(op: BinaryOperator, lhs: Exp, rhs: Exp, startToken: Token): BinaryExp {
    return {
      type: 'BinaryExp',
      op,
      lhs,
      rhs,
      pos: this.makePos(startToken, this.previous()),
    };
  }

  private logicalOr(): Exp {
    const startToken = this.peek();
    let left = this.logicalAnd();

    let op = this.matchOperator(LOGICAL_OR_OPERATORS);
    while (op !== null) {
      const right = this.logicalAnd();
      left = this.binary(op, left, right, startToken);
      op = this.matchOperator(LOGICAL_OR_OPERATORS);
    }

    return left;
  }

  private logicalAnd(): Exp {
    const startToken = this.peek();
    let left = this.relational();

    let op = this.matchOperator(LOGICAL_AND_OPERATORS);
    while (op !== null) {
      const right = this.relational();
      left = this.binary(op, left, right, startToken);
      op = this.matchOperator(LOGICAL_AND_OPERATORS);
    }

    return left;
  }

  private relational(): Exp {
    const startToken = this.peek();
    const left = this.additive();

    const op = this.matchOperator(RELATIONAL_OPERATORS);
    if (op === null) {
      return left;
    }

    const right = this.additive();

    if (RELATIONAL_OPERATORS.has(this.peek().type)) {
      throw this.error(
        `Comparison operators cannot be chained; unexpected ${describeToken(this.peek())}`,
      );
    }

    return this.binary(op, left, right, startToken);
  }

  private additive(): Exp {
    const startToken = this.peek();
    let left = this.multiplicative();

    let op = this.matchOperator(ADDITIVE_OPERATORS);
    while (op !== null) {
      const right = this.multiplicative();
      left = this.binary(op, left, right, startToken);
      op = this.matchOperator(ADDITIVE_OPERATORS);
    }

    return left;
  }

  private multiplicative(): Exp {
    const startToken = this.peek();
    let left = this.unary();

    let op = this.matchOperator(MULTIPLICATIVE_OPERATORS);
    while (op !== null) {
      const right = this.unary();
      left = this.binary(op, left, right, startToken);
      op = this.matchOperator(MULTIPLICATIVE_OPERATORS);
    }

    return left;
  }

  private unary(): Exp {
    const startToken = this.peek();

    if (this.match(TokenType.NOT)) {
      const exp = this.unary();
      return { type: 'UnaryExp', op: 'Not', exp, pos: this.makePos(startToken, exp) };
    }

    if (this.match(TokenType.DASH)) {
      const exp = this.unary();
      return { type: 'UnaryExp', op: 'Neg', exp, pos: this.makePos(startToken, exp) };
    }

    return this.term();
  }

  private term(): Exp {
    const token = this.peek();

    switch (token.type) {
      case TokenType.INTLITERAL:
        this.advance();
        return { type: 'IntLit', value: token.value, pos: token.pos };
      case TokenType.STRINGLITERAL:
        this.advance();
        return { type: 'StrLit', value: token.value, pos: token.pos };
      case TokenType.TRUE:
        this.advance();
        return { type: 'True', pos: token.pos };
      case TokenType.FALSE:
        this.advance();
        return { type: 'False', pos: token.pos };
      case TokenType.EH:
        this.advance();
        return { type: 'Eh', pos: token.pos };
      case TokenType.LPAREN: {
        // No node for grouping; the inner node's span widens to the parentheses
        const open = this.advance();
        const exp = this.exp();
        const close = this.consume(TokenType.RPAREN, 'after parenthesized expression');
        return { ...exp, pos: this.makePos(open, close) };
      }
      case TokenType.ID: {
        const loc = this.loc(this.name('in expression'));
        if (this.check(TokenType.LPAREN)) {
          return this.callExp(loc);
        }
        return loc;
      }
      default:
        throw this.expected('an expression', 'here');
    }
  }

  private callExp(callee: Loc): CallExp {
    this.consume(TokenType.LPAREN, 'to start argument list');

    const args: Exp[] = [];

    if (!this.check(TokenType.RPAREN)) {
      do {
        args.push(this.exp());
      } while (this.match(TokenType.COMMA));
    }

    const endToken = this.consume(TokenType.RPAREN, 'after arguments');

    return {
      type: 'CallExp',
      callee,
      args,
      pos: this.makePos(callee, endToken),
    };
  }

  // Locations

  private loc(base: IDNode): Loc {
    let loc: Loc = base;

    while (this.match(TokenType.ARROW)) {
      const field = this.name("after '->'");
      loc = {
        type: 'MemberLoc',
        base: loc,
        field,
        pos: this.makePos(loc, field),
      };
    }

    return loc;
  }

  private name(context: string): IDNode {
    const token = this.peek();

    if (token.type !== TokenType.ID) {
      throw this.expected('an identifier', context);
    }

    this.advance();
    return { type: 'ID', name: token.name, pos: token.pos };
  }
}
