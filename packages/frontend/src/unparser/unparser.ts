import { TOKEN_SPELLINGS } from '../lexer/token-types';
import type {
  BinaryOperator,
  ClassDefn,
  Exp,
  FnDecl,
  FormalDecl,
  Node,
  Stmt,
  TypeNode,
  UnaryOperator,
  VarDecl,
} from '../parser/ast';

/**
 * How a statement is rendered.
 *
 * `embedded` drops the leading indentation and the trailing `;` of call,
 * increment, decrement and maybe statements so they can sit inside another
 * construct. Other statements render the same in both modes.
 */
export type RenderMode = 'standalone' | 'embedded';

export interface UnparseOptions {
  /** Nesting level of the root node, one tab per level (default 0) */
  indent?: number;
  /** Render mode of the root node; descendants are always standalone */
  mode?: RenderMode;
}

const BINARY_SPELLINGS: Record<BinaryOperator, string> = {
  Plus: TOKEN_SPELLINGS.CROSS,
  Minus: TOKEN_SPELLINGS.DASH,
  Times: TOKEN_SPELLINGS.STAR,
  Divide: TOKEN_SPELLINGS.SLASH,
  And: TOKEN_SPELLINGS.AND,
  Or: TOKEN_SPELLINGS.OR,
  Equals: TOKEN_SPELLINGS.EQUALS,
  NotEquals: TOKEN_SPELLINGS.NOTEQUALS,
  Less: TOKEN_SPELLINGS.LESS,
  LessEq: TOKEN_SPELLINGS.LESSEQ,
  Greater: TOKEN_SPELLINGS.GREATER,
  GreaterEq: TOKEN_SPELLINGS.GREATEREQ,
};

const UNARY_SPELLINGS: Record<UnaryOperator, string> = {
  Neg: TOKEN_SPELLINGS.DASH,
  Not: TOKEN_SPELLINGS.NOT,
};

/**
 * Quote a string literal value, escaping what the scanner unescapes
 */
export function quoteString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

function pad(indent: number): string {
  return '\t'.repeat(indent);
}

/**
 * Renders an AST back to canonical ehlang source
 *
 * Operands that are themselves operator expressions are always
 * parenthesized, so re-parsing the output rebuilds the same tree whatever
 * the operator precedence.
 */
export class Unparser {
  private out: string = '';

  unparse(node: Node, options: UnparseOptions = {}): string {
    this.out = '';
    this.node(node, options.indent ?? 0, options.mode ?? 'standalone');
    return this.out;
  }

  private node(node: Node, indent: number, mode: RenderMode): void {
    switch (node.type) {
      case 'Program':
        for (const global of node.globals) {
          this.decl(global, indent);
        }
        return;
      case 'ClassDefn':
      case 'FnDecl':
        this.decl(node, indent);
        return;
      case 'FormalDecl':
        this.out += pad(indent) + this.formal(node);
        return;
      case 'IntType':
      case 'BoolType':
      case 'VoidType':
      case 'ClassType':
      case 'ImmutableType':
      case 'RefType':
        this.out += pad(indent) + this.typeNode(node);
        return;
      case 'VarDecl':
      case 'Assign':
      case 'CallStmt':
      case 'Return':
      case 'Maybe':
      case 'FromConsole':
      case 'ToConsole':
      case 'PostDec':
      case 'PostInc':
      case 'If':
      case 'IfElse':
      case 'While':
        this.stmt(node, indent, mode);
        return;
      default:
        this.out += pad(indent) + this.exp(node);
    }
  }

  // Declarations

  private decl(decl: VarDecl | FnDecl | ClassDefn, indent: number): void {
    switch (decl.type) {
      case 'VarDecl':
        this.varDecl(decl, indent);
        break;
      case 'FnDecl':
        this.fnDecl(decl, indent);
        break;
      case 'ClassDefn':
        this.out += `${pad(indent)}${decl.id.name} : custom {\n`;
        for (const member of decl.members) {
          this.decl(member, indent + 1);
        }
        this.out += `${pad(indent)}};\n`;
        break;
    }
  }

  private varDecl(decl: VarDecl, indent: number): void {
    const init = decl.init ? ` = ${this.exp(decl.init)}` : '';
    this.out += `${pad(indent)}${decl.id.name} : ${this.typeNode(decl.typeNode)}${init};\n`;
  }

  private fnDecl(decl: FnDecl, indent: number): void {
    const formals = decl.formals.map((formal) => this.formal(formal)).join(', ');
    this.out += `${pad(indent)}${decl.id.name} : (${formals}) -> ${this.typeNode(decl.retType)} {\n`;
    this.block(decl.body, indent + 1);
    this.out += `${pad(indent)}}\n`;
  }

  private formal(formal: FormalDecl): string {
    return `${formal.id.name} : ${this.typeNode(formal.typeNode)}`;
  }

  private typeNode(type: TypeNode): string {
    switch (type.type) {
      case 'IntType':
        return TOKEN_SPELLINGS.INT;
      case 'BoolType':
        return TOKEN_SPELLINGS.BOOL;
      case 'VoidType':
        return TOKEN_SPELLINGS.VOID;
      case 'ClassType':
        return type.id.name;
      case 'ImmutableType':
        return `${TOKEN_SPELLINGS.IMMUTABLE} ${this.typeNode(type.sub)}`;
      case 'RefType':
        return `${TOKEN_SPELLINGS.REF} ${this.typeNode(type.sub)}`;
    }
  }

  // Statements

  private block(stmts: readonly Stmt[], indent: number): void {
    for (const stmt of stmts) {
      this.stmt(stmt, indent, 'standalone');
    }
  }

  private simple(text: string, indent: number): void {
    this.out += `${pad(indent)}${text};\n`;
  }

  private embeddable(text: string, indent: number, mode: RenderMode): void {
    if (mode === 'embedded') {
      this.out += text;
    } else {
      this.simple(text, indent);
    }
  }

  private stmt(stmt: Stmt, indent: number, mode: RenderMode): void {
    switch (stmt.type) {
      case 'VarDecl':
        this.varDecl(stmt, indent);
        break;
      case 'Assign':
        this.simple(`${this.exp(stmt.dst)} = ${this.exp(stmt.src)}`, indent);
        break;
      case 'CallStmt':
        this.embeddable(this.exp(stmt.call), indent, mode);
        break;
      case 'Return':
        this.simple(stmt.exp ? `return ${this.exp(stmt.exp)}` : 'return', indent);
        break;
      case 'Maybe':
        this.embeddable(
          `maybe ${this.exp(stmt.dst)} means ${this.exp(stmt.src1)} otherwise ${this.exp(stmt.src2)}`,
          indent,
          mode,
        );
        break;
      case 'FromConsole':
        this.simple(`fromconsole ${this.exp(stmt.dst)}`, indent);
        break;
      case 'ToConsole':
        this.simple(`toconsole ${this.exp(stmt.src)}`, indent);
        break;
      case 'PostDec':
        this.embeddable(`${this.exp(stmt.loc)}--`, indent, mode);
        break;
      case 'PostInc':
        this.embeddable(`${this.exp(stmt.loc)}++`, indent, mode);
        break;
      case 'If':
        this.out += `${pad(indent)}if (${this.exp(stmt.cond)}){\n`;
        this.block(stmt.body, indent + 1);
        this.out += `${pad(indent)}}\n`;
        break;
      case 'IfElse':
        this.out += `${pad(indent)}if (${this.exp(stmt.cond)}){\n`;
        this.block(stmt.bodyTrue, indent + 1);
        this.out += `${pad(indent)}} else {\n`;
        this.block(stmt.bodyFalse, indent + 1);
        this.out += `${pad(indent)}}\n`;
        break;
      case 'While':
        this.out += `${pad(indent)}while (${this.exp(stmt.cond)}){\n`;
        this.block(stmt.body, indent + 1);
        this.out += `${pad(indent)}}\n`;
        break;
    }
  }

  // Expressions

  private exp(exp: Exp): string {
    switch (exp.type) {
      case 'IntLit':
        return String(exp.value);
      case 'StrLit':
        return quoteString(exp.value);
      case 'True':
        return TOKEN_SPELLINGS.TRUE;
      case 'False':
        return TOKEN_SPELLINGS.FALSE;
      case 'Eh':
        return TOKEN_SPELLINGS.EH;
      case 'ID':
        return exp.name;
      case 'MemberLoc':
        return `${this.exp(exp.base)}${TOKEN_SPELLINGS.ARROW}${exp.field.name}`;
      case 'CallExp':
        return `${this.exp(exp.callee)}(${exp.args.map((arg) => this.exp(arg)).join(', ')})`;
      case 'BinaryExp':
        return `${this.nested(exp.lhs)} ${BINARY_SPELLINGS[exp.op]} ${this.nested(exp.rhs)}`;
      case 'UnaryExp':
        return `${UNARY_SPELLINGS[exp.op]}${this.nested(exp.exp)}`;
    }
  }

  /** Render an operand, parenthesized when it is an operator expression */
  private nested(exp: Exp): string {
    if (exp.type === 'BinaryExp' || exp.type === 'UnaryExp') {
      return `(${this.exp(exp)})`;
    }
    return this.exp(exp);
  }
}

/**
 * Render `node` as canonical ehlang source
 *
 * @example
 * ```ts
 * unparse(parse('x: int = 2 + 3 * 4;'))
 * // => 'x : int = 2 + (3 * 4);\n'
 * ```
 */
export function unparse(node: Node, options: UnparseOptions = {}): string {
  return new Unparser().unparse(node, options);
}
