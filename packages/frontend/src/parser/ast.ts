import type { Position } from '../lexer/token';

/**
 * Base interface for all AST nodes
 */
interface BaseNode {
  /** Span from the first to the last token the node was built from */
  readonly pos: Position;
}

// ---------------------------------------------------------------------------
// Locations
// ---------------------------------------------------------------------------

/**
 * Identifier: foo
 */
export interface IDNode extends BaseNode {
  readonly type: 'ID';
  readonly name: string;
}

/**
 * Member access: base->field
 */
export interface MemberLoc extends BaseNode {
  readonly type: 'MemberLoc';
  readonly base: Loc;
  readonly field: IDNode;
}

/**
 * Assignable location: an identifier or a member-access chain
 */
export type Loc = IDNode | MemberLoc;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface IntType extends BaseNode {
  readonly type: 'IntType';
}

export interface BoolType extends BaseNode {
  readonly type: 'BoolType';
}

export interface VoidType extends BaseNode {
  readonly type: 'VoidType';
}

/**
 * Reference to a `custom` class by name
 */
export interface ClassType extends BaseNode {
  readonly type: 'ClassType';
  readonly id: IDNode;
}

/**
 * immutable <sub>
 */
export interface ImmutableType extends BaseNode {
  readonly type: 'ImmutableType';
  readonly sub: TypeNode;
}

/**
 * ref <sub>
 */
export interface RefType extends BaseNode {
  readonly type: 'RefType';
  readonly sub: TypeNode;
}

export type TypeNode = IntType | BoolType | VoidType | ClassType | ImmutableType | RefType;

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export interface IntLit extends BaseNode {
  readonly type: 'IntLit';
  readonly value: number;
}

/**
 * String literal; `value` holds the decoded contents without quotes
 */
export interface StrLit extends BaseNode {
  readonly type: 'StrLit';
  readonly value: string;
}

export interface TrueLit extends BaseNode {
  readonly type: 'True';
}

export interface FalseLit extends BaseNode {
  readonly type: 'False';
}

/**
 * The `eh?` placeholder value
 */
export interface EhLit extends BaseNode {
  readonly type: 'Eh';
}

export type BinaryOperator =
  | 'Plus'
  | 'Minus'
  | 'Times'
  | 'Divide'
  | 'And'
  | 'Or'
  | 'Equals'
  | 'NotEquals'
  | 'Less'
  | 'LessEq'
  | 'Greater'
  | 'GreaterEq';

export type UnaryOperator = 'Neg' | 'Not';

/**
 * Binary operator expression: a + b, a and b, a < b
 */
export interface BinaryExp extends BaseNode {
  readonly type: 'BinaryExp';
  readonly op: BinaryOperator;
  readonly lhs: Exp;
  readonly rhs: Exp;
}

/**
 * Unary operator expression: -a, !a
 */
export interface UnaryExp extends BaseNode {
  readonly type: 'UnaryExp';
  readonly op: UnaryOperator;
  readonly exp: Exp;
}

/**
 * Function call: f(a, b)
 */
export interface CallExp extends BaseNode {
  readonly type: 'CallExp';
  readonly callee: Loc;
  readonly args: readonly Exp[];
}

export type Literal = IntLit | StrLit | TrueLit | FalseLit | EhLit;

export type Exp = Literal | BinaryExp | UnaryExp | CallExp | Loc;

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

/**
 * dst = src
 */
export interface AssignStmt extends BaseNode {
  readonly type: 'Assign';
  readonly dst: Loc;
  readonly src: Exp;
}

/**
 * A call evaluated for its effect
 */
export interface CallStmt extends BaseNode {
  readonly type: 'CallStmt';
  readonly call: CallExp;
}

export interface ReturnStmt extends BaseNode {
  readonly type: 'Return';
  readonly exp: Exp | null;
}

/**
 * maybe dst means src1 otherwise src2
 */
export interface MaybeStmt extends BaseNode {
  readonly type: 'Maybe';
  readonly dst: Loc;
  readonly src1: Exp;
  readonly src2: Exp;
}

export interface FromConsoleStmt extends BaseNode {
  readonly type: 'FromConsole';
  readonly dst: Loc;
}

export interface ToConsoleStmt extends BaseNode {
  readonly type: 'ToConsole';
  readonly src: Exp;
}

export interface PostDecStmt extends BaseNode {
  readonly type: 'PostDec';
  readonly loc: Loc;
}

export interface PostIncStmt extends BaseNode {
  readonly type: 'PostInc';
  readonly loc: Loc;
}

export interface IfStmt extends BaseNode {
  readonly type: 'If';
  readonly cond: Exp;
  readonly body: readonly Stmt[];
}

export interface IfElseStmt extends BaseNode {
  readonly type: 'IfElse';
  readonly cond: Exp;
  readonly bodyTrue: readonly Stmt[];
  readonly bodyFalse: readonly Stmt[];
}

export interface WhileStmt extends BaseNode {
  readonly type: 'While';
  readonly cond: Exp;
  readonly body: readonly Stmt[];
}

export type Stmt =
  | VarDecl
  | AssignStmt
  | CallStmt
  | ReturnStmt
  | MaybeStmt
  | FromConsoleStmt
  | ToConsoleStmt
  | PostDecStmt
  | PostIncStmt
  | IfStmt
  | IfElseStmt
  | WhileStmt;

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

/**
 * name : type [= init]
 */
export interface VarDecl extends BaseNode {
  readonly type: 'VarDecl';
  readonly id: IDNode;
  readonly typeNode: TypeNode;
  /** null when declared without an initializer */
  readonly init: Exp | null;
}

/**
 * Function parameter: name : type
 */
export interface FormalDecl extends BaseNode {
  readonly type: 'FormalDecl';
  readonly id: IDNode;
  readonly typeNode: TypeNode;
}

/**
 * name : (formals) -> retType { body }
 */
export interface FnDecl extends BaseNode {
  readonly type: 'FnDecl';
  readonly id: IDNode;
  readonly formals: readonly FormalDecl[];
  readonly retType: TypeNode;
  readonly body: readonly Stmt[];
}

export type ClassMember = VarDecl | FnDecl;

/**
 * name : custom { members };
 */
export interface ClassDefn extends BaseNode {
  readonly type: 'ClassDefn';
  readonly id: IDNode;
  readonly members: readonly ClassMember[];
}

export type Decl = VarDecl | FnDecl | ClassDefn;

/**
 * Root of the tree: global declarations in source order
 */
export interface Program extends BaseNode {
  readonly type: 'Program';
  readonly globals: readonly Decl[];
}

/**
 * Union of all AST node types
 */
export type Node = Program | Decl | FormalDecl | Stmt | Exp | TypeNode;
