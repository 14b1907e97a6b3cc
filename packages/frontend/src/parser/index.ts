export type {
  AssignStmt,
  BinaryExp,
  BinaryOperator,
  BoolType,
  CallExp,
  CallStmt,
  ClassDefn,
  ClassMember,
  ClassType,
  Decl,
  EhLit,
  Exp,
  FalseLit,
  FnDecl,
  FormalDecl,
  FromConsoleStmt,
  IDNode,
  IfElseStmt,
  IfStmt,
  ImmutableType,
  IntLit,
  IntType,
  Literal,
  Loc,
  MaybeStmt,
  MemberLoc,
  Node,
  PostDecStmt,
  PostIncStmt,
  Program,
  RefType,
  ReturnStmt,
  Stmt,
  StrLit,
  ToConsoleStmt,
  TrueLit,
  TypeNode,
  UnaryExp,
  UnaryOperator,
  VarDecl,
  VoidType,
  WhileStmt,
} from './ast';
export { Parser } from './parser';
export { ParserError } from './parser-error';
export { children, countNodes, walk } from './visit';
