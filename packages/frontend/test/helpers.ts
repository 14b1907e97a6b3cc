import { parse } from '../src/index';
import type { Exp, Stmt } from '../src/parser';

/**
 * Deep copy of an AST without positions, for structural comparison
 */
export function strip(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(strip);
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      if (key !== 'pos') {
        result[key] = strip(child);
      }
    }
    return result;
  }
  return value;
}

/** Parse `source` as the initializer of a global */
export function parseExp(source: string): Exp {
  const decl = parse(`x : int = ${source};`).globals[0];
  if (decl.type !== 'VarDecl' || decl.init === null) {
    throw new Error('expected an initialized variable declaration');
  }
  return decl.init;
}

/** Parse `source` as the body of a function */
export function parseBody(source: string): readonly Stmt[] {
  const decl = parse(`main : () -> void {\n${source}\n}`).globals[0];
  if (decl.type !== 'FnDecl') {
    throw new Error('expected a function declaration');
  }
  return decl.body;
}

// Position-free node builders

export const id = (name: string) => ({ type: 'ID', name });
export const int = (value: number) => ({ type: 'IntLit', value });
export const bin = (op: string, lhs: unknown, rhs: unknown) => ({ type: 'BinaryExp', op, lhs, rhs });
export const un = (op: string, exp: unknown) => ({ type: 'UnaryExp', op, exp });
export const member = (base: unknown, field: string) => ({ type: 'MemberLoc', base, field: id(field) });
