import type { Node } from './ast';

/**
 * Direct children of a node, in source order
 */
export function children(node: Node): Node[] {
  switch (node.type) {
    case 'Program':
      return [...node.globals];
    case 'VarDecl':
      return node.init ? [node.id, node.typeNode, node.init] : [node.id, node.typeNode];
    case 'FormalDecl':
      return [node.id, node.typeNode];
    case 'FnDecl':
      return [node.id, ...node.formals, node.retType, ...node.body];
    case 'ClassDefn':
      return [node.id, ...node.members];
    case 'ClassType':
      return [node.id];
    case 'ImmutableType':
    case 'RefType':
      return [node.sub];
    case 'MemberLoc':
      return [node.base, node.field];
    case 'BinaryExp':
      return [node.lhs, node.rhs];
    case 'UnaryExp':
      return [node.exp];
    case 'CallExp':
      return [node.callee, ...node.args];
    case 'Assign':
      return [node.dst, node.src];
    case 'CallStmt':
      return [node.call];
    case 'Return':
      return node.exp ? [node.exp] : [];
    case 'Maybe':
      return [node.dst, node.src1, node.src2];
    case 'FromConsole':
      return [node.dst];
    case 'ToConsole':
      return [node.src];
    case 'PostDec':
    case 'PostInc':
      return [node.loc];
    case 'If':
    case 'While':
      return [node.cond, ...node.body];
    case 'IfElse':
      return [node.cond, ...node.bodyTrue, ...node.bodyFalse];
    case 'ID':
    case 'IntType':
    case 'BoolType':
    case 'VoidType':
    case 'IntLit':
    case 'StrLit':
    case 'True':
    case 'False':
    case 'Eh':
      return [];
  }
}

/**
 * Pre-order traversal. Returning `false` from `visit` skips the node's
 * children.
 */
export function walk(node: Node, visit: (node: Node) => boolean | void): void {
  if (visit(node) === false) return;
  for (const child of children(node)) {
    walk(child, visit);
  }
}

/**
 * Number of nodes in the tree rooted at `node`
 */
export function countNodes(node: Node): number {
  let count = 0;
  walk(node, () => {
    count++;
  });
  return count;
}
