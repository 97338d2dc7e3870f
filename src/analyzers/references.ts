import { removeLeadingColons } from '../inflector.js';
import type { ReferenceTree } from '../parser/tree.js';
import type { Reference, TreeNode } from '../types.js';

/** Namespace walks look at the reference itself and at most four enclosing segments. */
export const MAX_NAMESPACE_DEPTH = 5;

/** The chain of const nodes from `node` outward: `Billing`, `Billing::Invoice`, ... */
export function enclosingConsts(tree: ReferenceTree, node: TreeNode): TreeNode[] {
  const chain: TreeNode[] = [];
  let current: TreeNode | null = node;
  while (current && current.kind === 'const') {
    chain.push(current);
    current = tree.parentOf(current);
  }
  return chain;
}

export function outermostConst(tree: ReferenceTree, node: TreeNode): TreeNode {
  const chain = enclosingConsts(tree, node);
  return chain[chain.length - 1] ?? node;
}

export function referenceFromConst(tree: ReferenceTree, node: TreeNode): Reference {
  const chain = enclosingConsts(tree, node);
  const parent = chain[1];
  return {
    node,
    candidates: chain.slice(0, MAX_NAMESPACE_DEPTH).map(constNode => tree.constName(constNode)),
    throughApi: parent !== undefined && parent.name === 'Api',
  };
}

/**
 * A class name given as a string (`"Billing::Invoice"`) read as if it were the
 * constant path `Billing::Invoice`, anchored at its first segment.
 */
export function referenceFromClassName(node: TreeNode, className: string): Reference {
  const segments = removeLeadingColons(className).split('::');
  const candidates: string[] = [];
  for (let i = 1; i <= Math.min(segments.length, MAX_NAMESPACE_DEPTH); i++) {
    candidates.push(segments.slice(0, i).join('::'));
  }
  return { node, candidates, throughApi: segments[1] === 'Api' };
}
