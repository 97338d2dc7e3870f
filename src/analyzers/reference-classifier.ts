import type { ReferenceTree } from '../parser/tree.js';
import { MAIN_APP_NAME, type PolicyStore } from '../policy.js';
import type { EngineName, FileContext, TreeNode } from '../types.js';
import { outermostConst } from './references.js';

/**
 * Decides whether a constant use-site names a protected engine. Returns the
 * accessed engine, `MainApp::EngineApi` for main-app access out of a strongly
 * protected engine, or null for anything that is not engine access.
 */
export class ReferenceClassifier {
  constructor(private policy: PolicyStore) {}

  classify(tree: ReferenceTree, node: TreeNode, ctx: FileContext): EngineName | null {
    if (node.kind !== 'const') return null;
    if (this.isDeclarationName(tree, node)) return null;
    if (this.isCallReceiver(tree, node)) return null;

    const name = tree.constName(node);
    if (this.policy.isStronglyProtected(ctx.currentEngine) && this.startsMainAppAccess(tree, node, name)) {
      return MAIN_APP_NAME;
    }
    return this.policy.isProtected(name) ? name : null;
  }

  /** `module Billing::Invoices` defines the namespace rather than using it. */
  private isDeclarationName(tree: ReferenceTree, node: TreeNode): boolean {
    const top = outermostConst(tree, node);
    const owner = tree.parentOf(top);
    return owner !== null && (owner.kind === 'module' || owner.kind === 'class') && owner.children[0] === top.id;
  }

  // `Warehouse.new`: a value object that shares an engine's name.
  private isCallReceiver(tree: ReferenceTree, node: TreeNode): boolean {
    const parent = tree.parentOf(node);
    return parent !== null && parent.kind === 'send' && parent.receiver === node.id;
  }

  private startsMainAppAccess(tree: ReferenceTree, node: TreeNode, name: string): boolean {
    if (!name.startsWith(MAIN_APP_NAME)) return false;
    const scope = node.children.length > 0 ? tree.node(node.children[0]) : null;
    return scope === null || scope.kind !== 'const' || !tree.constName(scope).startsWith(MAIN_APP_NAME);
  }
}
