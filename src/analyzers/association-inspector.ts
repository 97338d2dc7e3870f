import { removeLeadingColons } from '../inflector.js';
import { ASSOCIATION_METHODS } from '../parser/calls.js';
import type { ReferenceTree } from '../parser/tree.js';
import type { PolicyStore } from '../policy.js';
import type { EngineName, Reference, TreeNode } from '../types.js';
import { referenceFromClassName } from './references.js';

export interface EngineReference {
  engine: EngineName;
  reference: Reference;
}

/**
 * `has_many :invoices, class_name: "Billing::Invoice"` names another engine's
 * model through a string. Only literal strings are read; a constant holding
 * the name is not followed.
 */
export class AssociationInspector {
  constructor(private policy: PolicyStore) {}

  inspect(tree: ReferenceTree, send: TreeNode): EngineReference | null {
    if (send.kind !== 'send' || !ASSOCIATION_METHODS.has(send.name)) return null;

    const args = tree.argumentsOf(send);
    if (args.length !== 2 || args[0].kind !== 'sym' || args[1].kind !== 'hash') return null;

    const className = tree
      .pairsOf(args[1])
      .find(({ key, value }) => key.kind === 'sym' && key.name === 'class_name' && value.kind === 'str');
    if (!className) return null;

    const engine = removeLeadingColons(className.value.name).split('::')[0];
    if (!engine || !this.policy.isProtected(engine)) return null;

    return { engine, reference: referenceFromClassName(className.value, className.value.name) };
  }
}
