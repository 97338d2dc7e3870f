import type { FactoryRegistry } from '../factories.js';
import { FACTORY_BOT_METHODS } from '../parser/calls.js';
import type { ReferenceTree } from '../parser/tree.js';
import type { PolicyStore } from '../policy.js';
import type { FileContext, TreeNode } from '../types.js';
import type { EngineReference } from './association-inspector.js';
import { referenceFromClassName } from './references.js';

const SPEC_FILE = /_spec\.rb$/;

export function isSpecFile(path: string): boolean {
  return SPEC_FILE.test(path);
}

/** `create(:invoice)` in a spec builds whatever model the `invoice` factory is defined for. */
export class FactoryUsageInspector {
  constructor(
    private policy: PolicyStore,
    private registry: FactoryRegistry,
  ) {}

  inspect(tree: ReferenceTree, send: TreeNode, ctx: FileContext): EngineReference | null {
    if (!isSpecFile(ctx.path)) return null;
    if (send.kind !== 'send' || !FACTORY_BOT_METHODS.has(send.name)) return null;

    const [factory] = tree.argumentsOf(send);
    if (!factory || factory.kind !== 'sym') return null;

    const model = this.registry.modelFor(factory.name);
    if (model === null) return null;

    const engine = model.split('::')[0];
    if (!this.policy.isProtected(engine)) return null;

    return { engine, reference: referenceFromClassName(factory, model) };
  }
}
