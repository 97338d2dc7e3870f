import { readFileSync, readdirSync, type Dirent } from 'fs';
import { join, relative } from 'path';
import { errorMessage } from './errors.js';
import { camelize, removeLeadingColons } from './inflector.js';
import { FACTORY_DEFINITION_METHOD } from './parser/calls.js';
import { buildReferenceTree, type ReferenceTree } from './parser/tree.js';
import type { PipelineLog } from './pipeline.js';
import type { PolicyStore } from './policy.js';
import type { TreeNode } from './types.js';

export interface FactorySource {
  path: string;
  source: string;
}

interface FactoryDefinition {
  names: string[];
  parent: string | null;
  modelClassName: string | null;
}

interface Surrounding {
  parent: string | null;
  modelClassName: string | null;
}

/**
 * Maps factory names (and aliases) to the model class they build. Factories
 * that inherit from a parent factory take the model of the root of their
 * parent chain; chains that never reach a model, or loop, are dropped.
 */
export function buildFactoryMap(files: FactorySource[]): Map<string, string> {
  const models = new Map<string, string>();
  const parents = new Map<string, string>();

  for (const file of files) {
    const tree = buildReferenceTree(file.source);
    collectFactories(tree, tree.root, { parent: null, modelClassName: null }, models, parents);
  }

  const resolved = new Map(models);
  for (const [name, parent] of parents) {
    const seen = new Set<string>([name]);
    let root = parent;
    let next = parents.get(root);
    while (next !== undefined && !seen.has(root)) {
      seen.add(root);
      root = next;
      next = parents.get(root);
    }
    if (next !== undefined) continue;

    const model = models.get(root);
    if (model !== undefined) resolved.set(name, model);
  }
  return resolved;
}

function collectFactories(
  tree: ReferenceTree,
  node: TreeNode,
  surrounding: Surrounding,
  models: Map<string, string>,
  parents: Map<string, string>,
): void {
  const send = factorySend(tree, node);
  let scope = surrounding;

  if (send) {
    const definition = parseDefinition(tree, send);
    if (definition) {
      scope = {
        parent: definition.modelClassName ? null : (definition.parent ?? surrounding.parent),
        modelClassName: definition.modelClassName ?? surrounding.modelClassName ?? camelize(definition.names[0]),
      };
      if (send === node) {
        for (const name of definition.names) {
          if (scope.parent !== null) {
            parents.set(name, scope.parent);
            models.delete(name);
          } else if (scope.modelClassName !== null) {
            models.set(name, scope.modelClassName);
            parents.delete(name);
          }
        }
        return;
      }
    }
  }

  for (const child of tree.childrenOf(node)) {
    collectFactories(tree, child, scope, models, parents);
  }
}

// `factory :name` on its own, or as the call a `do ... end` block belongs to.
function factorySend(tree: ReferenceTree, node: TreeNode): TreeNode | null {
  const isFactory = (candidate: TreeNode | undefined): boolean =>
    candidate !== undefined && candidate.kind === 'send' && candidate.name === FACTORY_DEFINITION_METHOD;

  if (isFactory(node)) return node;
  if (node.kind === 'block') {
    const call = tree.childrenOf(node)[0];
    if (isFactory(call)) return call;
  }
  return null;
}

function parseDefinition(tree: ReferenceTree, send: TreeNode): FactoryDefinition | null {
  const [nameNode, options] = tree.argumentsOf(send);
  if (!nameNode || (nameNode.kind !== 'sym' && nameNode.kind !== 'str')) return null;

  const names = [nameNode.name];
  let parent: string | null = null;
  let modelClassName: string | null = null;

  if (options && options.kind === 'hash') {
    const aliases = tree.symbolKeyValue(options, 'aliases');
    if (aliases && aliases.kind === 'array') {
      for (const alias of tree.childrenOf(aliases)) {
        if (alias.kind === 'sym' || alias.kind === 'str') names.push(alias.name);
      }
    }

    const parentNode = tree.symbolKeyValue(options, 'parent');
    if (parentNode && (parentNode.kind === 'sym' || parentNode.kind === 'str')) parent = parentNode.name;

    const classNode = tree.symbolKeyValue(options, 'class');
    if (classNode && classNode.kind === 'const') modelClassName = tree.constName(classNode);
    if (classNode && classNode.kind === 'str') modelClassName = removeLeadingColons(classNode.name);
  }

  return { names, parent, modelClassName };
}

/**
 * Factory definitions found in `spec/factories` of the application and of
 * every engine, read on first use.
 */
export class FactoryRegistry {
  private factories: Map<string, string> | null = null;

  constructor(
    private policy: PolicyStore,
    private log: PipelineLog = () => {},
  ) {}

  factoryFiles(): string[] {
    const roots = [join(this.policy.rootDir, 'spec', 'factories')];
    for (const dir of this.policy.allEngines().values()) {
      roots.push(join(this.policy.enginesDir, dir, 'spec', 'factories'));
    }
    return roots.flatMap(root => listRubyFiles(root));
  }

  modelFor(factoryName: string): string | null {
    return this.all().get(factoryName) ?? null;
  }

  all(): Map<string, string> {
    if (!this.factories) {
      const sources: FactorySource[] = [];
      for (const path of this.factoryFiles()) {
        try {
          sources.push({ path, source: readFileSync(path, 'utf-8') });
        } catch (err) {
          this.log(`factories: skipping ${relative(this.policy.rootDir, path)}: ${errorMessage(err)}`);
        }
      }
      this.factories = buildFactoryMap(sources);
      this.log(`factories: ${this.factories.size} factories from ${sources.length} files`);
    }
    return this.factories;
  }
}

function listRubyFiles(dir: string): string[] {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch {
    return [];
  }

  const files: string[] = [];
  for (const entry of [...entries].sort((a, b) => a.name.localeCompare(b.name))) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) files.push(...listRubyFiles(path));
    else if (entry.isFile() && entry.name.endsWith('.rb')) files.push(path);
  }
  return files;
}
