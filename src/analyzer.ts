import { createHash } from 'crypto';
import { readFileSync } from 'fs';
import { AccessValidator } from './analyzers/access-validator.js';
import { AssociationInspector, type EngineReference } from './analyzers/association-inspector.js';
import { FactoryUsageInspector } from './analyzers/factory-inspector.js';
import { ReferenceClassifier } from './analyzers/reference-classifier.js';
import { outermostConst, referenceFromConst } from './analyzers/references.js';
import { ApiMetadataReader } from './api-metadata.js';
import { errorMessage } from './errors.js';
import { FactoryRegistry } from './factories.js';
import { formatOffenseMessage } from './messages.js';
import { createModelOracle, StaticModelOracle, type ModelOracle } from './oracle.js';
import { buildReferenceTree, type ReferenceTree } from './parser/tree.js';
import type { PipelineLog } from './pipeline.js';
import { PolicyStore } from './policy.js';
import type { BoundaryConfig, EngineName, FileContext, Offense, TreeNode } from './types.js';

export interface BoundaryAnalyzerOptions {
  policy: PolicyStore;
  api: ApiMetadataReader;
  oracle: ModelOracle;
  /** Checks factory usage in specs when given. */
  factories?: FactoryRegistry;
}

/**
 * Walks the reference tree of one file and reports every boundary crossing.
 * Bare constants only count when they name a persistence model; association
 * and factory references are always checked.
 */
export class BoundaryAnalyzer {
  readonly policy: PolicyStore;
  readonly api: ApiMetadataReader;
  private oracle: ModelOracle;
  private classifier: ReferenceClassifier;
  private validator: AccessValidator;
  private associations: AssociationInspector;
  private factoryUsage: FactoryUsageInspector | null;

  constructor(options: BoundaryAnalyzerOptions) {
    this.policy = options.policy;
    this.api = options.api;
    this.oracle = options.oracle;
    this.classifier = new ReferenceClassifier(this.policy);
    this.validator = new AccessValidator(this.policy, this.api);
    this.associations = new AssociationInspector(this.policy);
    this.factoryUsage = options.factories ? new FactoryUsageInspector(this.policy, options.factories) : null;
  }

  analyzeSource(path: string, source: string): Offense[] {
    const tree = buildReferenceTree(source);
    const ctx: FileContext = { path, currentEngine: this.policy.engineForFile(path) };
    const offenses: Offense[] = [];

    for (const node of tree.inSourceOrder()) {
      const offense = node.kind === 'const' ? this.checkConstant(tree, node, ctx) : this.checkCall(tree, node, ctx);
      if (offense) offenses.push(offense);
    }

    return offenses.sort((a, b) => a.line - b.line || a.column - b.column);
  }

  private checkConstant(tree: ReferenceTree, node: TreeNode, ctx: FileContext): Offense | null {
    const engine = this.classifier.classify(tree, node, ctx);
    if (engine === null) return null;
    if (this.validator.isValid(referenceFromConst(tree, node), ctx, engine)) return null;
    if (!this.oracle.isPersistenceModel(tree.constName(outermostConst(tree, node)))) return null;
    return this.offense(node, engine, ctx);
  }

  private checkCall(tree: ReferenceTree, node: TreeNode, ctx: FileContext): Offense | null {
    if (node.kind !== 'send') return null;

    const found: EngineReference | null =
      this.associations.inspect(tree, node) ?? this.factoryUsage?.inspect(tree, node, ctx) ?? null;
    if (!found) return null;
    if (this.validator.isValid(found.reference, ctx, found.engine)) return null;
    return this.offense(found.reference.node, found.engine, ctx);
  }

  private offense(node: TreeNode, engine: EngineName, ctx: FileContext): Offense {
    return {
      path: ctx.path,
      line: node.range.line,
      column: node.range.column,
      length: node.range.end - node.range.start,
      message: formatOffenseMessage(engine, ctx.currentEngine, this.policy),
      engine,
    };
  }
}

export interface CreateAnalyzerOptions {
  /** Treat every constant as a model instead of asking the application. */
  assumeModels?: boolean;
  log?: PipelineLog;
}

export function createAnalyzer(config: BoundaryConfig, options: CreateAnalyzerOptions = {}): BoundaryAnalyzer {
  const policy = new PolicyStore(config.policy);
  return new BoundaryAnalyzer({
    policy,
    api: new ApiMetadataReader(policy),
    oracle: options.assumeModels
      ? new StaticModelOracle(true)
      : createModelOracle(config.modelOracle, config.policy.rootDir, options.log),
    factories: config.factoryUsage.enabled ? new FactoryRegistry(policy, options.log) : undefined,
  });
}

/**
 * Key for cached results: the configuration plus what else, outside the
 * checked files and the API directories, changes what a run reports.
 */
export function cacheFingerprint(config: BoundaryConfig, options: CreateAnalyzerOptions = {}): string {
  const policy = new PolicyStore(config.policy);
  const assumeModels = Boolean(options.assumeModels) || !config.modelOracle.enabled;
  const hash = createHash('sha256')
    .update(config.fingerprint)
    .update(`\nassume-models:${assumeModels}`)
    .update(`\nengines:${[...policy.allEngines().values()].join(',')}`);

  if (config.factoryUsage.enabled) {
    for (const path of new FactoryRegistry(policy).factoryFiles()) {
      let content: string;
      try {
        content = readFileSync(path, 'utf-8');
      } catch (err) {
        content = `unreadable: ${errorMessage(err)}`;
      }
      hash.update(`\n${path}\n${content}`);
    }
  }
  return hash.digest('hex').slice(0, 16);
}
