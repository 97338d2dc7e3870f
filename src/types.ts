// Reference tree
export type NodeKind =
  | 'root'
  | 'const'
  | 'cbase'
  | 'send'
  | 'block'
  | 'module'
  | 'class'
  | 'str'
  | 'dstr'
  | 'sym'
  | 'hash'
  | 'pair'
  | 'array';

export interface SourceRange {
  start: number;
  end: number;
  line: number; // 1-indexed
  column: number; // 1-indexed
}

export interface TreeNode {
  id: number;
  kind: NodeKind;
  parent: number | null;
  children: number[];
  range: SourceRange;
  /** Segment name for const, method name for send, literal value for sym/str. */
  name: string;
  /** Receiver of a send, when it has one. */
  receiver: number | null;
}

// Policy
export type EngineName = string;

export interface PolicyConfig {
  rootDir: string;
  enginesPath: string;
  unprotectedEngines: Set<EngineName>;
  stronglyProtectedEngines: Set<EngineName>;
  overrides: Map<EngineName, Set<string>>;
}

// A use site checked against the policy
export interface Reference {
  node: TreeNode;
  /** Qualified names from the reference outward, at most MAX_NAMESPACE_DEPTH of them. */
  candidates: string[];
  throughApi: boolean;
}

export interface FileContext {
  path: string;
  currentEngine: EngineName | null;
}

// Offenses
export interface Offense {
  path: string;
  line: number;
  column: number;
  length: number;
  message: string;
  engine: EngineName;
}

// Config
export interface ModelOracleConfig {
  enabled: boolean;
  command: string[];
  timeoutMs: number;
  baseType: string;
}

export interface BoundaryConfig {
  configPath: string;
  policy: PolicyConfig;
  exclude: string[];
  modelOracle: ModelOracleConfig;
  factoryUsage: { enabled: boolean };
  fingerprint: string;
}
