import { readFileSync, readdirSync, statSync, existsSync, type Dirent } from 'fs';
import { join } from 'path';
import { removeLeadingColons } from './inflector.js';
import { tokenize, type Token } from './parser/tokenizer.js';
import type { PolicyStore } from './policy.js';
import type { EngineName } from './types.js';

export type ApiFile = 'allowlist' | 'whitelist' | 'legacyDependents';

export interface ApiFileShape {
  basename: string;
  moduleNames: string[];
  constant: string;
}

// module <Engine>::Api::<ModuleName>
//   <CONSTANT> = [ ... ]
// end
export const API_FILES: Record<ApiFile, ApiFileShape> = {
  allowlist: { basename: '_allowlist.rb', moduleNames: ['Allowlist', 'Whitelist'], constant: 'PUBLIC_MODULES' },
  whitelist: { basename: '_whitelist.rb', moduleNames: ['Allowlist', 'Whitelist'], constant: 'PUBLIC_MODULES' },
  legacyDependents: {
    basename: '_legacy_dependents.rb',
    moduleNames: ['LegacyDependents'],
    constant: 'FILES_WITH_DIRECT_ACCESS',
  },
};

interface CacheEntry {
  checksum: number;
  lists: Partial<Record<ApiFile, string[]>>;
}

/**
 * Reads the allow-list and legacy-dependents artifacts in each engine's API
 * directory. Lists are cached per engine until the modification times of the
 * files in that directory change.
 */
export class ApiMetadataReader {
  private cache = new Map<EngineName, CacheEntry>();

  constructor(private policy: PolicyStore) {}

  allowlist(engine: EngineName): string[] {
    const allowlist = this.read(engine, 'allowlist');
    return allowlist.length > 0 ? allowlist : this.read(engine, 'whitelist');
  }

  legacyDependents(engine: EngineName): string[] {
    return this.read(engine, 'legacyDependents');
  }

  engineChecksum(engine: EngineName): number {
    return sumModifiedTimes(this.policy.engineApiDir(engine));
  }

  /** Sum of the modification times of every engine's API files, for callers that cache whole runs. */
  checksum(): string {
    let total = 0;
    for (const engine of this.policy.allEngines().keys()) {
      total += this.engineChecksum(engine);
    }
    return String(total);
  }

  private read(engine: EngineName, file: ApiFile): string[] {
    const checksum = this.engineChecksum(engine);
    let entry = this.cache.get(engine);
    if (!entry || entry.checksum !== checksum) {
      entry = { checksum, lists: {} };
      this.cache.set(engine, entry);
    }

    const cached = entry.lists[file];
    if (cached) return cached;

    const path = join(this.policy.engineApiDir(engine), API_FILES[file].basename);
    const list = existsSync(path) ? extractDeclaredList(readFileSync(path, 'utf-8'), API_FILES[file]) : [];
    entry.lists[file] = list;
    return list;
  }
}

function sumModifiedTimes(dir: string): number {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch {
    return 0;
  }

  let total = 0;
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      total += sumModifiedTimes(path);
    } else if (entry.isFile()) {
      total += Math.floor(statSync(path).mtimeMs / 1000);
    }
  }
  return total;
}

/**
 * Pulls the entries out of a declared list by matching the token shape; the
 * file is never evaluated. Anything that does not match yields an empty list.
 */
export function extractDeclaredList(source: string, shape: ApiFileShape): string[] {
  const tokens = tokenize(source).filter(token => token.kind !== 'newline');
  let pos = 0;
  const at = (kind: Token['kind'], text?: string): boolean => {
    const token = tokens[pos];
    return token !== undefined && token.kind === kind && (text === undefined || token.text === text);
  };

  if (!at('keyword', 'module')) return [];
  pos++;

  const moduleName: string[] = [];
  while (at('const')) {
    moduleName.push(tokens[pos].text);
    pos++;
    if (!at('scope')) break;
    pos++;
  }
  if (moduleName.length !== 3 || moduleName[1] !== 'Api' || !shape.moduleNames.includes(moduleName[2])) {
    return [];
  }

  if (!at('const', shape.constant)) return [];
  pos++;
  if (!at('assign')) return [];
  pos++;
  if (!at('lbracket')) return [];
  pos++;

  const entries: string[] = [];
  let current: Token[] = [];
  const flush = (): void => {
    if (current.length === 0) return;
    const first = current[0];
    const last = current[current.length - 1];
    entries.push(
      current.length === 1 && first.kind === 'string'
        ? first.value
        : removeLeadingColons(source.slice(first.start, last.end)),
    );
    current = [];
  };

  let depth = 0;
  while (pos < tokens.length) {
    const token = tokens[pos];
    pos++;
    if (depth === 0 && token.kind === 'rbracket') {
      flush();
      return at('keyword', 'end') ? entries : [];
    }
    if (depth === 0 && token.kind === 'comma') {
      flush();
      continue;
    }
    if (token.kind === 'lbracket' || token.kind === 'lparen' || token.kind === 'lbrace') depth++;
    if (token.kind === 'rbracket' || token.kind === 'rparen' || token.kind === 'rbrace') depth--;
    current.push(token);
  }
  return [];
}
