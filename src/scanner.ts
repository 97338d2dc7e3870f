import { readdirSync, readFileSync, existsSync } from 'fs';
import { join, relative, resolve } from 'path';
import ignore from 'ignore';

export interface ScanResult {
  rootPath: string;
  /** Ruby sources, relative to the root, in walk order. */
  files: string[];
  directories: number;
}

export interface ScannerOptions {
  /** gitignore-style patterns on top of the defaults and `.gitignore`. */
  exclude?: string[];
  /** Restrict the scan to these files or directories (absolute or relative to the root). */
  targets?: string[];
}

const DEFAULT_IGNORE = [
  '.git', '.svn', '.hg', '.bundle', '.engine-boundary',
  'node_modules', 'vendor', 'tmp', 'log', 'coverage',
  'public/assets', 'public/packs', 'db/schema.rb',
];

const RUBY_FILE = /\.(rb|rake)$/;

export class Scanner {
  private ig: ReturnType<typeof ignore>;
  private targets: string[] | null;

  constructor(
    private rootPath: string,
    options: ScannerOptions = {},
  ) {
    this.ig = ignore();
    this.ig.add(DEFAULT_IGNORE);

    const gitignorePath = join(rootPath, '.gitignore');
    if (existsSync(gitignorePath)) {
      const content = readFileSync(gitignorePath, 'utf-8');
      this.ig.add(content);
    }
    if (options.exclude) this.ig.add(options.exclude);

    this.targets = options.targets && options.targets.length > 0
      ? options.targets.map(target => relative(rootPath, resolve(rootPath, target)).replace(/\\/g, '/'))
      : null;
  }

  async scan(): Promise<ScanResult> {
    const files: string[] = [];
    const directories = this.walkDir(this.rootPath, '', files);
    return { rootPath: this.rootPath, files, directories };
  }

  private walkDir(absPath: string, relPath: string, files: string[]): number {
    const entries = readdirSync(absPath, { withFileTypes: true })
      .sort((a, b) => a.name.localeCompare(b.name));
    let directories = 1;

    for (const entry of entries) {
      const entryRelPath = relPath ? `${relPath}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (this.ig.ignores(`${entryRelPath}/`) || !this.mayContainTarget(entryRelPath)) continue;
        directories += this.walkDir(join(absPath, entry.name), entryRelPath, files);
      } else if (entry.isFile() && RUBY_FILE.test(entry.name)) {
        if (this.ig.ignores(entryRelPath) || !this.isTargeted(entryRelPath)) continue;
        files.push(entryRelPath);
      }
    }
    return directories;
  }

  private isTargeted(path: string): boolean {
    if (!this.targets) return true;
    return this.targets.some(target => target === '' || path === target || path.startsWith(`${target}/`));
  }

  // A directory is walked when it lies inside a target or a target lies inside it.
  private mayContainTarget(dir: string): boolean {
    if (!this.targets) return true;
    return this.targets.some(
      target => target === '' || dir === target || dir.startsWith(`${target}/`) || target.startsWith(`${dir}/`),
    );
  }
}
