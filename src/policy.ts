import { readdirSync } from 'fs';
import { isAbsolute, join, resolve } from 'path';
import { camelize, underscore } from './inflector.js';
import type { EngineName, PolicyConfig } from './types.js';

/** Stands for the main application's API when a strongly protected engine reaches out of itself. */
export const MAIN_APP_NAME = 'MainApp::EngineApi';

export class PolicyStore {
  private engineDirs: Map<EngineName, string> | null = null;
  private protectedSet: Set<EngineName> | null = null;

  constructor(private config: PolicyConfig) {}

  get rootDir(): string {
    return this.config.rootDir;
  }

  get enginesPath(): string {
    return this.config.enginesPath;
  }

  get enginesDir(): string {
    return resolve(this.config.rootDir, this.config.enginesPath);
  }

  /** Every engine directory, camelized name -> directory name. A missing engines path has no engines. */
  allEngines(): Map<EngineName, string> {
    if (!this.engineDirs) {
      this.engineDirs = new Map();
      let entries: string[] = [];
      try {
        entries = readdirSync(this.enginesDir, { withFileTypes: true })
          .filter(entry => entry.isDirectory())
          .map(entry => entry.name)
          .sort();
      } catch {
        entries = [];
      }
      for (const dir of entries) this.engineDirs.set(camelize(dir), dir);
    }
    return this.engineDirs;
  }

  protectedEngines(): Set<EngineName> {
    if (!this.protectedSet) {
      this.protectedSet = new Set(
        [...this.allEngines().keys()].filter(engine => !this.config.unprotectedEngines.has(engine)),
      );
    }
    return this.protectedSet;
  }

  isProtected(engine: EngineName): boolean {
    return this.protectedEngines().has(engine);
  }

  isStronglyProtected(engine: EngineName | null): boolean {
    return engine !== null && this.config.stronglyProtectedEngines.has(engine);
  }

  overridesFor(engine: EngineName | null): Set<string> | null {
    if (engine === null) return null;
    return this.config.overrides.get(engine) ?? null;
  }

  /**
   * The engine owning a file: the first directory after the engines path.
   * Files outside every engine belong to the main application (null).
   */
  engineForFile(filePath: string): EngineName | null {
    const absolute = resolve(this.config.rootDir, filePath).replace(/\\/g, '/');
    const enginesDir = this.enginesDir.replace(/\\/g, '/') + '/';

    let rest: string | null = null;
    if (absolute.startsWith(enginesDir)) {
      rest = absolute.slice(enginesDir.length);
    } else if (!isAbsolute(filePath)) {
      const path = filePath.replace(/\\/g, '/');
      const index = path.lastIndexOf(this.config.enginesPath);
      if (index !== -1) rest = path.slice(index + this.config.enginesPath.length);
    }
    if (rest === null) return null;

    const slash = rest.indexOf('/');
    return slash > 0 ? camelize(rest.slice(0, slash)) : null;
  }

  /** `<engines>/<name>/app/api/<name>/api`, where an engine's public surface lives. */
  engineApiDir(engine: EngineName): string {
    const dir = this.allEngines().get(engine) ?? underscore(engine);
    return join(this.enginesDir, dir, 'app', 'api', dir, 'api');
  }
}
