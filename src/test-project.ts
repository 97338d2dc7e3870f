import { mkdtempSync, mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import type { PolicyConfig } from './types.js';

// Shared fixtures for tests: a throwaway Rails-style tree under the OS temp dir.

export function createProject(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), 'engine-boundary-'));
  writeProjectFiles(root, files);
  return root;
}

export function writeProjectFiles(root: string, files: Record<string, string>): void {
  for (const [path, content] of Object.entries(files)) {
    const absPath = join(root, path);
    mkdirSync(dirname(absPath), { recursive: true });
    writeFileSync(absPath, content);
  }
}

export function policyConfig(rootDir: string, overrides: Partial<PolicyConfig> = {}): PolicyConfig {
  return {
    rootDir,
    enginesPath: 'engines/',
    unprotectedEngines: new Set(),
    stronglyProtectedEngines: new Set(),
    overrides: new Map(),
    ...overrides,
  };
}

export function apiDir(engineDir: string): string {
  return `engines/${engineDir}/app/api/${engineDir}/api`;
}

export function allowlistSource(engine: string, entries: string[], moduleName = 'Allowlist'): string {
  return [
    `module ${engine}::Api::${moduleName}`,
    '  PUBLIC_MODULES = [',
    ...entries.map(entry => `    ${entry},`),
    '  ]',
    'end',
    '',
  ].join('\n');
}

export function legacyDependentsSource(engine: string, paths: string[]): string {
  return [
    `module ${engine}::Api::LegacyDependents`,
    '  FILES_WITH_DIRECT_ACCESS = [',
    ...paths.map(path => `    "${path}",`),
    '  ]',
    'end',
    '',
  ].join('\n');
}
