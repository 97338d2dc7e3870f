import { readFileSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { createHash } from 'crypto';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { camelize } from './inflector.js';
import type { BoundaryConfig, EngineName, PolicyConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = '.engine-boundary.yml';

const nameList = z
  .array(z.string().min(1))
  .nullish()
  .transform(names => names ?? []);

const OverrideSchema = z.object({
  Engine: z.string().min(1),
  AllowedModules: nameList,
});

export const SettingsSchema = z.object({
  EnginesPath: z.string().min(1),
  UnprotectedEngines: nameList,
  StronglyProtectedEngines: nameList,
  EngineSpecificOverrides: z
    .array(OverrideSchema)
    .nullish()
    .transform(overrides => overrides ?? []),
  Exclude: nameList,
  ModelOracle: z
    .object({
      Enabled: z.boolean().default(true),
      Command: z.array(z.string().min(1)).min(1).default(['bin/rails', 'runner']),
      TimeoutMs: z.number().int().positive().default(60_000),
      BaseType: z.string().min(1).default('ActiveRecord::Base'),
    })
    .default({}),
  FactoryUsage: z
    .object({
      Enabled: z.boolean().default(false),
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

export function loadConfig(configPath?: string, cwd: string = process.cwd()): BoundaryConfig {
  const path = resolve(cwd, configPath || process.env.ENGINE_BOUNDARY_CONFIG || DEFAULT_CONFIG_FILE);
  if (!existsSync(path)) {
    throw new ConfigError(`Configuration file not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not parse ${path}: ${errorMessage(err)}`, err);
  }

  return parseSettings(raw ?? {}, dirname(path), path);
}

export function parseSettings(raw: unknown, rootDir: string, configPath = ''): BoundaryConfig {
  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration${configPath ? ` in ${configPath}` : ''}: ${issues}`);
  }

  const settings = parsed.data;
  return {
    configPath,
    policy: buildPolicyConfig(settings, rootDir),
    exclude: settings.Exclude,
    modelOracle: {
      enabled: settings.ModelOracle.Enabled,
      command: settings.ModelOracle.Command,
      timeoutMs: settings.ModelOracle.TimeoutMs,
      baseType: settings.ModelOracle.BaseType,
    },
    factoryUsage: { enabled: settings.FactoryUsage.Enabled },
    fingerprint: createHash('sha256').update(JSON.stringify(settings)).digest('hex').slice(0, 16),
  };
}

export function normalizeEnginesPath(enginesPath: string): string {
  let path = enginesPath.replace(/\\/g, '/').replace(/^\.\//, '');
  if (!path.endsWith('/')) path += '/';
  return path;
}

function buildPolicyConfig(settings: Settings, rootDir: string): PolicyConfig {
  const overrides = new Map<EngineName, Set<string>>();
  for (const override of settings.EngineSpecificOverrides) {
    const engine = camelize(override.Engine);
    const allowed = overrides.get(engine) ?? new Set<string>();
    for (const name of override.AllowedModules) allowed.add(name);
    overrides.set(engine, allowed);
  }

  return {
    rootDir,
    enginesPath: normalizeEnginesPath(settings.EnginesPath),
    unprotectedEngines: new Set(settings.UnprotectedEngines.map(camelize)),
    stronglyProtectedEngines: new Set(settings.StronglyProtectedEngines.map(camelize)),
    overrides,
  };
}
