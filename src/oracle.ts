import { execaSync } from 'execa';
import { errorMessage } from './errors.js';
import type { PipelineLog } from './pipeline.js';
import type { ModelOracleConfig } from './types.js';

/** Answers whether a constant names a persistence-backed model. */
export interface ModelOracle {
  isPersistenceModel(name: string): boolean;
}

export interface CommandResult {
  stdout: string;
  exitCode?: number;
  timedOut: boolean;
  failed: boolean;
}

export type CommandRunner = (file: string, args: string[], options: { cwd: string; timeout: number }) => CommandResult;

const runWithExeca: CommandRunner = (file, args, options) =>
  execaSync(file, args, { cwd: options.cwd, timeout: options.timeout, reject: false });

const CONSTANT_PATH = /^(?:::)?[A-Z]\w*(?:::[A-Z]\w*)*$/;

export interface RailsRunnerOracleOptions extends Omit<ModelOracleConfig, 'enabled'> {
  cwd: string;
  log?: PipelineLog;
  run?: CommandRunner;
}

/**
 * Boots the application through `rails runner` and inspects the ancestors of
 * the constant. Anything that goes wrong counts as "not a model".
 */
export class RailsRunnerOracle implements ModelOracle {
  private run: CommandRunner;
  private log: PipelineLog;

  constructor(private options: RailsRunnerOracleOptions) {
    this.run = options.run ?? runWithExeca;
    this.log = options.log ?? (() => {});
  }

  isPersistenceModel(name: string): boolean {
    if (!CONSTANT_PATH.test(name)) {
      this.log(`oracle: ${name} is not a constant path`);
      return false;
    }

    const [file, ...args] = this.options.command;
    let result: CommandResult;
    try {
      result = this.run(file, [...args, `puts ${name}.ancestors`], {
        cwd: this.options.cwd,
        timeout: this.options.timeoutMs,
      });
    } catch (err) {
      this.log(`oracle: could not run ${file} for ${name}: ${errorMessage(err)}`);
      return false;
    }

    if (result.timedOut) {
      this.log(`oracle: timed out after ${this.options.timeoutMs}ms resolving ${name}`);
      return false;
    }
    if (result.failed) {
      this.log(`oracle: ${file} exited with ${result.exitCode ?? 'no code'} resolving ${name}`);
      return false;
    }
    return result.stdout.split(/\s+/).includes(this.options.baseType);
  }
}

export class MemoizedOracle implements ModelOracle {
  private answers = new Map<string, boolean>();

  constructor(private inner: ModelOracle) {}

  isPersistenceModel(name: string): boolean {
    const cached = this.answers.get(name);
    if (cached !== undefined) return cached;
    const answer = this.inner.isPersistenceModel(name);
    this.answers.set(name, answer);
    return answer;
  }
}

/** Fixed answers: `true`/`false` for every name, or the set of names that are models. */
export class StaticModelOracle implements ModelOracle {
  private models: Set<string> | null;

  constructor(private answer: boolean | Iterable<string>) {
    this.models = typeof answer === 'boolean' ? null : new Set(answer);
  }

  isPersistenceModel(name: string): boolean {
    if (this.models) return this.models.has(name.replace(/^:+/, ''));
    return this.answer === true;
  }
}

export function createModelOracle(config: ModelOracleConfig, cwd: string, log?: PipelineLog): ModelOracle {
  if (!config.enabled) return new StaticModelOracle(true);
  return new MemoizedOracle(new RailsRunnerOracle({ ...config, cwd, log }));
}
