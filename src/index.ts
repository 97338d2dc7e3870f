#!/usr/bin/env node
import { Command } from 'commander';
import { resolve } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { cacheFingerprint, createAnalyzer } from './analyzer.js';
import { ApiMetadataReader } from './api-metadata.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { ResultCache } from './manifest.js';
import { formatOffense } from './messages.js';
import { Pipeline, type PipelineLog } from './pipeline.js';
import { PolicyStore } from './policy.js';
import { Scanner } from './scanner.js';
import type { BoundaryConfig } from './types.js';

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

interface CheckOptions {
  format: string;
  cache: boolean;
  assumeModels?: boolean;
}

const program = new Command();

program
  .name('engine-boundary')
  .description('Flag code that reaches into another engine without going through its API')
  .version('0.1.0')
  .option('-c, --config <path>', 'Configuration file (default: .engine-boundary.yml)')
  .option('--verbose', 'Print diagnostics while running');

function configFromProgram(): BoundaryConfig {
  const { config } = program.opts<GlobalOptions>();
  try {
    return loadConfig(config);
  } catch (err) {
    console.error(chalk.red(errorMessage(err)));
    process.exit(1);
  }
}

program
  .command('check')
  .description('Check files for engine boundary violations')
  .argument('[paths...]', 'Files or directories to check (default: the whole project)')
  .option('--format <format>', 'Output format: text, json', 'text')
  .option('--no-cache', 'Ignore and do not write the result cache')
  .option('--assume-models', 'Treat every constant as a model instead of asking the application')
  .action(async (paths: string[], options: CheckOptions) => {
    if (options.format !== 'text' && options.format !== 'json') {
      console.error(chalk.red(`Unknown format: ${options.format}`));
      process.exit(1);
    }

    const config = configFromProgram();
    const { verbose } = program.opts<GlobalOptions>();
    const rootDir = config.policy.rootDir;
    const spinner = ora({ text: 'Loading engines...', isSilent: options.format === 'json' }).start();

    const diagnose: PipelineLog = (msg) => {
      if (!verbose) return;
      spinner.stop();
      console.error(chalk.dim(msg));
      spinner.start();
    };
    const log: PipelineLog = (msg) => {
      if (msg.startsWith(' ')) diagnose(msg);
      else spinner.text = msg;
    };

    const analyzerOptions = { assumeModels: options.assumeModels, log: diagnose };
    const analyzer = createAnalyzer(config, analyzerOptions);
    const targets = paths.map(path => resolve(path));
    const pipeline = new Pipeline({
      scanner: new Scanner(rootDir, { exclude: config.exclude, targets }),
      analyzer,
      cache: options.cache
        ? new ResultCache(rootDir, analyzer.api.checksum(), cacheFingerprint(config, analyzerOptions))
        : undefined,
      projectPath: rootDir,
      partial: targets.length > 0,
      log,
    });

    try {
      const result = await pipeline.run();
      spinner.stop();

      if (options.format === 'json') {
        console.log(JSON.stringify({ files: result.scan.files.length, offenses: result.offenses }, null, 2));
      } else {
        for (const offense of result.offenses) {
          console.log(formatOffense(offense));
        }
        const files = new Set(result.offenses.map(offense => offense.path)).size;
        const summary = `${result.scan.files.length} files inspected, ${result.offenses.length} offenses in ${files} files`;
        console.log('');
        console.log(result.offenses.length > 0 ? chalk.red(summary) : chalk.green(summary));
      }

      if (result.offenses.length > 0) process.exitCode = 1;
    } catch (err) {
      spinner.fail('Check failed');
      console.error(err);
      process.exit(1);
    }
  });

program
  .command('checksum')
  .description('Print the checksum of every engine API directory')
  .action(() => {
    const config = configFromProgram();
    const api = new ApiMetadataReader(new PolicyStore(config.policy));
    console.log(api.checksum());
  });

program
  .command('engines')
  .description('List engines and how they are protected')
  .action(() => {
    const config = configFromProgram();
    const policy = new PolicyStore(config.policy);
    const api = new ApiMetadataReader(policy);
    const engines = policy.allEngines();

    if (engines.size === 0) {
      console.log(chalk.yellow(`No engines found under ${policy.enginesDir}`));
      return;
    }

    for (const [engine, dir] of engines) {
      const protection = policy.isStronglyProtected(engine)
        ? chalk.red('strongly protected')
        : policy.isProtected(engine)
          ? chalk.yellow('protected')
          : chalk.dim('unprotected');
      const allowlisted = api.allowlist(engine).length;
      const legacy = api.legacyDependents(engine).length;
      console.log(`${chalk.bold(engine)} ${chalk.dim(`(${dir})`)} ${protection}`);
      console.log(chalk.dim(`  ${allowlisted} allow-listed, ${legacy} legacy dependents`));
    }
  });

await program.parseAsync();
