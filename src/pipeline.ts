import { readFileSync } from 'fs';
import { join } from 'path';
import type { BoundaryAnalyzer } from './analyzer.js';
import { errorMessage } from './errors.js';
import { ResultCache } from './manifest.js';
import type { Scanner, ScanResult } from './scanner.js';
import type { Offense } from './types.js';

export type PipelineLog = (message: string) => void;

interface PipelineComponents {
  scanner: Pick<Scanner, 'scan'>;
  analyzer: Pick<BoundaryAnalyzer, 'analyzeSource'>;
  /** Omit to analyze every file from scratch and leave no cache behind. */
  cache?: ResultCache;
  projectPath: string;
  /** The scan covers only part of the tree; cached entries for other files are kept. */
  partial?: boolean;
  log?: PipelineLog;
}

export interface PipelineResult {
  scan: ScanResult;
  offenses: Offense[];
  filesAnalyzed: number;
  filesReused: number;
  filesSkipped: number;
}

export class Pipeline {
  constructor(private components: PipelineComponents) {}

  async run(): Promise<PipelineResult> {
    const { scanner, analyzer, cache, projectPath } = this.components;
    const log = this.components.log ?? (() => {});

    log('Scanning for Ruby files...');
    const scan = await scanner.scan();
    log(`  Found ${scan.files.length} files in ${scan.directories} directories`);

    if (cache) {
      const loaded = cache.load();
      log(loaded ? '  Reusing results from the previous run' : '  No reusable results, analyzing everything');
    }

    log('Checking engine boundaries...');
    const offenses: Offense[] = [];
    let analyzed = 0;
    let reused = 0;
    let skipped = 0;

    for (const file of scan.files) {
      let content: string;
      try {
        content = readFileSync(join(projectPath, file), 'utf-8');
      } catch (err) {
        log(`  Skipping ${file}: ${errorMessage(err)}`);
        skipped++;
        continue;
      }

      const hash = ResultCache.hashFile(content);
      const previous = cache?.lookup(file, hash) ?? null;
      if (previous) {
        offenses.push(...previous);
        reused++;
        continue;
      }

      const found = analyzer.analyzeSource(file, content);
      cache?.store(file, hash, found);
      offenses.push(...found);
      analyzed++;
      if (analyzed % 100 === 0) {
        log(`  Analyzed ${analyzed}/${scan.files.length} files`);
      }
    }
    log(`  ${analyzed} analyzed, ${reused} reused, ${skipped} skipped`);

    if (cache) {
      cache.save(!this.components.partial);
      log('  Cache saved.');
    }

    return {
      scan,
      offenses,
      filesAnalyzed: analyzed,
      filesReused: reused,
      filesSkipped: skipped,
    };
  }
}
