import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { createHash } from 'crypto';
import { z } from 'zod';
import type { Offense } from './types.js';

export const CACHE_DIR = '.engine-boundary';

const OffenseSchema = z.object({
  path: z.string(),
  line: z.number().int(),
  column: z.number().int(),
  length: z.number().int(),
  message: z.string(),
  engine: z.string(),
});

const CacheDataSchema = z.object({
  version: z.literal(1),
  checksum: z.string(),
  fingerprint: z.string(),
  files: z.record(
    z.object({
      hash: z.string(),
      offenses: z.array(OffenseSchema),
    }),
  ),
});

type CacheData = z.infer<typeof CacheDataSchema>;

/**
 * Offenses per file from the previous run. A file's entry is reused while its
 * content hash matches; the whole cache is dropped when the API checksum or
 * the configuration fingerprint changes.
 */
export class ResultCache {
  private data: CacheData;
  private cachePath: string;
  private seen = new Set<string>();

  constructor(
    private projectPath: string,
    private checksum: string,
    private fingerprint: string,
  ) {
    this.cachePath = join(projectPath, CACHE_DIR, 'cache.json');
    this.data = this.empty();
  }

  /** Returns false when there was no usable cache on disk. */
  load(): boolean {
    if (!existsSync(this.cachePath)) return false;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.cachePath, 'utf-8'));
    } catch {
      return false;
    }

    const parsed = CacheDataSchema.safeParse(raw);
    if (!parsed.success) return false;
    if (parsed.data.checksum !== this.checksum || parsed.data.fingerprint !== this.fingerprint) return false;

    this.data = parsed.data;
    return true;
  }

  /** With `prune`, entries for files not looked up or stored in this run are dropped. */
  save(prune = true): void {
    if (prune) {
      for (const path of Object.keys(this.data.files)) {
        if (!this.seen.has(path)) delete this.data.files[path];
      }
    }
    const dir = join(this.projectPath, CACHE_DIR);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    writeFileSync(this.cachePath, JSON.stringify(this.data, null, 2));
  }

  lookup(filePath: string, hash: string): Offense[] | null {
    this.seen.add(filePath);
    const entry = this.data.files[filePath];
    return entry && entry.hash === hash ? entry.offenses : null;
  }

  store(filePath: string, hash: string, offenses: Offense[]): void {
    this.seen.add(filePath);
    this.data.files[filePath] = { hash, offenses };
  }

  private empty(): CacheData {
    return { version: 1, checksum: this.checksum, fingerprint: this.fingerprint, files: {} };
  }

  static hashFile(content: string): string {
    return createHash('sha256').update(content).digest('hex').slice(0, 16);
  }
}
