import { describe, it, expect } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { CACHE_DIR, ResultCache } from './manifest.js';
import type { Offense } from './types.js';

const OFFENSE: Offense = {
  path: 'app/services/invoice_mailer.rb',
  line: 3,
  column: 5,
  length: 7,
  message: 'Direct access of Billing engine. Only access engine via Billing::Api.',
  engine: 'Billing',
};

function tmpProject(): string {
  return mkdtempSync(join(tmpdir(), 'engine-boundary-cache-'));
}

describe('ResultCache', () => {
  it('starts empty on a fresh project', () => {
    const cache = new ResultCache(tmpProject(), '100', 'abc');

    expect(cache.load()).toBe(false);
    expect(cache.lookup(OFFENSE.path, 'h1')).toBeNull();
  });

  it('saves and reloads offenses per file', () => {
    const tmp = tmpProject();
    const cache = new ResultCache(tmp, '100', 'abc');
    cache.store(OFFENSE.path, 'h1', [OFFENSE]);
    cache.store('app/models/customer.rb', 'h2', []);
    cache.save();

    const loaded = new ResultCache(tmp, '100', 'abc');
    expect(loaded.load()).toBe(true);
    expect(loaded.lookup(OFFENSE.path, 'h1')).toEqual([OFFENSE]);
    expect(loaded.lookup('app/models/customer.rb', 'h2')).toEqual([]);
  });

  it('misses when the file content changed', () => {
    const tmp = tmpProject();
    const cache = new ResultCache(tmp, '100', 'abc');
    cache.store(OFFENSE.path, 'h1', [OFFENSE]);
    cache.save();

    const loaded = new ResultCache(tmp, '100', 'abc');
    loaded.load();
    expect(loaded.lookup(OFFENSE.path, 'h2')).toBeNull();
  });

  it('is dropped when the API checksum or the configuration changes', () => {
    const tmp = tmpProject();
    const cache = new ResultCache(tmp, '100', 'abc');
    cache.store(OFFENSE.path, 'h1', [OFFENSE]);
    cache.save();

    const newChecksum = new ResultCache(tmp, '101', 'abc');
    expect(newChecksum.load()).toBe(false);
    expect(newChecksum.lookup(OFFENSE.path, 'h1')).toBeNull();

    expect(new ResultCache(tmp, '100', 'def').load()).toBe(false);
  });

  it('ignores a corrupt cache file', () => {
    const tmp = tmpProject();
    mkdirSync(join(tmp, CACHE_DIR));
    writeFileSync(join(tmp, CACHE_DIR, 'cache.json'), '{"version": 1, "files": ');

    expect(new ResultCache(tmp, '100', 'abc').load()).toBe(false);
  });

  it('prunes files not seen in this run unless told not to', () => {
    const tmp = tmpProject();
    const first = new ResultCache(tmp, '100', 'abc');
    first.store('a.rb', 'h1', []);
    first.store('b.rb', 'h2', []);
    first.save();

    const partial = new ResultCache(tmp, '100', 'abc');
    partial.load();
    partial.lookup('a.rb', 'h1');
    partial.save(false);
    expect(cachedFiles(tmp)).toEqual(['a.rb', 'b.rb']);

    const full = new ResultCache(tmp, '100', 'abc');
    full.load();
    full.lookup('a.rb', 'h1');
    full.save();
    expect(cachedFiles(tmp)).toEqual(['a.rb']);
  });

  it('hashes content to a short stable digest', () => {
    const hash = ResultCache.hashFile('Billing::Invoice.last\n');

    expect(hash).toHaveLength(16);
    expect(hash).toBe(ResultCache.hashFile('Billing::Invoice.last\n'));
    expect(hash).not.toBe(ResultCache.hashFile('Billing::Invoice.first\n'));
  });
});

function cachedFiles(tmp: string): string[] {
  const saved: unknown = JSON.parse(readFileSync(join(tmp, CACHE_DIR, 'cache.json'), 'utf-8'));
  if (typeof saved !== 'object' || saved === null || !('files' in saved)) return [];
  const files = saved.files;
  return typeof files === 'object' && files !== null ? Object.keys(files) : [];
}
