import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { completionSearchDirs, DEFAULT_CONFIG, getConfigDir, loadConfig } from '../src/config';
import { makeTempDir, removeDir } from './helpers';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('config');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  it('should use the defaults without a config file', () => {
    expect(loadConfig({ SHELLCOMP_CONFIG_DIR: dir })).toEqual(DEFAULT_CONFIG);
  });

  it('should overlay config.json on the defaults', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ maxResults: 12, cacheTtl: { paths: 100 } }));
    const config = loadConfig({ SHELLCOMP_CONFIG_DIR: dir });
    expect(config.maxResults).toBe(12);
    expect(config.cacheTtl).toEqual({ ...DEFAULT_CONFIG.cacheTtl, paths: 100 });
  });

  it('should read config.yaml', () => {
    fs.writeFileSync(path.join(dir, 'config.yaml'), 'fuzzy: true\nsubprocessTimeoutMs: 800\n');
    const config = loadConfig({ SHELLCOMP_CONFIG_DIR: dir });
    expect(config.fuzzy).toBe(true);
    expect(config.subprocessTimeoutMs).toBe(800);
  });

  it('should let environment variables win over the file', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ maxResults: 12, fuzzy: true }));
    const config = loadConfig({
      SHELLCOMP_CONFIG_DIR: dir,
      SHELLCOMP_MAX_RESULTS: '5',
      SHELLCOMP_FUZZY: 'off',
      SHELLCOMP_TIMEOUT_MS: '250',
    });
    expect(config.maxResults).toBe(5);
    expect(config.fuzzy).toBe(false);
    expect(config.subprocessTimeoutMs).toBe(250);
  });

  it('should warn about and ignore invalid environment values', () => {
    const config = loadConfig({ SHELLCOMP_CONFIG_DIR: dir, SHELLCOMP_MAX_RESULTS: 'abc' });
    expect(config.maxResults).toBe(DEFAULT_CONFIG.maxResults);
    expect(console.warn).toHaveBeenCalledWith('[shellcomp] Ignoring SHELLCOMP_MAX_RESULTS=abc: expected a positive integer');
  });

  it('should fall back to the defaults for an invalid config file', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ maxResults: -1 }));
    expect(loadConfig({ SHELLCOMP_CONFIG_DIR: dir }).maxResults).toBe(DEFAULT_CONFIG.maxResults);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should locate the config directory', () => {
    expect(getConfigDir({ SHELLCOMP_CONFIG_DIR: '/cfg' })).toBe('/cfg');
  });

  it('should search the config, home and working directories', () => {
    expect(completionSearchDirs({ SHELLCOMP_CONFIG_DIR: '/cfg', HOME: '/home/u' }, '/work')).toEqual([
      path.join('/cfg', 'completions'),
      path.join('/home/u', '.config', 'shellcomp', 'completions'),
      path.resolve('/work', 'completions'),
    ]);
  });
});
