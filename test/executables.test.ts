import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { TtlCache } from '../src/completion/cache';
import { findExecutables, isExecutableFile, listExecutables } from '../src/completion/executables';
import { makeTempDir, removeDir, writeTree } from './helpers';

describe('findExecutables', () => {
  let first: string;
  let second: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(() => {
    first = makeTempDir('bin-first');
    second = makeTempDir('bin-second');
    writeTree(first, { 'tool-a': '#!/bin/sh\n', 'tool-b': 'data', 'tool-dir/': '' });
    writeTree(second, { 'tool-a': '#!/bin/sh\n', 'tool-c': '#!/bin/sh\n' });
    fs.chmodSync(path.join(first, 'tool-a'), 0o755);
    fs.chmodSync(path.join(first, 'tool-b'), 0o644);
    fs.chmodSync(path.join(second, 'tool-a'), 0o755);
    fs.chmodSync(path.join(second, 'tool-c'), 0o755);
    env = { PATH: [first, second].join(path.delimiter), HOME: '/nonexistent-home' };
  });

  afterEach(() => {
    removeDir(first);
    removeDir(second);
  });

  it('should report each executable once, from the first PATH entry', () => {
    expect(findExecutables('tool', { env })).toEqual([
      { text: 'tool-a', kind: 'executable', priority: 55, description: first },
      { text: 'tool-c', kind: 'executable', priority: 55, description: second },
    ]);
  });

  it('should filter by prefix', () => {
    expect(findExecutables('tool-c', { env }).map(c => c.text)).toEqual(['tool-c']);
  });

  it('should skip files without an execute bit and directories', () => {
    expect(isExecutableFile(path.join(first, 'tool-b'))).toBe(false);
    expect(isExecutableFile(path.join(first, 'tool-dir'))).toBe(false);
    expect(isExecutableFile(path.join(first, 'tool-a'))).toBe(true);
  });

  it('should list only executable entries of a directory', () => {
    expect(listExecutables(first)).toEqual(['tool-a']);
  });

  it('should reuse cached executable names within the time to live', () => {
    let now = 0;
    const cache = new TtlCache<string[]>(1000, () => now);
    expect(findExecutables('tool-c', { env, cache }).map(c => c.text)).toEqual(['tool-c']);

    fs.rmSync(path.join(second, 'tool-c'));
    now = 500;
    expect(findExecutables('tool-c', { env, cache }).map(c => c.text)).toEqual(['tool-c']);
    expect(cache.get(second)).toEqual(['tool-a', 'tool-c']);

    now = 5000;
    expect(findExecutables('tool-c', { env, cache })).toEqual([]);
  });

  it('should find nothing with an empty PATH', () => {
    expect(findExecutables('', { env: { PATH: '' } })).toEqual([]);
  });
});
