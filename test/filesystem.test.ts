import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { TtlCache, type DirectoryListing } from '../src/completion/cache';
import {
  completePathPrefix,
  completePaths,
  readDirectory,
  splitPathToken,
} from '../src/completion/filesystem';
import { makeTempDir, removeDir, texts, writeTree } from './helpers';

describe('splitPathToken', () => {
  it('should split the directory part from the name prefix', () => {
    expect(splitPathToken('src/co')).toEqual({ quote: '', directory: 'src/', prefix: 'co' });
    expect(splitPathToken('"My Doc')).toEqual({ quote: '"', directory: '', prefix: 'My Doc' });
    expect(splitPathToken('/')).toEqual({ quote: '', directory: '/', prefix: '' });
  });
});

describe('completePaths', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('paths');
    writeTree(dir, {
      'src/index.ts': '',
      'My Docs/': '',
      'README.md': '',
      'run.sh': '',
      '.hidden': '',
    });
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should list visible entries with directories marked', () => {
    const candidates = completePaths('', { cwd: dir });
    expect(candidates.map(c => [c.text, c.kind])).toEqual([
      ['My Docs/', 'directory'],
      ['README.md', 'file'],
      ['run.sh', 'file'],
      ['src/', 'directory'],
    ]);
  });

  it('should offer dot entries only for a dot prefix', () => {
    expect(texts(completePaths('.h', { cwd: dir }))).toEqual(['.hidden']);
  });

  it('should give directories and files their priorities', () => {
    expect(completePaths('sr', { cwd: dir })).toEqual([{ text: 'src/', kind: 'directory', priority: 50 }]);
    expect(completePaths('REA', { cwd: dir })).toEqual([{ text: 'README.md', kind: 'file', priority: 40 }]);
  });

  it('should keep the typed directory and quote in the candidate', () => {
    expect(texts(completePaths('src/', { cwd: dir }))).toEqual(['src/index.ts']);
    expect(texts(completePaths('"My', { cwd: dir }))).toEqual(['"My Docs/']);
  });

  it('should filter files by extension and keep directories', () => {
    expect(texts(completePaths('', { cwd: dir, extensions: ['.md'] }))).toEqual(['My Docs/', 'README.md', 'src/']);
  });

  it('should offer only directories when asked', () => {
    expect(texts(completePaths('', { cwd: dir, directoriesOnly: true }))).toEqual(['My Docs/', 'src/']);
  });

  it('should expand the home directory but keep the tilde', () => {
    expect(texts(completePaths('~', { cwd: '/', env: { HOME: dir } }))).toEqual(['~/']);
    expect(texts(completePaths('~/s', { cwd: '/', env: { HOME: dir } }))).toEqual(['~/src/']);
  });

  it('should return nothing for a missing directory', () => {
    expect(completePaths('nope/', { cwd: dir })).toEqual([]);
  });

  it('should serve a second listing from the cache', () => {
    const cache = new TtlCache<DirectoryListing>(60_000);
    completePaths('', { cwd: dir, cache });
    fs.writeFileSync(path.join(dir, 'zeta.txt'), '');
    expect(texts(completePaths('z', { cwd: dir, cache }))).toEqual([]);
    expect(texts(completePaths('z', { cwd: dir }))).toEqual(['zeta.txt']);
  });

  it('should classify a dangling link as a file', () => {
    fs.symlinkSync(path.join(dir, 'missing'), path.join(dir, 'dangling'));
    expect(readDirectory(dir).find(entry => entry.name === 'dangling')).toEqual({
      name: 'dangling',
      isDirectory: false,
    });
  });
});

describe('completePathPrefix', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('prefix');
    writeTree(dir, { 'README.md': '', 'src/': '' });
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should complete to the first match', () => {
    expect(completePathPrefix('READ', dir)).toBe('README.md');
    expect(completePathPrefix('s', dir)).toBe('src/');
  });

  it('should return null when there is nothing to complete', () => {
    expect(completePathPrefix('', dir)).toBeNull();
    expect(completePathPrefix('src/', dir)).toBeNull();
    expect(completePathPrefix('zzz', dir)).toBeNull();
  });
});
