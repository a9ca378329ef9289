import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'node:path';
import {
  decodeDefinition,
  listDefinitionFiles,
  loadCompletionDatabase,
} from '../src/completion/loader';
import { SchemaError } from '../src/completion/schema';
import { makeTempDir, removeDir, writeTree } from './helpers';

const BUNDLED_COMMANDS = [
  'cargo', 'cd', 'chgrp', 'chown', 'docker', 'git', 'ip', 'kill',
  'ls', 'make', 'npm', 'ssh', 'sudo', 'systemctl', 'tar',
];

describe('loadCompletionDatabase', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('loader');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  it('should load every bundled definition', () => {
    const report = loadCompletionDatabase({ searchDirs: [] });
    expect(report.database.names()).toEqual(BUNDLED_COMMANDS);
    expect(report.skipped).toEqual([]);
    expect(report.loaded).toContain('bundled:git.json');
    expect(report.database.isFrozen).toBe(true);
  });

  it('should load YAML definitions and skip broken files', () => {
    writeTree(dir, {
      'tool.yaml': 'command: tool\nsubcommands:\n  - name: run\n',
      'broken.json': '{ "command": ',
      'bad.json': JSON.stringify({ command: 'bad', global_options: [{ short: '--x' }] }),
      'notes.txt': 'ignored',
    });

    const report = loadCompletionDatabase({ includeBundled: false, searchDirs: [dir] });

    expect(report.database.names()).toEqual(['tool']);
    expect(report.database.get('tool')?.subcommands.map(sub => sub.name)).toEqual(['run']);
    expect(report.loaded).toEqual([path.join(dir, 'tool.yaml')]);
    expect(report.skipped.map(entry => entry.source)).toEqual([
      path.join(dir, 'bad.json'),
      path.join(dir, 'broken.json'),
    ]);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('should keep the bundled definition when a user file names the same command', () => {
    writeTree(dir, { 'git.json': JSON.stringify({ command: 'git', description: 'mine' }) });

    const report = loadCompletionDatabase({ searchDirs: [dir] });

    expect(report.shadowed).toEqual([path.join(dir, 'git.json')]);
    expect(report.database.get('git')?.description).toBe('Distributed version control system');
  });

  it('should prefer earlier search directories', () => {
    const second = makeTempDir('loader-second');
    try {
      writeTree(dir, { 'tool.json': JSON.stringify({ command: 'tool', description: 'first' }) });
      writeTree(second, { 'tool.json': JSON.stringify({ command: 'tool', description: 'second' }) });

      const report = loadCompletionDatabase({ includeBundled: false, searchDirs: [dir, second] });

      expect(report.database.get('tool')?.description).toBe('first');
    } finally {
      removeDir(second);
    }
  });

  it('should register extra in-memory definitions after the bundled ones', () => {
    const report = loadCompletionDatabase({
      searchDirs: [],
      definitions: [{ source: 'inline', document: { command: 'deploy' } }],
    });
    expect(report.database.has('deploy')).toBe(true);
    expect(report.loaded[report.loaded.length - 1]).toBe('inline');
  });
});

describe('definition files', () => {
  it('should treat a missing directory as empty', () => {
    expect(listDefinitionFiles('/nonexistent/shellcomp/completions')).toEqual([]);
  });

  it('should decode YAML by extension', () => {
    expect(decodeDefinition('command: tool\n', 'tool.yml')).toEqual({ command: 'tool' });
  });

  it('should report undecodable JSON as a schema error', () => {
    expect(() => decodeDefinition('{', 'tool.json')).toThrow(SchemaError);
  });
});
