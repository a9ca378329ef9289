import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { CompletionDatabase } from '../src/completion/database';
import {
  completeCommandNames,
  generateStatic,
  innermostCommandLine,
  nestedCommandLine,
} from '../src/completion/generator';
import { parseCommandLine } from '../src/completion/parser';
import { fuzzyMatcher } from '../src/completion/ranking';
import { parseCommandDefinition } from '../src/completion/schema';
import { bundledDatabase, makeContext, makeTempDir, removeDir, texts, writeTree } from './helpers';

const custom = new CompletionDatabase();
custom.register(
  parseCommandDefinition(
    {
      command: 'deploy',
      arguments: [{ name: 'env', arg_type: { type: 'Choice', data: ['staging', 'production', 'preview'] } }],
    },
    'deploy.json'
  )
);
custom.register(
  parseCommandDefinition({ command: 'showenv', arguments: [{ name: 'name', arg_type: 'Environment' }] }, 'showenv.json')
);
custom.freeze();

describe('generateStatic', () => {
  const db = bundledDatabase();
  let cwd: string;

  beforeEach(() => {
    cwd = makeTempDir('generator');
  });

  afterEach(() => {
    removeDir(cwd);
  });

  it('should complete subcommands by prefix', async () => {
    const candidates = await generateStatic(parseCommandLine('git c', 5, db), makeContext({ cwd }));
    expect(texts(candidates)).toEqual(['commit', 'checkout', 'clone', 'config']);
    expect(candidates[0]).toEqual({
      text: 'commit',
      kind: 'subcommand',
      priority: 100,
      description: 'Record changes to the repository',
    });
  });

  it('should offer options after a lone dash', async () => {
    const candidates = await generateStatic(parseCommandLine('git commit -', 12, db), makeContext({ cwd }));
    expect(texts(candidates)).toContain('-m');
    expect(texts(candidates)).toContain('--message');
  });

  it('should filter long options and skip ones already given', async () => {
    const ctx = makeContext({ cwd });
    expect(texts(await generateStatic(parseCommandLine('git commit --a', 14, db), ctx))).toEqual(['--all', '--amend']);
    expect(texts(await generateStatic(parseCommandLine('git commit --all --a', 20, db), ctx))).toEqual(['--amend']);
  });

  it('should complete typed option values', async () => {
    const passwdFile = path.join(cwd, 'passwd');
    fs.writeFileSync(passwdFile, 'alice:x:1000:1000:Alice:/home/alice:/bin/bash\n');
    const ctx = makeContext({ cwd, roots: { passwdFile, groupFile: '/nonexistent', netClassDir: '/nonexistent' } });
    expect(texts(await generateStatic(parseCommandLine('sudo -u al', 10, db), ctx))).toEqual(['alice']);
  });

  it('should complete typed positional arguments', async () => {
    const groupFile = path.join(cwd, 'group');
    fs.writeFileSync(groupFile, 'wheel:x:10:\nstaff:x:50:\n');
    const ctx = makeContext({ cwd, roots: { passwdFile: '/nonexistent', groupFile, netClassDir: '/nonexistent' } });
    expect(texts(await generateStatic(parseCommandLine('chgrp wh', 8, db), ctx))).toEqual(['wheel']);
  });

  it('should complete choices', async () => {
    const ctx = makeContext({ cwd, database: custom });
    expect(texts(await generateStatic(parseCommandLine('deploy p', 8, custom), ctx))).toEqual(['production', 'preview']);
  });

  it('should complete environment variable names', async () => {
    const ctx = makeContext({ cwd, database: custom, env: { HOME: '/h', HOSTNAME: 'box', PATH: '' } });
    expect(texts(await generateStatic(parseCommandLine('showenv $HO', 11, custom), ctx))).toEqual(['$HOME', '$HOSTNAME']);
  });

  it('should fall back to files for free-form strings', async () => {
    writeTree(cwd, { 'README.md': '' });
    const ctx = makeContext({ cwd });
    expect(texts(await generateStatic(parseCommandLine('git commit -m RE', 16, db), ctx))).toEqual(['README.md']);
  });

  it('should complete files for commands without a schema', async () => {
    writeTree(cwd, { 'notes.txt': '', 'src/': '' });
    const ctx = makeContext({ cwd });
    expect(texts(await generateStatic(parseCommandLine('cat no', 6, db), ctx))).toEqual(['notes.txt']);
  });

  it('should keep the operator on redirection targets', async () => {
    writeTree(cwd, { 'README.md': '' });
    const candidates = await generateStatic(parseCommandLine('echo hi >RE', 11, db), makeContext({ cwd }));
    expect(candidates).toEqual([{ text: '>README.md', kind: 'file', priority: 40 }]);
  });

  it('should find subcommands by subsequence in fuzzy mode', async () => {
    const ctx = makeContext({ cwd, matcher: fuzzyMatcher });
    expect(texts(await generateStatic(parseCommandLine('git cmt', 7, db), ctx))).toEqual(['commit']);
  });
});

describe('command names', () => {
  it('should offer schema commands, then common commands', () => {
    const candidates = completeCommandNames('g', makeContext());
    expect(candidates.map(c => [c.text, c.kind])).toEqual([
      ['git', 'command'],
      ['grep', 'command'],
      ['gzip', 'command'],
    ]);
    expect(candidates[0].description).toBe('Distributed version control system');
  });
});

describe('nested command lines', () => {
  const db = bundledDatabase();

  it('should re-parse the command after sudo', () => {
    const nested = innermostCommandLine(parseCommandLine('sudo git ch', 11, db), db);
    expect(nested.command).toBe('git');
    expect(nested.currentToken).toBe('ch');
    expect(nested.completionContext).toEqual({ type: 'SubCommand' });
  });

  it('should not nest while the wrapped command name is being typed', () => {
    expect(nestedCommandLine(parseCommandLine('sudo gi', 7, db), db)).toBeUndefined();
  });

  it('should complete subcommands of the wrapped command', async () => {
    const parsed = innermostCommandLine(parseCommandLine('sudo git ch', 11, db), db);
    expect(texts(await generateStatic(parsed, makeContext()))).toEqual(['checkout']);
  });
});
