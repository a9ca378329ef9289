/**
 * @fileoverview Shared fixtures for the completion tests.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { CompletionCaches } from '../src/completion/cache';
import type { GeneratorContext } from '../src/completion/context';
import type { CompletionDatabase } from '../src/completion/database';
import { CommandRunnerError, type CommandRunner, type RunOptions } from '../src/completion/dynamic/runner';
import { loadCompletionDatabase } from '../src/completion/loader';
import { prefixMatcher } from '../src/completion/ranking';
import { DEFAULT_CONFIG } from '../src/config';

export function makeTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `shellcomp-${label}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Write files relative to `root`; names ending in `/` become directories */
export function writeTree(root: string, entries: Record<string, string>): void {
  for (const [name, content] of Object.entries(entries)) {
    const target = path.join(root, name);
    if (name.endsWith('/')) {
      fs.mkdirSync(target, { recursive: true });
      continue;
    }
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

export interface RecordedRun {
  program: string;
  args: string[];
  options: RunOptions;
}

/**
 * Runner answering from a table keyed by the full command line
 * (`git branch --list fe*`). Unknown commands fail as if not installed.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedRun[] = [];

  constructor(private responses: Record<string, string | Error> = {}) {}

  async run(program: string, args: readonly string[], options: RunOptions = {}): Promise<string> {
    this.calls.push({ program, args: [...args], options });
    const response = this.responses[[program, ...args].join(' ')];
    if (response === undefined) {
      throw new CommandRunnerError(program, 'command not found', 127);
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }
}

/** Runner whose commands never finish until the request is aborted */
export class HangingRunner implements CommandRunner {
  run(_program: string, _args: readonly string[], options: RunOptions = {}): Promise<string> {
    return new Promise((_resolve, reject) => {
      options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  }
}

let bundled: CompletionDatabase | null = null;

/** Database holding only the bundled definitions */
export function bundledDatabase(): CompletionDatabase {
  if (!bundled) {
    bundled = loadCompletionDatabase({ searchDirs: [] }).database;
  }
  return bundled;
}

export function makeContext(overrides: Partial<GeneratorContext> = {}): GeneratorContext {
  return {
    database: bundledDatabase(),
    caches: new CompletionCaches(),
    runner: new FakeRunner(),
    config: { ...DEFAULT_CONFIG, cacheTtl: { ...DEFAULT_CONFIG.cacheTtl } },
    roots: {
      passwdFile: '/nonexistent/passwd',
      groupFile: '/nonexistent/group',
      netClassDir: '/nonexistent/net',
    },
    cwd: os.tmpdir(),
    env: { PATH: '', HOME: '/nonexistent-home' },
    matcher: prefixMatcher,
    ...overrides,
  };
}

export const texts = (candidates: ReadonlyArray<{ text: string }>): string[] => candidates.map(c => c.text);
