/**
 * @fileoverview Executable search over PATH.
 *
 * @module completion/executables
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CompletionCandidate, TokenMatcher } from './types';
import type { TtlCache } from './cache';
import { createCandidate, PRIORITY } from './candidate';
import { readDirectory } from './filesystem';
import { contractHome, searchPath } from '../utils/environment';

export interface ExecutableSearchOptions {
  env?: NodeJS.ProcessEnv;
  /** Executable names per directory */
  cache?: TtlCache<string[]>;
  matcher?: TokenMatcher;
}

/**
 * Check whether a path is a regular file (or a link to one) the current
 * user may execute.
 */
export function isExecutableFile(file: string): boolean {
  try {
    if (!fs.statSync(file).isFile()) {
      return false;
    }
    fs.accessSync(file, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Names of the executable entries of one directory, sorted.
 */
export function listExecutables(dir: string): string[] {
  return readDirectory(dir)
    .filter(entry => !entry.isDirectory && isExecutableFile(path.join(dir, entry.name)))
    .map(entry => entry.name);
}

/**
 * Find executables on PATH whose name matches a prefix.
 *
 * Directories are searched in PATH order and a name is reported once, for
 * the first directory that provides it. The description is that directory.
 * With a cache, each directory is listed and checked once per lifetime.
 *
 * @example
 * findExecutables('gi', { env: { PATH: '/usr/bin:/bin' } });
 * // [{ text: 'git', kind: 'executable', description: '/usr/bin', priority: 55 }]
 */
export function findExecutables(prefix: string, options: ExecutableSearchOptions = {}): CompletionCandidate[] {
  const matcher = options.matcher ?? ((text: string, token: string) => text.startsWith(token));
  const seen = new Set<string>();
  const candidates: CompletionCandidate[] = [];

  for (const dir of searchPath(options.env)) {
    const names = options.cache
      ? options.cache.getOrLoad(dir, () => listExecutables(dir))
      : listExecutables(dir);
    for (const name of names) {
      if (seen.has(name) || !matcher(name, prefix)) {
        continue;
      }
      seen.add(name);
      candidates.push(createCandidate(name, 'executable', PRIORITY.executable, contractHome(dir, options.env)));
    }
  }
  return candidates;
}
