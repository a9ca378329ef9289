/**
 * @fileoverview File and directory completion.
 *
 * A path token is split into the directory part the user typed and the name
 * prefix being completed. The directory part is kept verbatim in every
 * candidate (so `~/` stays `~/`), while the listing is read from the resolved
 * directory. Listings are cached per absolute directory.
 *
 * @module completion/filesystem
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CompletionCandidate, TokenMatcher } from './types';
import type { DirectoryListing, TtlCache } from './cache';
import { directoryCandidate, fileCandidate } from './candidate';
import { expandHome } from '../utils/environment';
import { warn } from '../utils/log';

export interface PathCompletionOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  /** Listing cache; when omitted every call reads the directory */
  cache?: TtlCache<DirectoryListing>;
  matcher?: TokenMatcher;
  /** Offer directories only */
  directoriesOnly?: boolean;
  /** Keep only files with one of these extensions (directories always kept) */
  extensions?: readonly string[];
}

/** A path token split into its parts */
export interface PathToken {
  /** Leading quote character, if the token opens a quoted string */
  quote: string;
  /** Directory part as typed, including its trailing separator */
  directory: string;
  /** Name prefix being completed */
  prefix: string;
}

const prefixMatcher: TokenMatcher = (text, token) => text.startsWith(token);

/**
 * Split a path token into quote, directory part and name prefix.
 *
 * @example
 * splitPathToken('src/co'); // { quote: '', directory: 'src/', prefix: 'co' }
 * splitPathToken('"My Doc'); // { quote: '"', directory: '', prefix: 'My Doc' }
 */
export function splitPathToken(token: string): PathToken {
  let quote = '';
  let rest = token;
  if (rest.startsWith('"') || rest.startsWith("'")) {
    quote = rest[0];
    rest = rest.slice(1);
  }
  const slash = rest.lastIndexOf('/');
  if (slash === -1) {
    return { quote, directory: '', prefix: rest };
  }
  return { quote, directory: rest.slice(0, slash + 1), prefix: rest.slice(slash + 1) };
}

function isMissingError(error: unknown): boolean {
  return error instanceof Error && 'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR' || error.code === 'EACCES');
}

/**
 * Read a directory into name/isDirectory pairs, sorted by name.
 * Symbolic links are classified by their target. A missing or unreadable
 * directory yields an empty listing.
 */
export function readDirectory(dir: string): DirectoryListing {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    if (!isMissingError(error)) {
      warn(`Failed to list ${dir}`, error);
    }
    return [];
  }

  const listing: DirectoryListing = entries.map(entry => {
    let isDirectory = entry.isDirectory();
    if (entry.isSymbolicLink()) {
      try {
        isDirectory = fs.statSync(path.join(dir, entry.name)).isDirectory();
      } catch {
        // Dangling link: offer it as a plain file
        isDirectory = false;
      }
    }
    return { name: entry.name, isDirectory };
  });
  return listing.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Resolve the directory part of a path token to an absolute directory.
 */
export function resolveDirectory(directory: string, cwd: string, env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(cwd, expandHome(directory, env) || '.');
}

/**
 * Complete a path token to file and directory candidates.
 *
 * Dot entries are offered only when the name prefix starts with `.`.
 * Directories end with `/`.
 *
 * @example
 * completePaths('src/', { cwd: '/repo' });
 * // [{ text: 'src/completion/', kind: 'directory', ... }, { text: 'src/index.ts', kind: 'file', ... }]
 */
export function completePaths(token: string, options: PathCompletionOptions): CompletionCandidate[] {
  const { quote, directory, prefix } = splitPathToken(token);
  if (!directory && prefix === '~') {
    return [directoryCandidate(`${quote}~/`)];
  }

  const absolute = resolveDirectory(directory, options.cwd, options.env);
  const listing = options.cache
    ? options.cache.getOrLoad(absolute, () => readDirectory(absolute))
    : readDirectory(absolute);
  const matcher = options.matcher ?? prefixMatcher;
  const showHidden = prefix.startsWith('.');

  const candidates: CompletionCandidate[] = [];
  for (const entry of listing) {
    if (entry.name.startsWith('.') && !showHidden) {
      continue;
    }
    if (!matcher(entry.name, prefix)) {
      continue;
    }
    if (entry.isDirectory) {
      candidates.push(directoryCandidate(`${quote}${directory}${entry.name}/`));
      continue;
    }
    if (options.directoriesOnly) {
      continue;
    }
    if (options.extensions && options.extensions.length > 0 &&
        !options.extensions.some(ext => entry.name.endsWith(ext))) {
      continue;
    }
    candidates.push(fileCandidate(`${quote}${directory}${entry.name}`));
  }
  return candidates;
}

/**
 * Complete a partial path to its first match, for callers that want a single
 * answer instead of a list.
 *
 * @param input - Partial path, relative to `cwd` or absolute
 * @returns The completed path (directories end with `/`), or null when
 *          nothing matches
 *
 * @example
 * completePathPrefix('READ', '/repo'); // 'README.md'
 */
export function completePathPrefix(input: string, cwd: string = process.cwd()): string | null {
  if (!input || input.endsWith('/')) {
    return null;
  }
  const [first] = completePaths(input, { cwd });
  return first ? first.text : null;
}
