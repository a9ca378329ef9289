/**
 * @fileoverview Package name completion for package manager installs.
 *
 * Recognized invocations, optionally behind `sudo` or `doas`:
 * - `pacman -S…` / `yay -S…` / `paru -S…`: `<manager> -Ssq ^<partial>`
 * - `apt install`, `apt-get install`: `apt-cache pkgnames <partial>`
 * - `dnf install`: `dnf -q repoquery --qf %{name} <partial>*`
 * - `brew install`: `brew search <partial>`
 *
 * The package index is only queried once at least one character has been
 * typed.
 *
 * @module completion/dynamic/packages
 */

import type { CompletionCandidate, ParsedCommandLine } from '../types';
import type { GeneratorContext } from '../context';
import { createCandidate, PRIORITY } from '../candidate';
import { ESCALATION_COMMANDS } from './sudo';

export interface PackageQuery {
  manager: string;
  program: string;
  args: string[];
}

const MAX_PACKAGES = 200;

const PACMAN_LIKE: ReadonlySet<string> = new Set(['pacman', 'yay', 'paru']);
const INSTALL_VERB: Record<string, string> = {
  apt: 'install',
  'apt-get': 'install',
  dnf: 'install',
  brew: 'install',
};

/**
 * Command words with a leading `sudo`/`doas` (and its options) removed.
 */
function commandWords(parsed: ParsedCommandLine): string[] {
  const words = [parsed.command, ...parsed.args];
  if (ESCALATION_COMMANDS.has(words[0])) {
    let i = 1;
    while (i < words.length && words[i].startsWith('-')) {
      i++;
    }
    return words.slice(i);
  }
  return words;
}

function isPacmanSync(arg: string): boolean {
  return /^-S[a-z]*$/.test(arg) && !/[slicgp]/.test(arg.slice(2));
}

/**
 * Work out which package index query applies to a command line.
 *
 * @returns The query to run, or undefined when the line is not a package
 *          install or nothing has been typed yet
 *
 * @example
 * packageQuery(parseCommandLine('sudo pacman -S fire', 19));
 * // { manager: 'pacman', program: 'pacman', args: ['-Ssq', '^fire'] }
 */
export function packageQuery(parsed: ParsedCommandLine): PackageQuery | undefined {
  const partial = parsed.currentToken;
  if (!partial || partial.startsWith('-')) {
    return undefined;
  }
  const [manager, ...rest] = commandWords(parsed);
  if (manager === undefined) {
    return undefined;
  }

  if (PACMAN_LIKE.has(manager)) {
    if (!rest.some(isPacmanSync)) {
      return undefined;
    }
    const escaped = partial.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return { manager, program: manager, args: ['-Ssq', `^${escaped}`] };
  }

  const verb = INSTALL_VERB[manager];
  if (verb === undefined || rest.filter(arg => !arg.startsWith('-'))[0] !== verb) {
    return undefined;
  }
  switch (manager) {
    case 'apt':
    case 'apt-get':
      return { manager, program: 'apt-cache', args: ['pkgnames', partial] };
    case 'dnf':
      return { manager, program: 'dnf', args: ['-q', 'repoquery', '--qf', '%{name}', `${partial}*`] };
    default:
      return { manager, program: 'brew', args: ['search', partial] };
  }
}

export function matchesPackage(parsed: ParsedCommandLine): boolean {
  return packageQuery(parsed) !== undefined;
}

/**
 * Turn package index output into unique, sorted names that start with the
 * partial name. `brew search` section headers (`==> Formulae`) are dropped.
 */
export function parsePackageList(output: string, partial: string): string[] {
  const names = new Set<string>();
  for (const line of output.split('\n')) {
    const name = line.trim();
    if (!name || name.startsWith('==>') || !name.startsWith(partial)) {
      continue;
    }
    names.add(name);
  }
  return [...names].sort().slice(0, MAX_PACKAGES);
}

export async function generatePackages(parsed: ParsedCommandLine, ctx: GeneratorContext): Promise<CompletionCandidate[]> {
  const query = packageQuery(parsed);
  if (!query) {
    return [];
  }
  const output = await ctx.runner.run(query.program, query.args, {
    signal: ctx.signal,
    timeoutMs: ctx.config.subprocessTimeoutMs,
  });
  return parsePackageList(output, parsed.currentToken).map(name =>
    createCandidate(name, 'argument', PRIORITY.dynamic, `${query.manager} package`)
  );
}
