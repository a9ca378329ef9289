/**
 * @fileoverview Branch and remote completion for `git`.
 *
 * Branch-taking subcommands (`checkout`, `switch`, `merge`, `rebase`,
 * `branch`) get local branches followed by remote-tracking branches.
 * Remote-taking subcommands (`push`, `pull`, `fetch`) get remote names for
 * their first argument and, once a known remote has been typed, that
 * remote's branches for the second. Typing `origin/ma` in first position
 * completes branches of `origin` with the remote name kept in the text.
 *
 * @module completion/dynamic/git
 */

import type { CompletionCandidate, ParsedCommandLine } from '../types';
import type { GeneratorContext } from '../context';
import { createCandidate, PRIORITY } from '../candidate';
import { isOptionToken } from '../parser';
import { subcommandMatches, type SchemaLookup } from '../database';

export const BRANCH_SUBCOMMANDS: ReadonlySet<string> = new Set(['checkout', 'switch', 'merge', 'rebase', 'branch']);
export const REMOTE_SUBCOMMANDS: ReadonlySet<string> = new Set(['push', 'pull', 'fetch']);

export interface GitInvocation {
  subcommand: string;
  /** Positional arguments typed after the subcommand, before the cursor */
  before: string[];
}

/**
 * Locate the git subcommand and the positional arguments after it.
 * An alias declared in the `git` schema (`co`) is reported under its
 * canonical name (`checkout`). Returns undefined when no subcommand has been
 * typed yet.
 */
export function parseGitInvocation(parsed: ParsedCommandLine, schemas?: SchemaLookup): GitInvocation | undefined {
  const words = parsed.args.filter(arg => !isOptionToken(arg));
  const [typed, ...before] = words;
  if (typed === undefined) {
    return undefined;
  }
  const declared = schemas?.get('git')?.subcommands.find(sub => subcommandMatches(sub, typed));
  return { subcommand: declared?.name ?? typed, before };
}

export function matchesGit(parsed: ParsedCommandLine, schemas?: SchemaLookup): boolean {
  if (parsed.command !== 'git' || parsed.currentToken.startsWith('-')) {
    return false;
  }
  const invocation = parseGitInvocation(parsed, schemas);
  if (!invocation) {
    return false;
  }
  if (BRANCH_SUBCOMMANDS.has(invocation.subcommand)) {
    return invocation.before.length === 0;
  }
  return REMOTE_SUBCOMMANDS.has(invocation.subcommand) && invocation.before.length <= 1;
}

/**
 * Parse `git branch` output into branch names.
 * The current branch (`* ` marker) is flagged; symbolic refs (`->`) and
 * detached-HEAD lines are skipped.
 */
export function parseBranchList(output: string): Array<{ name: string; current: boolean }> {
  const branches: Array<{ name: string; current: boolean }> = [];
  for (const line of output.split('\n')) {
    const current = line.startsWith('* ');
    const name = line.replace(/^[*+]?\s*/, '').trim();
    if (!name || name.includes(' -> ') || name.startsWith('(')) {
      continue;
    }
    branches.push({ name, current });
  }
  return branches;
}

async function git(ctx: GeneratorContext, args: string[]): Promise<string> {
  return ctx.runner.run('git', args, {
    signal: ctx.signal,
    timeoutMs: ctx.config.subprocessTimeoutMs,
    cwd: ctx.cwd,
  });
}

function branchCandidate(name: string, description?: string): CompletionCandidate {
  return createCandidate(name, 'argument', PRIORITY.dynamic, description);
}

async function listRemotes(ctx: GeneratorContext): Promise<string[]> {
  const output = await git(ctx, ['remote']);
  return output.split('\n').map(line => line.trim()).filter(Boolean);
}

async function completeBranches(token: string, ctx: GeneratorContext): Promise<CompletionCandidate[]> {
  const [local, remote] = await Promise.all([
    git(ctx, ['branch', '--list', `${token}*`]),
    git(ctx, ['branch', '-r', '--list', `${token}*`]),
  ]);
  return [
    ...parseBranchList(local).map(b => branchCandidate(b.name, b.current ? 'current branch' : 'local branch')),
    ...parseBranchList(remote).map(b => branchCandidate(b.name, 'remote branch')),
  ];
}

/**
 * Branches of one remote whose name starts with `partial`. With
 * `keepRemote`, candidates read `remote/branch`; otherwise just `branch`.
 */
async function completeRemoteBranches(
  remote: string,
  partial: string,
  keepRemote: boolean,
  ctx: GeneratorContext
): Promise<CompletionCandidate[]> {
  const output = await git(ctx, ['branch', '-r', '--list', `${remote}/${partial}*`]);
  const prefix = `${remote}/`;
  return parseBranchList(output)
    .filter(b => b.name.startsWith(prefix))
    .map(b => {
      const branch = b.name.slice(prefix.length);
      return branchCandidate(keepRemote ? `${remote}/${branch}` : branch, `branch on ${remote}`);
    });
}

export async function generateGit(parsed: ParsedCommandLine, ctx: GeneratorContext): Promise<CompletionCandidate[]> {
  const invocation = parseGitInvocation(parsed, ctx.database);
  if (!invocation) {
    return [];
  }
  const token = parsed.currentToken;

  if (BRANCH_SUBCOMMANDS.has(invocation.subcommand)) {
    return completeBranches(token, ctx);
  }

  const remotes = await listRemotes(ctx);
  if (invocation.before.length === 0) {
    const slash = token.indexOf('/');
    if (slash > 0 && remotes.includes(token.slice(0, slash))) {
      return completeRemoteBranches(token.slice(0, slash), token.slice(slash + 1), true, ctx);
    }
    return remotes.filter(name => name.startsWith(token)).map(name => branchCandidate(name, 'remote'));
  }

  const remote = invocation.before[0];
  if (!remotes.includes(remote)) {
    return [];
  }
  return completeRemoteBranches(remote, token, false, ctx);
}
