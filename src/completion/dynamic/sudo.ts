/**
 * @fileoverview Account name completion for privilege escalation commands.
 *
 * @module completion/dynamic/sudo
 */

import type { CompletionCandidate, ParsedCommandLine } from '../types';
import type { GeneratorContext } from '../context';
import type { UserRecord } from '../cache';
import { withPriority, PRIORITY } from '../candidate';
import { CommandRunnerError } from './runner';
import { listUsers, parsePasswd, userCandidates } from '../metadata/users';

export const ESCALATION_COMMANDS: ReadonlySet<string> = new Set(['sudo', 'doas']);

export function matchesSudo(parsed: ParsedCommandLine): boolean {
  return ESCALATION_COMMANDS.has(parsed.command) &&
    parsed.cursorIndex === 1 &&
    !parsed.currentToken.startsWith('-');
}

/**
 * Offer account names for `sudo <cursor>`.
 *
 * Accounts come from `getent passwd`, so directory services are included;
 * where `getent` is unavailable the passwd file is read instead.
 */
export async function generateSudo(parsed: ParsedCommandLine, ctx: GeneratorContext): Promise<CompletionCandidate[]> {
  const includeSystem = ctx.config.includeSystemUsers;
  let users: UserRecord[];
  try {
    users = await ctx.caches.users.getOrLoadAsync(`getent:${includeSystem ? 'all' : 'normal'}`, async () => {
      const output = await ctx.runner.run('getent', ['passwd'], {
        signal: ctx.signal,
        timeoutMs: ctx.config.subprocessTimeoutMs,
      });
      return parsePasswd(output, includeSystem);
    });
  } catch (error) {
    if (!(error instanceof CommandRunnerError)) {
      throw error;
    }
    users = listUsers(ctx.roots.passwdFile, includeSystem, ctx.caches.users);
  }

  return userCandidates(users, parsed.currentToken, ctx.matcher).map(c => withPriority(c, PRIORITY.dynamic));
}
