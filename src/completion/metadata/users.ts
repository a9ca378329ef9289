/**
 * @fileoverview User account completion from the passwd database.
 *
 * @module completion/metadata/users
 */

import * as fs from 'node:fs';
import type { CompletionCandidate, TokenMatcher } from '../types';
import type { TtlCache, UserRecord } from '../cache';
import { argumentCandidate } from '../candidate';

/** Accounts below this UID are system accounts */
export const FIRST_NORMAL_UID = 1000;

/**
 * Parse passwd-format text (`name:x:uid:gid:gecos:home:shell`).
 *
 * Accounts with a UID below 1000 are dropped unless `includeSystem` is set;
 * `root` is always kept. The result is sorted by name. Malformed lines are
 * skipped.
 */
export function parsePasswd(content: string, includeSystem: boolean): UserRecord[] {
  const users: UserRecord[] = [];
  for (const line of content.split('\n')) {
    if (!line || line.startsWith('#')) {
      continue;
    }
    const fields = line.split(':');
    if (fields.length < 3 || !fields[0]) {
      continue;
    }
    const uid = Number(fields[2]);
    if (!Number.isInteger(uid)) {
      continue;
    }
    const name = fields[0];
    if (!includeSystem && uid < FIRST_NORMAL_UID && name !== 'root') {
      continue;
    }
    const gecos = (fields[4] ?? '').split(',')[0].trim();
    users.push(gecos ? { name, uid, description: gecos } : { name, uid });
  }
  return users.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Load accounts from a passwd file, cached under `all` or `normal`.
 */
export function listUsers(passwdFile: string, includeSystem: boolean, cache?: TtlCache<UserRecord[]>): UserRecord[] {
  const load = () => parsePasswd(fs.readFileSync(passwdFile, 'utf-8'), includeSystem);
  const key = includeSystem ? 'all' : 'normal';
  return cache ? cache.getOrLoad(key, load) : load();
}

/**
 * Turn account records into candidates matching a token.
 */
export function userCandidates(
  users: readonly UserRecord[],
  token: string,
  matcher: TokenMatcher = (text, prefix) => text.startsWith(prefix)
): CompletionCandidate[] {
  return users
    .filter(user => matcher(user.name, token))
    .map(user => argumentCandidate(user.name, user.description));
}
