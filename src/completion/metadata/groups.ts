/**
 * @fileoverview Group completion from the group database.
 *
 * @module completion/metadata/groups
 */

import * as fs from 'node:fs';
import type { CompletionCandidate, TokenMatcher } from '../types';
import type { GroupRecord, TtlCache } from '../cache';
import { argumentCandidate } from '../candidate';

/**
 * Parse group-format text (`name:x:gid:members`), sorted by name.
 */
export function parseGroups(content: string): GroupRecord[] {
  const groups: GroupRecord[] = [];
  for (const line of content.split('\n')) {
    if (!line || line.startsWith('#')) {
      continue;
    }
    const [name, , gidField] = line.split(':');
    const gid = Number(gidField);
    if (!name || gidField === undefined || !Number.isInteger(gid)) {
      continue;
    }
    groups.push({ name, gid });
  }
  return groups.sort((a, b) => a.name.localeCompare(b.name));
}

export function listGroups(groupFile: string, cache?: TtlCache<GroupRecord[]>): GroupRecord[] {
  const load = () => parseGroups(fs.readFileSync(groupFile, 'utf-8'));
  return cache ? cache.getOrLoad('all', load) : load();
}

/**
 * Turn group records into candidates described `GID: n`.
 */
export function groupCandidates(
  groups: readonly GroupRecord[],
  token: string,
  matcher: TokenMatcher = (text, prefix) => text.startsWith(prefix)
): CompletionCandidate[] {
  return groups
    .filter(group => matcher(group.name, token))
    .map(group => argumentCandidate(group.name, `GID: ${group.gid}`));
}
