/**
 * @fileoverview Network interface completion from sysfs.
 *
 * Each directory under `/sys/class/net` is an interface; its `operstate`
 * file holds the link state and its `type` file the ARP hardware type
 * (1 ethernet, 772 loopback, 801 wireless).
 *
 * @module completion/metadata/interfaces
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CompletionCandidate, TokenMatcher } from '../types';
import type { InterfaceRecord, TtlCache } from '../cache';
import { argumentCandidate } from '../candidate';

const HARDWARE_TYPES: Record<string, string> = {
  '1': 'ethernet',
  '772': 'loopback',
  '801': 'wireless',
};

function readTrimmed(file: string): string | undefined {
  try {
    return fs.readFileSync(file, 'utf-8').trim();
  } catch {
    return undefined;
  }
}

/**
 * Sort rank by name: wired, then wireless, then other physical, then
 * virtual bridges, then loopback.
 */
export function interfaceRank(name: string): number {
  if (/^(eth|enp|eno|ens)/.test(name)) return 0;
  if (/^(wlan|wlp)/.test(name)) return 1;
  if (name === 'lo') return 5;
  if (/^(docker|br-|veth|virbr)/.test(name)) return 4;
  return 3;
}

/**
 * Read interfaces from a sysfs net class directory.
 * A missing directory (non-Linux hosts) yields an empty list.
 */
export function readInterfaces(netClassDir: string): InterfaceRecord[] {
  let names: string[];
  try {
    names = fs.readdirSync(netClassDir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const interfaces = names.map(name => {
    const dir = path.join(netClassDir, name);
    const typeCode = readTrimmed(path.join(dir, 'type'));
    return {
      name,
      kind: (typeCode !== undefined ? HARDWARE_TYPES[typeCode] : undefined) ?? 'other',
      state: readTrimmed(path.join(dir, 'operstate')) || 'unknown',
    };
  });

  return interfaces.sort((a, b) => interfaceRank(a.name) - interfaceRank(b.name) || a.name.localeCompare(b.name));
}

export function listInterfaces(netClassDir: string, cache?: TtlCache<InterfaceRecord[]>): InterfaceRecord[] {
  const load = () => readInterfaces(netClassDir);
  return cache ? cache.getOrLoad(netClassDir, load) : load();
}

/**
 * Turn interfaces into candidates described `kind (state)`.
 */
export function interfaceCandidates(
  interfaces: readonly InterfaceRecord[],
  token: string,
  matcher: TokenMatcher = (text, prefix) => text.startsWith(prefix)
): CompletionCandidate[] {
  return interfaces
    .filter(iface => matcher(iface.name, token))
    .map(iface => argumentCandidate(iface.name, `${iface.kind} (${iface.state})`));
}
