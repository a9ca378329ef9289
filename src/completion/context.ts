/**
 * @fileoverview Per-request dependencies handed to every generator.
 *
 * @module completion/context
 */

import type { ShellcompConfig } from '../config';
import type { CompletionCaches } from './cache';
import type { CommandRunner } from './dynamic/runner';
import type { SchemaLookup } from './database';
import type { TokenMatcher } from './types';

/** Filesystem locations the metadata generators read */
export interface MetadataRoots {
  passwdFile: string;
  groupFile: string;
  netClassDir: string;
}

export const DEFAULT_METADATA_ROOTS: Readonly<MetadataRoots> = Object.freeze({
  passwdFile: '/etc/passwd',
  groupFile: '/etc/group',
  netClassDir: '/sys/class/net',
});

export interface GeneratorContext {
  database: SchemaLookup;
  caches: CompletionCaches;
  runner: CommandRunner;
  config: ShellcompConfig;
  roots: MetadataRoots;
  /** Directory relative paths resolve against */
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Prefix matcher, or subsequence matcher in fuzzy mode */
  matcher: TokenMatcher;
  signal?: AbortSignal;
}
