/**
 * @fileoverview Completion candidate constructors and priority constants.
 *
 * @module completion/candidate
 */

import type { CandidateKind, CompletionCandidate } from './types';

/** Default priority for each candidate category */
export const PRIORITY = {
  subcommand: 100,
  dynamic: 100,
  option: 80,
  argument: 60,
  command: 60,
  executable: 55,
  directory: 50,
  file: 40,
  history: 30,
} as const;

/**
 * Create a frozen candidate.
 *
 * @example
 * createCandidate('commit', 'subcommand', 100, 'Record changes to the repository');
 */
export function createCandidate(
  text: string,
  kind: CandidateKind,
  priority: number,
  description?: string
): CompletionCandidate {
  const candidate: CompletionCandidate = description === undefined
    ? { text, kind, priority }
    : { text, kind, priority, description };
  return Object.freeze(candidate);
}

export function subcommandCandidate(text: string, description?: string): CompletionCandidate {
  return createCandidate(text, 'subcommand', PRIORITY.subcommand, description);
}

export function shortOptionCandidate(text: string, description?: string): CompletionCandidate {
  return createCandidate(text, 'short-option', PRIORITY.option, description);
}

export function longOptionCandidate(text: string, description?: string): CompletionCandidate {
  return createCandidate(text, 'long-option', PRIORITY.option, description);
}

export function argumentCandidate(text: string, description?: string): CompletionCandidate {
  return createCandidate(text, 'argument', PRIORITY.argument, description);
}

export function fileCandidate(text: string, description?: string): CompletionCandidate {
  return createCandidate(text, 'file', PRIORITY.file, description);
}

export function directoryCandidate(text: string, description?: string): CompletionCandidate {
  return createCandidate(text, 'directory', PRIORITY.directory, description);
}

/**
 * Return a copy of a candidate with a different priority.
 */
export function withPriority(candidate: CompletionCandidate, priority: number): CompletionCandidate {
  return createCandidate(candidate.text, candidate.kind, priority, candidate.description);
}
