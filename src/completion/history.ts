/**
 * @fileoverview Command history consumption.
 *
 * The engine never writes history; it only reads the command lines a caller
 * supplies and suggests previously used command names in command position.
 *
 * @module completion/history
 */

import * as fs from 'node:fs';
import type { CompletionCandidate, TokenMatcher } from './types';
import { createCandidate, PRIORITY } from './candidate';

const MAX_HISTORY_SUGGESTIONS = 10;

/** zsh extended history prefix: `: <epoch>:<duration>;` */
const ZSH_EXTENDED_PREFIX = /^: \d+:\d+;/;

/**
 * Source of previously executed command lines.
 */
export interface HistoryStore {
  /** Command lines, oldest first */
  entries(): readonly string[];
}

function isHistoryStore(history: HistoryStore | readonly string[]): history is HistoryStore {
  return !Array.isArray(history);
}

/**
 * Command lines of a history store or plain list, oldest first.
 */
export function historyLines(history: HistoryStore | readonly string[]): readonly string[] {
  return isHistoryStore(history) ? history.entries() : history;
}

/**
 * History held in memory, appended to by the caller.
 */
export class InMemoryHistory implements HistoryStore {
  private lines: string[];

  constructor(lines: readonly string[] = []) {
    this.lines = [...lines];
  }

  add(line: string): void {
    const trimmed = line.trim();
    if (trimmed) {
      this.lines.push(trimmed);
    }
  }

  entries(): readonly string[] {
    return this.lines;
  }
}

/**
 * Read a history file with one command per line (bash format, or zsh
 * extended format with timestamps). A missing file gives an empty history.
 */
export function loadHistoryFile(file: string): InMemoryHistory {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return new InMemoryHistory();
    }
    throw error;
  }
  const lines = content
    .split('\n')
    .map(line => line.replace(ZSH_EXTENDED_PREFIX, '').trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
  return new InMemoryHistory(lines);
}

/**
 * Suggest command names from history for the token in command position.
 *
 * Names are ranked by how often they were used, ties going to the most
 * recently used. At most ten suggestions are returned.
 *
 * @example
 * historyCommandCandidates(['git status', 'ls', 'git push'], 'g');
 * // [{ text: 'git', kind: 'history', description: 'used 2 times', priority: 30 }]
 */
export function historyCommandCandidates(
  history: readonly string[],
  token: string,
  matcher: TokenMatcher = (text, prefix) => text.startsWith(prefix)
): CompletionCandidate[] {
  const stats = new Map<string, { count: number; lastIndex: number }>();
  history.forEach((line, index) => {
    const name = line.trim().split(/\s+/)[0];
    if (!name || !matcher(name, token)) {
      return;
    }
    const entry = stats.get(name);
    if (entry) {
      entry.count++;
      entry.lastIndex = index;
    } else {
      stats.set(name, { count: 1, lastIndex: index });
    }
  });

  return [...stats.entries()]
    .sort(([, a], [, b]) => b.count - a.count || b.lastIndex - a.lastIndex)
    .slice(0, MAX_HISTORY_SUGGESTIONS)
    .map(([name, { count }]) =>
      createCandidate(name, 'history', PRIORITY.history, count === 1 ? 'used once' : `used ${count} times`)
    );
}
