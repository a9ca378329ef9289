/**
 * @fileoverview Signal name completion.
 *
 * Matches a token against signal names with or without the `SIG` prefix
 * (case-insensitive) and against signal numbers.
 *
 * @module completion/metadata/signals
 */

import signalTable from '../../../data/signals.json';
import type { CompletionCandidate } from '../types';
import { argumentCandidate } from '../candidate';

export interface SignalInfo {
  name: string;
  number: number;
  description: string;
}

export const SIGNALS: readonly SignalInfo[] = signalTable;

export interface SignalCompletionOptions {
  /** Offer names without the `SIG` prefix (`TERM` instead of `SIGTERM`) */
  short?: boolean;
  /** Text prepended to every candidate, e.g. `-` for `kill -TERM` */
  prefix?: string;
}

function signalMatches(signal: SignalInfo, token: string): boolean {
  if (token === '') {
    return true;
  }
  const upper = token.toUpperCase();
  const bare = signal.name.replace(/^SIG/, '');
  return signal.name.startsWith(upper) || bare.startsWith(upper) || String(signal.number).startsWith(token);
}

/**
 * Complete a signal name or number.
 *
 * @example
 * completeSignals('9'); // [{ text: 'SIGKILL', description: 'Kill (cannot be caught) (9)', ... }]
 * completeSignals('TE', { short: true, prefix: '-' }); // [{ text: '-TERM', ... }]
 */
export function completeSignals(token: string, options: SignalCompletionOptions = {}): CompletionCandidate[] {
  const prefix = options.prefix ?? '';
  return SIGNALS
    .filter(signal => signalMatches(signal, token))
    .map(signal => {
      const name = options.short ? signal.name.replace(/^SIG/, '') : signal.name;
      return argumentCandidate(`${prefix}${name}`, `${signal.description} (${signal.number})`);
    });
}
