/**
 * @fileoverview Process id and signal completion for `kill`.
 *
 * @module completion/dynamic/kill
 */

import type { CompletionCandidate, ParsedCommandLine } from '../types';
import type { GeneratorContext } from '../context';
import { createCandidate, PRIORITY } from '../candidate';
import { completeSignals } from '../metadata/signals';

export const KILL_COMMANDS: ReadonlySet<string> = new Set(['kill']);

/** Options whose value is a signal name */
const SIGNAL_OPTIONS: ReadonlySet<string> = new Set(['-s', '-n', '--signal']);

export interface ProcessInfo {
  pid: string;
  cpu: string;
  mem: string;
  command: string;
}

/**
 * Parse `ps -xo pid,%cpu,%mem,comm` output. The header line is skipped.
 */
export function parseProcessList(output: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of output.split('\n').slice(1)) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 4 || !/^\d+$/.test(fields[0])) {
      continue;
    }
    const [pid, cpu, mem, ...command] = fields;
    processes.push({ pid, cpu, mem, command: command.join(' ') });
  }
  return processes;
}

export function matchesKill(parsed: ParsedCommandLine): boolean {
  return KILL_COMMANDS.has(parsed.command) && parsed.cursorIndex > 0;
}

/**
 * Complete `kill` arguments.
 *
 * - `kill -TE` offers `-TERM` style signal names
 * - `kill -s TE` offers signal names
 * - anything else offers the user's process ids, described by command name
 *   and resource usage
 */
export async function generateKill(parsed: ParsedCommandLine, ctx: GeneratorContext): Promise<CompletionCandidate[]> {
  const token = parsed.currentToken;
  const previous = parsed.args[parsed.args.length - 1];

  if (token.startsWith('-') && !token.startsWith('--')) {
    return completeSignals(token.slice(1), { short: true, prefix: '-' });
  }
  if (previous !== undefined && SIGNAL_OPTIONS.has(previous)) {
    return completeSignals(token, { short: true });
  }
  if (token.startsWith('%')) {
    return [];
  }

  const output = await ctx.runner.run('ps', ['-xo', 'pid,%cpu,%mem,comm'], {
    signal: ctx.signal,
    timeoutMs: ctx.config.subprocessTimeoutMs,
  });

  return parseProcessList(output)
    .filter(proc => proc.pid.startsWith(token))
    .map(proc =>
      createCandidate(proc.pid, 'process', PRIORITY.dynamic, `${proc.command} (cpu ${proc.cpu}%, mem ${proc.mem}%)`)
    );
}
