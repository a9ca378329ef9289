/**
 * @fileoverview Completions produced by an ad hoc shell command.
 *
 * A `Script` argument type names a shell command whose output lines are the
 * candidates. Before running, `$COMMAND`, `$SUBCOMMAND` and `$CURRENT_TOKEN`
 * are substituted; the token is single-quoted so it cannot inject shell
 * syntax. A line of the form `value<TAB>description` carries a description.
 * Output is cached by the substituted command line.
 *
 * @module completion/script
 */

import type { CompletionCandidate, ParsedCommandLine } from './types';
import type { GeneratorContext } from './context';
import { argumentCandidate } from './candidate';

/**
 * Quote a string for POSIX `sh`.
 *
 * @example
 * shellQuote("it's"); // 'it'\''s'
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Substitute completion variables into a script template.
 *
 * @example
 * expandScript('make -C $CURRENT_TOKEN', parsed); // "make -C 'src'"
 */
export function expandScript(template: string, parsed: ParsedCommandLine): string {
  return template
    .replace(/\$COMMAND\b/g, () => parsed.command)
    .replace(/\$SUBCOMMAND\b/g, () => parsed.subcommandPath[0] ?? '')
    .replace(/\$CURRENT_TOKEN\b/g, () => shellQuote(parsed.currentToken));
}

/**
 * Split script output into non-empty, trimmed lines.
 */
export function parseScriptOutput(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Run a `Script` template and turn its output lines into candidates that
 * match the current token.
 */
export async function runScriptCompletion(
  template: string,
  parsed: ParsedCommandLine,
  ctx: GeneratorContext
): Promise<CompletionCandidate[]> {
  const command = expandScript(template, parsed);
  const lines = await ctx.caches.scripts.getOrLoadAsync(command, async () => {
    const output = await ctx.runner.run('sh', ['-c', command], {
      signal: ctx.signal,
      timeoutMs: ctx.config.subprocessTimeoutMs,
      cwd: ctx.cwd,
      env: ctx.env,
    });
    return parseScriptOutput(output);
  });

  const candidates: CompletionCandidate[] = [];
  for (const line of lines) {
    const tab = line.indexOf('\t');
    const text = tab === -1 ? line : line.slice(0, tab).trim();
    const description = tab === -1 ? undefined : line.slice(tab + 1).trim() || undefined;
    if (text && ctx.matcher(text, parsed.currentToken)) {
      candidates.push(argumentCandidate(text, description));
    }
  }
  return candidates;
}
