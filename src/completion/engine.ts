/**
 * @fileoverview Completion engine façade.
 *
 * Ties the pipeline together for one request:
 * 1. Parse the line at the cursor, descending into nested command lines
 * 2. Run static generation and the matching dynamic handlers concurrently
 * 3. Add history suggestions in command position
 * 4. Deduplicate, rank and truncate
 *
 * Starting a request cancels the one still in flight. A cancelled or failed
 * request resolves to an empty list; `complete()` never rejects.
 *
 * @module completion/engine
 */

import type { CompletionCandidate, CompletionOptions, ParsedCommandLine } from './types';
import type { SchemaLookup } from './database';
import { CompletionCaches, type Clock } from './cache';
import { DEFAULT_METADATA_ROOTS, type GeneratorContext, type MetadataRoots } from './context';
import { ExecFileRunner, type CommandRunner } from './dynamic/runner';
import { BUILTIN_HANDLERS, generateDynamic, type DynamicHandler } from './dynamic';
import { parseCommandLine } from './parser';
import { generateStatic, innermostCommandLine } from './generator';
import { historyCommandCandidates, historyLines } from './history';
import { dedupeCandidates, fuzzyMatcher, prefixMatcher, smartRank, sortByPriority } from './ranking';
import { safely } from './guard';
import { getSharedDatabase } from './loader';
import { loadConfig, type ShellcompConfig } from '../config';
import { debugLog, warn } from '../utils/log';

export interface CompletionEngineOptions {
  /** Schema database (defaults to the process-wide one) */
  database?: SchemaLookup;
  /** Settings (defaults to `loadConfig()`) */
  config?: ShellcompConfig;
  runner?: CommandRunner;
  caches?: CompletionCaches;
  roots?: MetadataRoots;
  /** Clock for the caches created by the engine */
  clock?: Clock;
  handlers?: readonly DynamicHandler[];
}

/**
 * Replace the token under the cursor with a candidate's text.
 *
 * A trailing space is added unless the text ends in `/` or `=`, so that
 * directories and `--name=` options can be continued.
 *
 * @example
 * spliceCandidate(parseCommandLine('git com', 7), 'commit');
 * // { line: 'git commit ', cursor: 11 }
 */
export function spliceCandidate(parsed: ParsedCommandLine, text: string): { line: string; cursor: number } {
  const { start, end } = parsed.span;
  const before = parsed.line.slice(0, start);
  const after = parsed.line.slice(end);
  const suffix = text.endsWith('/') || text.endsWith('=') ? '' : ' ';
  const spacer = suffix && !/^\s/.test(after) ? suffix : '';
  return {
    line: before + text + spacer + after,
    cursor: start + text.length + suffix.length,
  };
}

/**
 * Completion engine with its own caches and subprocess runner.
 *
 * @example
 * const engine = new CompletionEngine();
 * const candidates = await engine.complete('git ch', 6);
 * candidates.map(c => c.text); // ['checkout', ...]
 */
export default class CompletionEngine {
  readonly config: ShellcompConfig;
  readonly caches: CompletionCaches;
  private database: SchemaLookup;
  private runner: CommandRunner;
  private roots: MetadataRoots;
  private handlers: readonly DynamicHandler[];
  private inFlight: AbortController | null = null;

  constructor(options: CompletionEngineOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.database = options.database ?? getSharedDatabase();
    this.runner = options.runner ?? new ExecFileRunner(this.config.subprocessTimeoutMs);
    this.caches = options.caches ?? new CompletionCaches(this.config.cacheTtl, options.clock);
    this.roots = options.roots ?? DEFAULT_METADATA_ROOTS;
    this.handlers = options.handlers ?? BUILTIN_HANDLERS;
  }

  /** Parse a line against this engine's schemas */
  parse(input: string, cursor: number): ParsedCommandLine {
    return parseCommandLine(input, cursor, this.database);
  }

  /**
   * Candidates for the token at `cursor`, best first.
   */
  async complete(input: string, cursor: number, options: CompletionOptions = {}): Promise<CompletionCandidate[]> {
    this.cancel();
    if (options.signal?.aborted) {
      return [];
    }

    const controller = new AbortController();
    this.inFlight = controller;
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const candidates = await this.run(input, cursor, options, controller.signal);
      return controller.signal.aborted ? [] : candidates;
    } catch (error) {
      if (!controller.signal.aborted) {
        warn('Completion failed', error);
      }
      return [];
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort);
      if (this.inFlight === controller) {
        this.inFlight = null;
      }
    }
  }

  /** Abort the request in flight, if any */
  cancel(): void {
    if (this.inFlight) {
      this.inFlight.abort();
      this.inFlight = null;
    }
  }

  clearCaches(): void {
    this.caches.clear();
  }

  private async run(
    input: string,
    cursor: number,
    options: CompletionOptions,
    signal: AbortSignal
  ): Promise<CompletionCandidate[]> {
    const fuzzy = options.fuzzy ?? this.config.fuzzy;
    const parsed = innermostCommandLine(this.parse(input, cursor), this.database);
    debugLog(`complete '${parsed.line}' @${parsed.cursor}: ${parsed.completionContext.type}`);

    const ctx: GeneratorContext = {
      database: this.database,
      caches: this.caches,
      runner: this.runner,
      config: this.config,
      roots: this.roots,
      cwd: options.cwd ?? process.cwd(),
      env: options.env ?? process.env,
      matcher: fuzzy ? fuzzyMatcher : prefixMatcher,
      signal,
    };

    const [staticCandidates, dynamicCandidates] = await Promise.all([
      safely('static completion', () => generateStatic(parsed, ctx), signal),
      generateDynamic(parsed, ctx, this.handlers),
    ]);
    const historyCandidates =
      parsed.completionContext.type === 'Command' && options.history
        ? historyCommandCandidates(historyLines(options.history), parsed.currentToken, ctx.matcher)
        : [];

    const unique = dedupeCandidates([...staticCandidates, ...dynamicCandidates, ...historyCandidates]);
    const ranked = fuzzy ? smartRank(sortByPriority(unique), parsed.currentToken) : sortByPriority(unique);
    return ranked.slice(0, Math.max(0, options.maxResults ?? this.config.maxResults));
  }
}
