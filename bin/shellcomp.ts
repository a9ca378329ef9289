#!/usr/bin/env node
/**
 * @fileoverview shellcomp CLI entry point.
 *
 * Completes one command line and prints the candidates, one per line as
 * `text<TAB>description`, or as JSON with `--json`.
 *
 * Usage:
 *   shellcomp -- git ch
 *   shellcomp --cursor 4 -- git ch origin
 *   shellcomp --fuzzy --json -- git cmt
 *   shellcomp --apply -- git chec
 *
 * @module bin/shellcomp
 */

import { parseArgs } from '../src/cli/args';
import CompletionEngine, { spliceCandidate } from '../src/completion/engine';
import { completePathPrefix } from '../src/completion/filesystem';
import { loadHistoryFile } from '../src/completion/history';
import { loadCompletionDatabase } from '../src/completion/loader';
import { loadConfig } from '../src/config';
import { VERSION_STRING } from '../src/version';

function showHelp(): void {
  console.log(`shellcomp - context-aware shell completion

Usage: shellcomp [options] -- <command line>

Options:
  --cursor, -c <n>     Cursor offset in the line (default: end of line)
  --cwd, -C <dir>      Directory relative paths resolve against
  --max, -n <n>        Maximum number of candidates
  --fuzzy, -f          Fuzzy matching with smart ranking
  --history <file>     History file used for command name suggestions
  --json               Print candidates as JSON
  --apply              Print the line with the best candidate applied
  --prefix             Print the first path completion of the line
  --list-commands      List commands with a completion definition
  --help, -h           Show this help message
  --version, -v        Show version information

Environment:
  SHELLCOMP_CONFIG_DIR   Config directory (config.json, completions/)
  SHELLCOMP_MAX_RESULTS  Default for --max
  SHELLCOMP_FUZZY        Default for --fuzzy
  SHELLCOMP_TIMEOUT_MS   Timeout for completion subprocesses
  SHELLCOMP_DEBUG        Print debug output to stderr

Examples:
  shellcomp -- git ch            Subcommands of git starting with 'ch'
  shellcomp -- kill -            Signal names
  shellcomp -- ls ~/Doc          Paths under the home directory
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.version) {
    console.log(VERSION_STRING);
    return;
  }

  if (args.help) {
    showHelp();
    return;
  }

  if (args.errors.length > 0) {
    for (const error of args.errors) {
      console.error(`shellcomp: ${error}`);
    }
    console.error("Run 'shellcomp --help' for usage.");
    process.exitCode = 2;
    return;
  }

  const cwd = args.cwd ?? process.cwd();
  const { database, skipped } = loadCompletionDatabase({ cwd });

  if (args.listCommands) {
    for (const name of database.names()) {
      const description = database.get(name)?.description;
      console.log(description ? `${name}\t${description}` : name);
    }
    if (skipped.length > 0) {
      console.error(`${skipped.length} definition file(s) skipped, see warnings above`);
    }
    return;
  }

  if (args.prefix) {
    const match = completePathPrefix(args.line, cwd);
    if (match === null) {
      process.exitCode = 1;
      return;
    }
    console.log(match);
    return;
  }

  const engine = new CompletionEngine({ database, config: loadConfig() });
  const cursor = Math.min(args.cursor ?? args.line.length, args.line.length);
  const history = args.historyFile ? loadHistoryFile(args.historyFile) : undefined;
  const candidates = await engine.complete(args.line, cursor, {
    cwd,
    maxResults: args.maxResults,
    fuzzy: args.fuzzy || undefined,
    history,
  });

  if (args.apply) {
    const best = candidates[0];
    if (!best) {
      process.exitCode = 1;
      return;
    }
    const applied = spliceCandidate(engine.parse(args.line, cursor), best.text);
    console.log(args.json ? JSON.stringify(applied) : applied.line);
    return;
  }

  if (args.json) {
    console.log(JSON.stringify(candidates, null, 2));
    return;
  }

  for (const candidate of candidates) {
    console.log(candidate.description ? `${candidate.text}\t${candidate.description}` : candidate.text);
  }
  if (candidates.length === 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
