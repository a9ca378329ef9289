/**
 * @fileoverview Command line argument parsing for the shellcomp CLI.
 *
 * @module cli/args
 */

import * as path from 'node:path';

export interface CLIArgs {
  /** Line to complete (everything after `--`, joined by spaces) */
  line: string;
  /** Cursor offset, defaults to the end of the line */
  cursor?: number;
  cwd?: string;
  maxResults?: number;
  fuzzy: boolean;
  json: boolean;
  /** Print the line with the best candidate applied */
  apply: boolean;
  /** Print only the first path match for the line */
  prefix: boolean;
  listCommands: boolean;
  historyFile?: string;
  help: boolean;
  version: boolean;
  /** Problems found while parsing; non-empty means the CLI should exit 2 */
  errors: string[];
}

function parseCount(flag: string, value: string | undefined, errors: string[], allowZero: boolean): number | undefined {
  const parsed = value !== undefined && /^\d+$/.test(value) ? Number(value) : NaN;
  if (Number.isNaN(parsed) || (!allowZero && parsed === 0)) {
    errors.push(`${flag} expects a ${allowZero ? 'non-negative' : 'positive'} integer, got '${value ?? ''}'`);
    return undefined;
  }
  return parsed;
}

/**
 * Parse CLI arguments (without the node and script entries).
 *
 * @example
 * parseArgs(['--cursor', '3', '--', 'git', 'ch']);
 * // { line: 'git ch', cursor: 3, fuzzy: false, ... }
 */
export function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    line: '',
    fuzzy: false,
    json: false,
    apply: false,
    prefix: false,
    listCommands: false,
    help: false,
    version: false,
    errors: [],
  };
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--':
        positionals.push(...args.slice(i + 1));
        i = args.length;
        break;
      case '--cursor':
      case '-c':
        result.cursor = parseCount(arg, args[++i], result.errors, true);
        break;
      case '--cwd':
      case '-C': {
        const dir = args[++i];
        if (dir === undefined) {
          result.errors.push(`${arg} expects a directory`);
        } else {
          result.cwd = path.resolve(dir);
        }
        break;
      }
      case '--max':
      case '-n':
        result.maxResults = parseCount(arg, args[++i], result.errors, false);
        break;
      case '--history': {
        const file = args[++i];
        if (file === undefined) {
          result.errors.push(`${arg} expects a file`);
        } else {
          result.historyFile = path.resolve(file);
        }
        break;
      }
      case '--fuzzy':
      case '-f':
        result.fuzzy = true;
        break;
      case '--json':
        result.json = true;
        break;
      case '--apply':
        result.apply = true;
        break;
      case '--prefix':
        result.prefix = true;
        break;
      case '--list-commands':
        result.listCommands = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--version':
      case '-v':
        result.version = true;
        break;
      default:
        if (arg.startsWith('-')) {
          result.errors.push(`Unknown option: ${arg}`);
        } else {
          positionals.push(arg);
        }
    }
  }

  result.line = positionals.join(' ');
  return result;
}
