/**
 * @fileoverview Type definitions for the completion engine.
 *
 * This module defines the shared vocabulary of the completion pipeline:
 * - Command schemas (commands, subcommands, options, arguments)
 * - The parsed view of a command line at the cursor
 * - The completion context union the generators dispatch on
 * - Completion candidates and the request options passed between stages
 *
 * @module completion/types
 */

import type { HistoryStore } from './history';

/**
 * Type of value an argument or option accepts.
 *
 * Drives which generator fills an argument slot. Types without a generator
 * (`String`, `Number`, `Url`, `Regex`) produce no candidates.
 */
export type ArgumentType =
  | { type: 'File'; extensions?: readonly string[] }
  | { type: 'Directory' }
  | { type: 'Choice'; choices: readonly string[] }
  | { type: 'Command' }
  | { type: 'CommandWithArgs' }
  | { type: 'Environment' }
  | { type: 'String' }
  | { type: 'Number' }
  | { type: 'Url' }
  | { type: 'Regex' }
  | { type: 'Signal' }
  | { type: 'User' }
  | { type: 'Group' }
  | { type: 'Interface' }
  | { type: 'Script'; command: string };

/** Names of every argument type variant */
export type ArgumentTypeName = ArgumentType['type'];

/**
 * A command-line option. At least one of `short` or `long` is present.
 */
export interface CommandOption {
  short?: string;
  long?: string;
  description?: string;
  /** Whether the next token is consumed as this option's value */
  takesValue: boolean;
  valueType?: ArgumentType;
}

/**
 * A positional argument slot.
 */
export interface Argument {
  name: string;
  description?: string;
  argType?: ArgumentType;
  /** Whether this slot repeats for every following position */
  multiple: boolean;
}

/**
 * A node in a command's subcommand tree.
 */
export interface SubCommand {
  name: string;
  description?: string;
  aliases: readonly string[];
  options: readonly CommandOption[];
  arguments: readonly Argument[];
  subcommands: readonly SubCommand[];
}

/**
 * Complete completion schema for one command.
 */
export interface CommandCompletion {
  command: string;
  description?: string;
  globalOptions: readonly CommandOption[];
  subcommands: readonly SubCommand[];
  arguments: readonly Argument[];
}

/**
 * What is being completed at the cursor.
 *
 * - `Command`: the command name itself
 * - `SubCommand`: a subcommand of the current command path
 * - `ShortOption` / `LongOption`: an option flag
 * - `OptionValue`: the value of the option directly before the cursor
 * - `Argument`: the `argIndex`-th positional argument
 * - `Unknown`: nothing sensible to complete
 */
export type CompletionContext =
  | { type: 'Command' }
  | { type: 'SubCommand' }
  | { type: 'ShortOption' }
  | { type: 'LongOption' }
  | { type: 'OptionValue'; optionName: string; valueType?: ArgumentType }
  | { type: 'Argument'; argIndex: number; argType?: ArgumentType }
  | { type: 'Unknown' };

/**
 * A whitespace-delimited token with its position in the input.
 * Quote characters are kept in `value`.
 */
export interface LineToken {
  value: string;
  start: number;
  end: number;
}

/**
 * Result of parsing a command line at a cursor position.
 */
export interface ParsedCommandLine {
  /** Full input line */
  line: string;
  /** First token, or empty string for an empty line */
  command: string;
  /** Recognized subcommand tokens before the cursor token (at most two) */
  subcommandPath: string[];
  /** Option tokens before the cursor token */
  specifiedOptions: string[];
  /** Positional tokens, including the in-progress token when positional */
  specifiedArguments: string[];
  /** Start offset in `line` of each entry of `specifiedArguments` */
  argumentOffsets: number[];
  /** Every token after the command that precedes the cursor token */
  args: string[];
  /** Text of the in-progress token up to the cursor */
  currentToken: string;
  completionContext: CompletionContext;
  /** Index of the token under the cursor, or the insertion index */
  cursorIndex: number;
  /** Cursor offset, clamped to the line */
  cursor: number;
  /** Range of the whole token under the cursor (empty range when none) */
  span: { start: number; end: number };
  tokens: LineToken[];
  /** True when the current token is the target of a redirection */
  redirectTarget: boolean;
}

/**
 * Category of a completion candidate.
 */
export type CandidateKind =
  | 'command'
  | 'subcommand'
  | 'short-option'
  | 'long-option'
  | 'argument'
  | 'file'
  | 'directory'
  | 'executable'
  | 'process'
  | 'history';

/**
 * A single completion suggestion. Instances are frozen.
 */
export interface CompletionCandidate {
  readonly text: string;
  readonly description?: string;
  readonly kind: CandidateKind;
  /** Higher sorts first */
  readonly priority: number;
}

/**
 * Options accepted by `CompletionEngine.complete()`.
 */
export interface CompletionOptions {
  /** Directory relative paths are resolved against (defaults to process.cwd()) */
  cwd?: string;
  /** Maximum number of candidates returned */
  maxResults?: number;
  /** Previously executed command lines, as a store or oldest first */
  history?: HistoryStore | readonly string[];
  /** Use fuzzy subsequence matching and smart ranking */
  fuzzy?: boolean;
  /** Aborts the request; an aborted request resolves to an empty list */
  signal?: AbortSignal;
  /** Environment used for PATH and HOME lookups (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Predicate deciding whether a candidate text matches the current token.
 */
export type TokenMatcher = (text: string, token: string) => boolean;
