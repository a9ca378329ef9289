/**
 * @fileoverview Command line tokenizer and completion context classifier.
 *
 * This module turns the text being edited plus a cursor offset into a
 * `ParsedCommandLine`:
 * - `tokenizeLine()`: whitespace split that keeps quotes and token offsets
 * - `parseCommandLine()`: locates the token under the cursor, recognizes
 *   subcommands, options, option values and redirections, and decides what
 *   kind of completion applies
 *
 * Only the last command of a pipeline or list (`|`, `||`, `&&`, `;`, `&`) is
 * considered, so `ls | gr` completes `gr` as a command name.
 *
 * @module completion/parser
 */

import type { CommandCompletion, CompletionContext, LineToken, ParsedCommandLine } from './types';
import {
  argumentAt,
  argumentsFor,
  childSubcommands,
  findOption,
  subcommandMatches,
  type SchemaLookup,
} from './database';

/** Options whose next token is their value, whatever the schema says */
export const VALUE_OPTIONS: ReadonlySet<string> = new Set([
  '-m',
  '--message',
  '--target',
  '--features',
  '--git',
  '--path',
  '--name',
]);

/** Standalone tokens that separate commands on one line */
const COMMAND_SEPARATORS: ReadonlySet<string> = new Set(['|', '||', '&&', ';', '&']);

/** A redirection operator standing alone, optionally fd-prefixed (`2>`, `&>>`) */
const REDIRECT_OPERATOR = /^\d*(>>|>|<)$|^&>>?$/;

/** A redirection operator glued to its target (`>out.txt`, `2>>err.log`) */
const REDIRECT_PREFIX = /^(\d*(>>|>|<)|&>>?)/;

const MAX_SUBCOMMAND_DEPTH = 2;

/**
 * Split a line on whitespace outside quotes.
 *
 * Quote characters stay in the token text, an unterminated quote runs to the
 * end of the input, and a backslash outside single quotes escapes the next
 * character.
 *
 * @example
 * tokenizeLine('git commit -m "fix bug"');
 * // [{ value: 'git', start: 0, end: 3 }, ..., { value: '"fix bug"', start: 14, end: 23 }]
 */
export function tokenizeLine(input: string): LineToken[] {
  const tokens: LineToken[] = [];
  let current = 0;

  while (current < input.length) {
    if (/\s/.test(input[current])) {
      current++;
      continue;
    }

    const start = current;
    let quote: string | null = null;
    while (current < input.length) {
      const char = input[current];
      if (quote) {
        if (char === quote) {
          quote = null;
        } else if (char === '\\' && quote === '"') {
          current++;
        }
      } else if (char === '"' || char === "'") {
        quote = char;
      } else if (char === '\\') {
        current++;
      } else if (/\s/.test(char)) {
        break;
      }
      current++;
    }
    const end = Math.min(current, input.length);
    tokens.push({ value: input.slice(start, end), start, end });
  }

  return tokens;
}

/**
 * Check whether a token is a standalone redirection operator.
 */
export function isRedirectOperator(token: string): boolean {
  return REDIRECT_OPERATOR.test(token);
}

/**
 * Split a glued redirection (`2>>err.log`) into its operator and target.
 * Returns an empty prefix for tokens that are not redirections.
 */
export function splitRedirectPrefix(token: string): { prefix: string; target: string } {
  const match = REDIRECT_PREFIX.exec(token);
  if (!match) {
    return { prefix: '', target: token };
  }
  return { prefix: match[0], target: token.slice(match[0].length) };
}

/**
 * Check whether a token is an option flag (`-x`, `--long`). A lone `-` is a
 * positional argument.
 */
export function isOptionToken(token: string): boolean {
  return token.length > 1 && token.startsWith('-');
}

/**
 * Guess whether a word is a subcommand of a command without a schema.
 *
 * A word qualifies when it is 2-15 characters of letters, digits, `-` or `_`
 * starting with a letter, has both a vowel and a consonant, and is not a
 * four-letter consonant-vowel-consonant-vowel word such as `file` or `data`.
 *
 * @example
 * isSubcommandLike('install'); // true
 * isSubcommandLike('file'); // false
 * isSubcommandLike('main.rs'); // false
 */
export function isSubcommandLike(token: string): boolean {
  if (token.length < 2 || token.length > 15) {
    return false;
  }
  if (!/^[A-Za-z][A-Za-z0-9_-]*$/.test(token)) {
    return false;
  }
  if (!/[aeiou]/i.test(token) || !/[b-df-hj-np-tv-z]/i.test(token)) {
    return false;
  }
  return !/^[^aeiou][aeiou][^aeiou][aeiou]$/i.test(token);
}

function takesValue(schema: CommandCompletion | undefined, path: readonly string[], token: string): boolean {
  if (token.startsWith('--') && token.includes('=')) {
    return false;
  }
  if (VALUE_OPTIONS.has(token)) {
    return true;
  }
  if (!schema) {
    return false;
  }
  const option = findOption(schema, path, token);
  return option !== undefined && (option.takesValue || option.valueType !== undefined);
}

function qualifiesAsSubcommand(
  schema: CommandCompletion | undefined,
  path: readonly string[],
  token: string
): boolean {
  if (schema) {
    return childSubcommands(schema, path).some(sub => subcommandMatches(sub, token));
  }
  return isSubcommandLike(token);
}

function subcommandPrefixMatches(
  schema: CommandCompletion | undefined,
  path: readonly string[],
  token: string
): boolean {
  if (schema) {
    return childSubcommands(schema, path).some(
      sub => sub.name.startsWith(token) || sub.aliases.some(alias => alias.startsWith(token))
    );
  }
  return path.length === 0 || isSubcommandLike(token);
}

/**
 * Parse a command line at a cursor offset.
 *
 * @param input - The full line being edited
 * @param cursor - Cursor offset, clamped to `[0, input.length]`
 * @param schemas - Optional schema lookup; when the command has a schema,
 *                  subcommands and value-taking options come from it
 * @returns The parsed view of the line at the cursor
 *
 * @example
 * parseCommandLine('git ', 4).completionContext; // { type: 'SubCommand' }
 *
 * @example
 * parseCommandLine('git commit -m "test', 19).completionContext;
 * // { type: 'OptionValue', optionName: '-m' }
 */
export function parseCommandLine(input: string, cursor: number, schemas?: SchemaLookup): ParsedCommandLine {
  const position = Math.max(0, Math.min(cursor, input.length));
  const allTokens = tokenizeLine(input);

  // Token under the cursor, or the index a new token would be inserted at
  let cursorTokenIndex = allTokens.findIndex(token => token.start <= position && position <= token.end);
  const onToken = cursorTokenIndex !== -1;
  if (!onToken) {
    cursorTokenIndex = allTokens.filter(token => token.end < position).length;
  }

  let segmentStart = 0;
  for (let i = 0; i < cursorTokenIndex; i++) {
    if (COMMAND_SEPARATORS.has(allTokens[i].value)) {
      segmentStart = i + 1;
    }
  }
  const segmentEnd = allTokens.findIndex(
    (token, i) => (onToken ? i > cursorTokenIndex : i >= cursorTokenIndex) && COMMAND_SEPARATORS.has(token.value)
  );
  const tokens = allTokens.slice(segmentStart, segmentEnd === -1 ? undefined : segmentEnd);
  const cursorIndex = cursorTokenIndex - segmentStart;

  const cursorToken = onToken ? tokens[cursorIndex] : undefined;
  const span = cursorToken
    ? { start: cursorToken.start, end: cursorToken.end }
    : { start: position, end: position };
  const currentToken = cursorToken ? input.slice(cursorToken.start, position) : '';

  const command = tokens[0]?.value ?? '';
  const schema = cursorIndex > 0 ? schemas?.get(command) : undefined;

  const subcommandPath: string[] = [];
  const specifiedOptions: string[] = [];
  const specifiedArguments: string[] = [];
  const argumentOffsets: number[] = [];
  const args: string[] = [];

  let pendingValueOption: string | null = null;
  let pendingRedirect = false;
  let optionsEnded = false;
  let subcommandsClosed = false;

  for (let i = 1; i < cursorIndex; i++) {
    const value = tokens[i].value;
    args.push(value);

    if (pendingRedirect) {
      pendingRedirect = false;
      continue;
    }
    if (pendingValueOption !== null) {
      pendingValueOption = null;
      continue;
    }
    if (!optionsEnded && value === '--') {
      optionsEnded = true;
      continue;
    }
    if (isRedirectOperator(value)) {
      pendingRedirect = true;
      continue;
    }
    if (splitRedirectPrefix(value).prefix) {
      continue;
    }
    if (!optionsEnded && isOptionToken(value)) {
      specifiedOptions.push(value);
      if (takesValue(schema, subcommandPath, value)) {
        pendingValueOption = value;
      }
      continue;
    }
    if (
      !subcommandsClosed &&
      subcommandPath.length < MAX_SUBCOMMAND_DEPTH &&
      qualifiesAsSubcommand(schema, subcommandPath, value)
    ) {
      subcommandPath.push(value);
      continue;
    }
    subcommandsClosed = true;
    specifiedArguments.push(value);
    argumentOffsets.push(tokens[i].start);
  }

  let completionContext: CompletionContext;
  let redirectTarget = false;
  let currentIsPositional = false;

  if (cursorIndex === 0) {
    completionContext = { type: 'Command' };
  } else if (!optionsEnded && currentToken.startsWith('--')) {
    completionContext = { type: 'LongOption' };
  } else if (!optionsEnded && currentToken.startsWith('-')) {
    completionContext = currentToken.length === 2 ? { type: 'ShortOption' } : { type: 'LongOption' };
  } else if (pendingValueOption !== null) {
    const valueType = schema ? findOption(schema, subcommandPath, pendingValueOption)?.valueType : undefined;
    completionContext = valueType
      ? { type: 'OptionValue', optionName: pendingValueOption, valueType }
      : { type: 'OptionValue', optionName: pendingValueOption };
  } else if (pendingRedirect || splitRedirectPrefix(currentToken).prefix) {
    redirectTarget = true;
    completionContext = { type: 'Argument', argIndex: specifiedArguments.length };
  } else {
    currentIsPositional = currentToken.length > 0;
    const subcommandPossible = !subcommandsClosed && subcommandPath.length < MAX_SUBCOMMAND_DEPTH;
    if (subcommandPossible && subcommandPrefixMatches(schema, subcommandPath, currentToken)) {
      completionContext = { type: 'SubCommand' };
    } else {
      const argIndex = specifiedArguments.length;
      const slot = schema ? argumentAt(argumentsFor(schema, subcommandPath), argIndex) : undefined;
      completionContext = slot?.argType
        ? { type: 'Argument', argIndex, argType: slot.argType }
        : { type: 'Argument', argIndex };
    }
  }

  if (currentIsPositional) {
    specifiedArguments.push(currentToken);
    argumentOffsets.push(span.start);
  }

  return {
    line: input,
    command,
    subcommandPath,
    specifiedOptions,
    specifiedArguments,
    argumentOffsets,
    args,
    currentToken,
    completionContext,
    cursorIndex,
    cursor: position,
    span,
    tokens,
    redirectTarget,
  };
}
