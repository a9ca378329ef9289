/**
 * @fileoverview Static candidate generation.
 *
 * Dispatches on the completion context of a parsed command line:
 * - `Command`: schema command names, common system commands, PATH executables
 * - `SubCommand`: children of the current subcommand node
 * - `ShortOption` / `LongOption`: global and subcommand options
 * - `OptionValue` / `Argument`: the generator for the slot's argument type
 *
 * A command that takes another command line as its argument (`sudo`,
 * `docker exec … <command>`) is completed as that nested command line.
 *
 * @module completion/generator
 */

import commonCommands from '../../data/common-commands.json';
import type {
  ArgumentType,
  CommandCompletion,
  CompletionCandidate,
  ParsedCommandLine,
} from './types';
import type { GeneratorContext } from './context';
import {
  argumentAt,
  argumentsFor,
  childSubcommands,
  collectOptions,
  findSubcommand,
  type SchemaLookup,
} from './database';
import {
  argumentCandidate,
  createCandidate,
  longOptionCandidate,
  PRIORITY,
  shortOptionCandidate,
  subcommandCandidate,
} from './candidate';
import { parseCommandLine, splitRedirectPrefix } from './parser';
import { completePaths } from './filesystem';
import { findExecutables } from './executables';
import { completeSignals } from './metadata/signals';
import { listUsers, userCandidates } from './metadata/users';
import { groupCandidates, listGroups } from './metadata/groups';
import { interfaceCandidates, listInterfaces } from './metadata/interfaces';
import { runScriptCompletion } from './script';
import { safely } from './guard';

/** Nesting limit for commands that wrap other commands */
export const MAX_NESTING_DEPTH = 3;

/** Fallback command names offered even without a schema */
export const COMMON_COMMANDS: readonly string[] = commonCommands;

/**
 * If the cursor lies inside a nested command line (the arguments of a
 * `CommandWithArgs` slot after the command name), parse that nested line.
 */
export function nestedCommandLine(parsed: ParsedCommandLine, database: SchemaLookup): ParsedCommandLine | undefined {
  if (parsed.completionContext.type === 'Command') {
    return undefined;
  }
  const schema = database.get(parsed.command);
  if (!schema) {
    return undefined;
  }
  const slotIndex = argumentsFor(schema, parsed.subcommandPath).findIndex(
    arg => arg.argType?.type === 'CommandWithArgs'
  );
  if (slotIndex === -1) {
    return undefined;
  }
  const offset = parsed.argumentOffsets[slotIndex];
  if (offset === undefined || offset >= parsed.span.start) {
    return undefined;
  }
  return parseCommandLine(parsed.line.slice(offset), parsed.cursor - offset, database);
}

/**
 * Follow nested command lines down to the one the cursor is in, at most
 * `MAX_NESTING_DEPTH` levels deep.
 *
 * @example
 * innermostCommandLine(parseCommandLine('sudo git ch', 11, db), db).command; // 'git'
 */
export function innermostCommandLine(parsed: ParsedCommandLine, database: SchemaLookup): ParsedCommandLine {
  let current = parsed;
  for (let depth = 0; depth < MAX_NESTING_DEPTH; depth++) {
    const nested = nestedCommandLine(current, database);
    if (!nested) {
      break;
    }
    current = nested;
  }
  return current;
}

/**
 * Complete a command name: schema commands, then common commands, then PATH
 * executables. A token containing `/` is completed as a path instead.
 */
export function completeCommandNames(token: string, ctx: GeneratorContext): CompletionCandidate[] {
  if (token.includes('/')) {
    return completePaths(token, { cwd: ctx.cwd, env: ctx.env, cache: ctx.caches.paths, matcher: ctx.matcher });
  }

  const candidates: CompletionCandidate[] = [];
  for (const name of ctx.database.names()) {
    if (ctx.matcher(name, token)) {
      candidates.push(createCandidate(name, 'command', PRIORITY.command, ctx.database.get(name)?.description));
    }
  }
  for (const name of COMMON_COMMANDS) {
    if (!ctx.database.has(name) && ctx.matcher(name, token)) {
      candidates.push(createCandidate(name, 'command', PRIORITY.command));
    }
  }
  candidates.push(...findExecutables(token, { env: ctx.env, cache: ctx.caches.executables, matcher: ctx.matcher }));
  return candidates;
}

function completeEnvironment(token: string, ctx: GeneratorContext): CompletionCandidate[] {
  const sigil = token.startsWith('$') ? '$' : '';
  const prefix = token.slice(sigil.length);
  return Object.keys(ctx.env)
    .filter(name => ctx.matcher(name, prefix))
    .sort()
    .map(name => argumentCandidate(`${sigil}${name}`));
}

/**
 * Candidates for a value of the given argument type. `String`, `Number`,
 * `Url` and `Regex` have no generator and yield nothing.
 */
export async function completeArgumentType(
  argType: ArgumentType,
  parsed: ParsedCommandLine,
  ctx: GeneratorContext
): Promise<CompletionCandidate[]> {
  const token = parsed.currentToken;
  switch (argType.type) {
    case 'File':
      return completePaths(token, {
        cwd: ctx.cwd,
        env: ctx.env,
        cache: ctx.caches.paths,
        matcher: ctx.matcher,
        extensions: argType.extensions,
      });
    case 'Directory':
      return completePaths(token, {
        cwd: ctx.cwd,
        env: ctx.env,
        cache: ctx.caches.paths,
        matcher: ctx.matcher,
        directoriesOnly: true,
      });
    case 'Choice':
      return argType.choices.filter(choice => ctx.matcher(choice, token)).map(choice => argumentCandidate(choice));
    case 'Command':
    case 'CommandWithArgs':
      return completeCommandNames(token, ctx);
    case 'Environment':
      return completeEnvironment(token, ctx);
    case 'Signal':
      return completeSignals(token);
    case 'User':
      return userCandidates(
        listUsers(ctx.roots.passwdFile, ctx.config.includeSystemUsers, ctx.caches.users),
        token,
        ctx.matcher
      );
    case 'Group':
      return groupCandidates(listGroups(ctx.roots.groupFile, ctx.caches.groups), token, ctx.matcher);
    case 'Interface':
      return interfaceCandidates(listInterfaces(ctx.roots.netClassDir, ctx.caches.interfaces), token, ctx.matcher);
    case 'Script':
      return runScriptCompletion(argType.command, parsed, ctx);
    case 'String':
    case 'Number':
    case 'Url':
    case 'Regex':
      return [];
  }
}

function completeFiles(token: string, ctx: GeneratorContext): CompletionCandidate[] {
  return completePaths(token, { cwd: ctx.cwd, env: ctx.env, cache: ctx.caches.paths, matcher: ctx.matcher });
}

/**
 * Complete a value slot. A slot without a type, or of type `String` that
 * produced nothing, falls back to file completion.
 */
async function completeValue(
  argType: ArgumentType | undefined,
  parsed: ParsedCommandLine,
  ctx: GeneratorContext
): Promise<CompletionCandidate[]> {
  if (!argType) {
    return completeFiles(parsed.currentToken, ctx);
  }
  const candidates = await safely(`${argType.type} completion`, () => completeArgumentType(argType, parsed, ctx), ctx.signal);
  if (candidates.length === 0 && argType.type === 'String') {
    return completeFiles(parsed.currentToken, ctx);
  }
  return candidates;
}

function completeOptions(
  schema: CommandCompletion,
  parsed: ParsedCommandLine,
  ctx: GeneratorContext
): CompletionCandidate[] {
  const token = parsed.currentToken;
  const used = new Set(parsed.specifiedOptions);
  const candidates: CompletionCandidate[] = [];
  for (const option of collectOptions(schema, parsed.subcommandPath)) {
    if (option.short && !used.has(option.short) && ctx.matcher(option.short, token)) {
      candidates.push(shortOptionCandidate(option.short, option.description));
    }
    if (option.long && !used.has(option.long) && ctx.matcher(option.long, token)) {
      candidates.push(longOptionCandidate(option.long, option.description));
    }
  }
  return candidates;
}

function completeRedirectTarget(parsed: ParsedCommandLine, ctx: GeneratorContext): CompletionCandidate[] {
  const { prefix, target } = splitRedirectPrefix(parsed.currentToken);
  return completeFiles(target, ctx).map(candidate =>
    prefix ? createCandidate(prefix + candidate.text, candidate.kind, candidate.priority, candidate.description) : candidate
  );
}

function matchSubcommands(
  schema: CommandCompletion,
  parsed: ParsedCommandLine,
  ctx: GeneratorContext
): CompletionCandidate[] {
  const token = parsed.currentToken;
  const path = parsed.subcommandPath;
  const node = findSubcommand(schema, path);
  const children = path.length > 0 && !node ? schema.subcommands : childSubcommands(schema, path);
  return children
    .filter(sub => ctx.matcher(sub.name, token) || sub.aliases.some(alias => ctx.matcher(alias, token)))
    .map(sub => subcommandCandidate(sub.name, sub.description));
}

async function completeSubcommands(
  schema: CommandCompletion | undefined,
  parsed: ParsedCommandLine,
  ctx: GeneratorContext
): Promise<CompletionCandidate[]> {
  if (!schema) {
    return completeFiles(parsed.currentToken, ctx);
  }

  const token = parsed.currentToken;
  const path = parsed.subcommandPath;
  const matches = matchSubcommands(schema, parsed, ctx);
  if (matches.length > 0) {
    return matches;
  }

  // Nothing to offer as a subcommand: treat the token as the first unfilled argument
  const argIndex = parsed.specifiedArguments.length - (token ? 1 : 0);
  const slot = argumentAt(argumentsFor(schema, path), argIndex);
  const values = await completeValue(slot?.argType, parsed, ctx);
  const globals = completeOptions(schema, { ...parsed, subcommandPath: [] }, ctx);
  return [...values, ...globals];
}

/**
 * Generate schema-driven and filesystem candidates for a parsed line.
 *
 * @example
 * const candidates = await generateStatic(parseCommandLine('git c', 5, db), ctx);
 * candidates.map(c => c.text); // ['commit', 'checkout', 'clone', 'config']
 */
export async function generateStatic(parsed: ParsedCommandLine, ctx: GeneratorContext): Promise<CompletionCandidate[]> {
  const context = parsed.completionContext;
  const schema = context.type === 'Command' ? undefined : ctx.database.get(parsed.command);

  switch (context.type) {
    case 'Command':
      return completeCommandNames(parsed.currentToken, ctx);
    case 'SubCommand':
      return completeSubcommands(schema, parsed, ctx);
    case 'ShortOption':
    case 'LongOption':
      return schema ? completeOptions(schema, parsed, ctx) : [];
    case 'OptionValue':
      return completeValue(context.valueType, parsed, ctx);
    case 'Argument':
      if (parsed.redirectTarget) {
        return completeRedirectTarget(parsed, ctx);
      }
      if (schema && context.argIndex === 0 && parsed.currentToken) {
        // The parser classifies by prefix; a fuzzy matcher can still hit a subcommand
        const subcommands = matchSubcommands(schema, parsed, ctx);
        return [...subcommands, ...(await completeValue(context.argType, parsed, ctx))];
      }
      return completeValue(context.argType, parsed, ctx);
    case 'Unknown':
      return [];
  }
}
