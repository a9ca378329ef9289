/**
 * @fileoverview In-memory command schema database.
 *
 * Holds one `CommandCompletion` per command name and provides helpers for
 * walking a command's subcommand tree. The first schema registered for a
 * name wins; later registrations are ignored.
 *
 * @module completion/database
 */

import type { Argument, CommandCompletion, CommandOption, SubCommand } from './types';

/**
 * Read-only view of a schema database, as consumed by the parser and generators.
 */
export interface SchemaLookup {
  get(command: string): CommandCompletion | undefined;
  has(command: string): boolean;
  names(): string[];
}

/**
 * Name-keyed store of command schemas.
 *
 * @example
 * const db = new CompletionDatabase();
 * db.register(gitSchema);
 * db.freeze();
 * db.get('git')?.subcommands.length;
 */
export class CompletionDatabase implements SchemaLookup {
  private schemas: Map<string, CommandCompletion> = new Map();
  private frozen = false;

  /**
   * Add a schema unless one is already registered under the same name.
   *
   * @returns True if the schema was added
   * @throws Error if the database has been frozen
   */
  register(schema: CommandCompletion): boolean {
    if (this.frozen) {
      throw new Error(`Cannot register '${schema.command}': completion database is frozen`);
    }
    if (this.schemas.has(schema.command)) {
      return false;
    }
    this.schemas.set(schema.command, schema);
    return true;
  }

  get(command: string): CommandCompletion | undefined {
    return this.schemas.get(command);
  }

  has(command: string): boolean {
    return this.schemas.has(command);
  }

  /** Registered command names, sorted */
  names(): string[] {
    return [...this.schemas.keys()].sort();
  }

  get size(): number {
    return this.schemas.size;
  }

  /** Prevent further registrations */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}

/**
 * Check whether a subcommand answers to the given word (name or alias).
 */
export function subcommandMatches(sub: SubCommand, word: string): boolean {
  return sub.name === word || sub.aliases.includes(word);
}

/**
 * Walk a subcommand path from the command root.
 *
 * @returns The node at the end of the path, or undefined if any step is unknown
 *          or the path is empty
 */
export function findSubcommand(schema: CommandCompletion, path: readonly string[]): SubCommand | undefined {
  let children = schema.subcommands;
  let node: SubCommand | undefined;
  for (const word of path) {
    node = children.find(sub => subcommandMatches(sub, word));
    if (!node) {
      return undefined;
    }
    children = node.subcommands;
  }
  return node;
}

/**
 * Subcommands available after the given path.
 */
export function childSubcommands(schema: CommandCompletion, path: readonly string[]): readonly SubCommand[] {
  if (path.length === 0) {
    return schema.subcommands;
  }
  return findSubcommand(schema, path)?.subcommands ?? [];
}

/**
 * Options in effect after the given path: global options followed by the
 * options of every node along the path.
 */
export function collectOptions(schema: CommandCompletion, path: readonly string[]): CommandOption[] {
  const options: CommandOption[] = [...schema.globalOptions];
  let children = schema.subcommands;
  for (const word of path) {
    const node = children.find(sub => subcommandMatches(sub, word));
    if (!node) {
      break;
    }
    options.push(...node.options);
    children = node.subcommands;
  }
  return options;
}

/**
 * Find the option a token names. `--name=value` tokens match on the name part.
 */
export function findOption(
  schema: CommandCompletion,
  path: readonly string[],
  token: string
): CommandOption | undefined {
  const name = token.startsWith('--') && token.includes('=') ? token.slice(0, token.indexOf('=')) : token;
  return collectOptions(schema, path).find(opt => opt.short === name || opt.long === name);
}

/**
 * Positional argument slots for the given path. The root's arguments apply
 * when the path is empty.
 */
export function argumentsFor(schema: CommandCompletion, path: readonly string[]): readonly Argument[] {
  if (path.length === 0) {
    return schema.arguments;
  }
  return findSubcommand(schema, path)?.arguments ?? [];
}

/**
 * The argument slot at a position. A trailing `multiple` or `CommandWithArgs`
 * slot absorbs every position past the end of the list.
 */
export function argumentAt(args: readonly Argument[], index: number): Argument | undefined {
  if (index < 0) {
    return undefined;
  }
  if (index < args.length) {
    return args[index];
  }
  const last = args[args.length - 1];
  if (last && (last.multiple || last.argType?.type === 'CommandWithArgs')) {
    return last;
  }
  return undefined;
}
