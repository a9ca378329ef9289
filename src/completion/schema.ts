/**
 * @fileoverview Completion definition file format and validation.
 *
 * Definition files are JSON or YAML documents in snake_case:
 *
 * ```json
 * {
 *   "command": "cargo",
 *   "global_options": [{ "short": "-v", "long": "--verbose" }],
 *   "subcommands": [
 *     {
 *       "name": "build",
 *       "aliases": ["b"],
 *       "options": [{ "long": "--target", "takes_value": true }],
 *       "arguments": []
 *     }
 *   ],
 *   "arguments": []
 * }
 * ```
 *
 * Argument types are either a bare name (`"Directory"`) or a tagged object
 * (`{ "type": "File", "data": { "extensions": [".rs"] } }`,
 * `{ "type": "Choice", "data": ["debug", "release"] }`,
 * `{ "type": "Script", "data": { "command": "make -qp | ..." } }`).
 *
 * @module completion/schema
 */

import { z } from 'zod';
import type { Argument, ArgumentType, CommandCompletion, CommandOption, SubCommand } from './types';

/** Argument types that carry no data */
const TAGLESS_TYPE_NAMES = [
  'Directory',
  'Command',
  'CommandWithArgs',
  'Environment',
  'String',
  'Number',
  'Url',
  'Regex',
  'Signal',
  'User',
  'Group',
  'Interface',
] as const;

/** Argument types that can be written as a bare name */
const BARE_TYPE_NAMES = ['File', ...TAGLESS_TYPE_NAMES] as const;

const argumentTypeSchema = z.union([
  z.enum(BARE_TYPE_NAMES),
  z.object({
    type: z.literal('File'),
    data: z.object({ extensions: z.array(z.string()).optional() }).nullish(),
  }),
  z.object({ type: z.literal('Choice'), data: z.array(z.string()).min(1) }),
  z.object({ type: z.literal('Script'), data: z.object({ command: z.string().min(1) }) }),
  z.object({ type: z.enum(TAGLESS_TYPE_NAMES) }),
]);

const optionSchema = z
  .object({
    short: z.string().optional(),
    long: z.string().optional(),
    description: z.string().optional(),
    takes_value: z.boolean().optional(),
    value_type: argumentTypeSchema.optional(),
  })
  .superRefine((option, ctx) => {
    if (option.short === undefined && option.long === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'option must have a short or long form' });
    }
    if (option.short !== undefined && !isValidShortOption(option.short)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['short'],
        message: `invalid short option '${option.short}': expected a single dash followed by a character`,
      });
    }
    if (option.long !== undefined && !isValidLongOption(option.long)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['long'],
        message: `invalid long option '${option.long}': expected two dashes followed by a name`,
      });
    }
  });

/** Names are matched against single shell words */
const wordSchema = (what: string) => z.string().regex(/^\S+$/, `${what} must be a single non-empty word`);

const argumentSchema = z.object({
  name: wordSchema('argument name'),
  description: z.string().optional(),
  arg_type: argumentTypeSchema.optional(),
  multiple: z.boolean().optional(),
});

type WireArgumentType = z.infer<typeof argumentTypeSchema>;
type WireOption = z.infer<typeof optionSchema>;
type WireArgument = z.infer<typeof argumentSchema>;

interface WireSubCommand {
  name: string;
  description?: string;
  aliases?: string[];
  options?: WireOption[];
  arguments?: WireArgument[];
  subcommands?: WireSubCommand[];
}

const subCommandSchema: z.ZodType<WireSubCommand> = z.lazy(() =>
  z.object({
    name: wordSchema('subcommand name'),
    description: z.string().optional(),
    aliases: z.array(wordSchema('alias')).optional(),
    options: z.array(optionSchema).optional(),
    arguments: z.array(argumentSchema).optional(),
    subcommands: z.array(subCommandSchema).optional(),
  })
);

const commandSchema = z.object({
  command: wordSchema('command'),
  description: z.string().optional(),
  global_options: z.array(optionSchema).optional(),
  subcommands: z.array(subCommandSchema).optional(),
  arguments: z.array(argumentSchema).optional(),
});

/**
 * Error raised when a completion definition fails validation.
 */
export class SchemaError extends Error {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid completion definition in ${source}: ${issues.join('; ')}`);
    this.name = 'SchemaError';
    this.source = source;
    this.issues = issues;
  }
}

/**
 * Check a short option form: one dash followed by exactly one character
 * that is not a dash (`-v`, `-1`).
 */
export function isValidShortOption(value: string): boolean {
  return value.length === 2 && value[0] === '-' && value[1] !== '-';
}

/**
 * Check a long option form: two dashes followed by a name (`--verbose`).
 */
export function isValidLongOption(value: string): boolean {
  return value.startsWith('--') && value.length > 2 && value[2] !== '-';
}

function toArgumentType(wire: WireArgumentType): ArgumentType {
  if (typeof wire === 'string') {
    return { type: wire };
  }
  switch (wire.type) {
    case 'File':
      return wire.data?.extensions ? { type: 'File', extensions: wire.data.extensions } : { type: 'File' };
    case 'Choice':
      return { type: 'Choice', choices: wire.data };
    case 'Script':
      return { type: 'Script', command: wire.data.command };
    default:
      return { type: wire.type };
  }
}

function toOption(wire: WireOption): CommandOption {
  const option: CommandOption = { takesValue: wire.takes_value ?? false };
  if (wire.short !== undefined) option.short = wire.short;
  if (wire.long !== undefined) option.long = wire.long;
  if (wire.description !== undefined) option.description = wire.description;
  if (wire.value_type !== undefined) option.valueType = toArgumentType(wire.value_type);
  return option;
}

function toArgument(wire: WireArgument): Argument {
  const argument: Argument = { name: wire.name, multiple: wire.multiple ?? false };
  if (wire.description !== undefined) argument.description = wire.description;
  if (wire.arg_type !== undefined) argument.argType = toArgumentType(wire.arg_type);
  return argument;
}

function toSubCommand(wire: WireSubCommand): SubCommand {
  const sub: SubCommand = {
    name: wire.name,
    aliases: wire.aliases ?? [],
    options: (wire.options ?? []).map(toOption),
    arguments: (wire.arguments ?? []).map(toArgument),
    subcommands: (wire.subcommands ?? []).map(toSubCommand),
  };
  if (wire.description !== undefined) sub.description = wire.description;
  return sub;
}

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Validate a decoded definition document and convert it to a schema.
 *
 * @param raw - Decoded JSON or YAML document
 * @param source - File name or label used in error messages
 * @returns The validated command schema
 * @throws SchemaError if the document does not describe a valid command
 *
 * @example
 * parseCommandDefinition({ command: 'make', arguments: [{ name: 'target' }] }, 'make.json');
 */
export function parseCommandDefinition(raw: unknown, source: string): CommandCompletion {
  const result = commandSchema.safeParse(raw);
  if (!result.success) {
    throw new SchemaError(source, result.error.issues.map(formatIssue));
  }
  const wire = result.data;
  const schema: CommandCompletion = {
    command: wire.command,
    globalOptions: (wire.global_options ?? []).map(toOption),
    subcommands: (wire.subcommands ?? []).map(toSubCommand),
    arguments: (wire.arguments ?? []).map(toArgument),
  };
  if (wire.description !== undefined) schema.description = wire.description;
  return schema;
}
