/**
 * @fileoverview Dynamic completion handlers.
 *
 * Handlers produce candidates from live system state rather than from a
 * schema. The set is closed: each handler is a tagged variant and both
 * matching and generation switch over the tag exhaustively.
 *
 * @module completion/dynamic
 */

import type { CompletionCandidate, ParsedCommandLine } from '../types';
import type { GeneratorContext } from '../context';
import type { SchemaLookup } from '../database';
import { safely } from '../guard';
import { generateKill, matchesKill } from './kill';
import { generateSudo, matchesSudo } from './sudo';
import { generateGit, matchesGit } from './git';
import { generatePackages, matchesPackage } from './packages';

export type DynamicHandler =
  | { type: 'kill' }
  | { type: 'sudo' }
  | { type: 'git' }
  | { type: 'package' };

export const BUILTIN_HANDLERS: readonly DynamicHandler[] = [
  { type: 'kill' },
  { type: 'sudo' },
  { type: 'git' },
  { type: 'package' },
];

function assertNever(value: never): never {
  throw new Error(`Unknown dynamic handler: ${JSON.stringify(value)}`);
}

/**
 * Check whether a handler applies to the line. `schemas` lets handlers
 * resolve subcommand aliases.
 */
export function handlerMatches(handler: DynamicHandler, parsed: ParsedCommandLine, schemas?: SchemaLookup): boolean {
  switch (handler.type) {
    case 'kill':
      return matchesKill(parsed);
    case 'sudo':
      return matchesSudo(parsed);
    case 'git':
      return matchesGit(parsed, schemas);
    case 'package':
      return matchesPackage(parsed);
    default:
      return assertNever(handler);
  }
}

export function generateForHandler(
  handler: DynamicHandler,
  parsed: ParsedCommandLine,
  ctx: GeneratorContext
): Promise<CompletionCandidate[]> {
  switch (handler.type) {
    case 'kill':
      return generateKill(parsed, ctx);
    case 'sudo':
      return generateSudo(parsed, ctx);
    case 'git':
      return generateGit(parsed, ctx);
    case 'package':
      return generatePackages(parsed, ctx);
    default:
      return assertNever(handler);
  }
}

/**
 * Run every matching handler concurrently and concatenate their results in
 * handler order. A failing handler contributes nothing.
 */
export async function generateDynamic(
  parsed: ParsedCommandLine,
  ctx: GeneratorContext,
  handlers: readonly DynamicHandler[] = BUILTIN_HANDLERS
): Promise<CompletionCandidate[]> {
  const matching = handlers.filter(handler => handlerMatches(handler, parsed, ctx.database));
  const results = await Promise.all(
    matching.map(handler => safely(`${handler.type} completion`, () => generateForHandler(handler, parsed, ctx), ctx.signal))
  );
  return results.flat();
}
