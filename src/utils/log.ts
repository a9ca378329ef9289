/**
 * @fileoverview Logging helpers shared by the completion pipeline.
 *
 * Warnings go to `console.warn` with a `[shellcomp]` prefix. Debug output is
 * printed only when `SHELLCOMP_DEBUG` is set.
 *
 * @module utils/log
 */

const PREFIX = '[shellcomp]';

/**
 * Render an unknown thrown value as a message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log a recoverable failure.
 *
 * @example
 * warn('git branches', err); // [shellcomp] git branches: spawn git ENOENT
 */
export function warn(context: string, error?: unknown): void {
  if (error === undefined) {
    console.warn(`${PREFIX} ${context}`);
  } else {
    console.warn(`${PREFIX} ${context}: ${describeError(error)}`);
  }
}

export function debugLog(...args: unknown[]): void {
  if (process.env.SHELLCOMP_DEBUG) {
    console.debug(PREFIX, ...args);
  }
}
