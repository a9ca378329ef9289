/**
 * @fileoverview Failure isolation for candidate sources.
 *
 * @module completion/guard
 */

import type { CompletionCandidate } from './types';
import { isAbortError } from './dynamic/runner';
import { warn } from '../utils/log';

/**
 * Run one candidate source, turning any failure into an empty contribution.
 *
 * Failures are logged with the source label; aborts are not logged.
 *
 * @example
 * const branches = await safely('git branches', () => listBranches(parsed, ctx));
 */
export async function safely(
  label: string,
  source: () => CompletionCandidate[] | Promise<CompletionCandidate[]>,
  signal?: AbortSignal
): Promise<CompletionCandidate[]> {
  try {
    return await source();
  } catch (error) {
    if (!isAbortError(error) && !signal?.aborted) {
      warn(`${label} failed`, error);
    }
    return [];
  }
}
