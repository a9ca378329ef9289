/**
 * @fileoverview Candidate deduplication, fuzzy scoring and ranking.
 *
 * @module completion/ranking
 */

import type { CompletionCandidate, TokenMatcher } from './types';

const WORD_SEPARATORS = new Set(['-', '_', '/', '.', ' ', ':']);

/**
 * Final path segment of a candidate text, ignoring a trailing `/`.
 */
export function baseName(text: string): string {
  const trimmed = text.endsWith('/') ? text.slice(0, -1) : text;
  const slash = trimmed.lastIndexOf('/');
  return slash === -1 ? trimmed : trimmed.slice(slash + 1);
}

/**
 * Remove candidates with the same text, keeping the first one seen.
 *
 * An executable also shadows every plain file with the same base name: it
 * takes the place of the first such file and the others are dropped. Order
 * is otherwise preserved.
 *
 * @example
 * dedupeCandidates([file('./deploy'), executable('deploy')]); // [executable('deploy')]
 */
export function dedupeCandidates(candidates: readonly CompletionCandidate[]): CompletionCandidate[] {
  const executables = new Map<string, CompletionCandidate>();
  for (const candidate of candidates) {
    const base = baseName(candidate.text);
    if (candidate.kind === 'executable' && !executables.has(base)) {
      executables.set(base, candidate);
    }
  }

  const result: CompletionCandidate[] = [];
  const seen = new Set<string>();
  for (const candidate of candidates) {
    const shadowing = candidate.kind === 'file' ? executables.get(baseName(candidate.text)) : undefined;
    const chosen = shadowing ?? candidate;
    if (seen.has(chosen.text)) {
      continue;
    }
    seen.add(chosen.text);
    result.push(chosen);
  }
  return result;
}

/**
 * Stable sort by descending priority.
 */
export function sortByPriority(candidates: readonly CompletionCandidate[]): CompletionCandidate[] {
  return [...candidates].sort((a, b) => b.priority - a.priority);
}

/**
 * Score how well `query` matches `text` as an ordered subsequence.
 *
 * Every matched character scores 1, consecutive matches add 2 per character
 * of the run so far, and a match at the start of the text or right after a
 * separator (`-`, `_`, `/`, `.`, `:`, space) adds 3. The span between the
 * first and last match that is not part of the query is subtracted. Matching
 * ignores case unless the query contains an uppercase letter.
 *
 * @returns The score, or null when `query` is not a subsequence of `text`
 *
 * @example
 * fuzzyScore('commit', 'cmt'); // 3
 * fuzzyScore('commit', 'xyz'); // null
 */
export function fuzzyScore(text: string, query: string): number | null {
  if (query.length === 0) {
    return 0;
  }
  const caseSensitive = query !== query.toLowerCase();
  const haystack = caseSensitive ? text : text.toLowerCase();
  const needle = caseSensitive ? query : query.toLowerCase();

  let score = 0;
  let qi = 0;
  let streak = 0;
  let firstMatch = -1;
  let lastMatch = -1;

  for (let i = 0; i < haystack.length && qi < needle.length; i++) {
    if (haystack[i] !== needle[qi]) {
      continue;
    }
    streak = lastMatch === i - 1 && lastMatch !== -1 ? streak + 1 : 1;
    score += 1 + (streak - 1) * 2;
    if (i === 0 || WORD_SEPARATORS.has(haystack[i - 1])) {
      score += 3;
    }
    if (firstMatch === -1) {
      firstMatch = i;
    }
    lastMatch = i;
    qi++;
  }

  if (qi < needle.length) {
    return null;
  }
  return score - (lastMatch - firstMatch + 1 - needle.length);
}

/** Prefix matcher used when fuzzy mode is off */
export const prefixMatcher: TokenMatcher = (text, token) => text.startsWith(token);

/** Subsequence matcher used in fuzzy mode */
export const fuzzyMatcher: TokenMatcher = (text, token) => fuzzyScore(text, token) !== null;

/**
 * Order candidates for fuzzy mode: exact matches, then prefix matches, then
 * the remaining subsequence matches by descending score. Within the exact and
 * prefix groups, and between equal scores, the incoming order is kept.
 * Candidates that do not match the query at all are dropped.
 *
 * @example
 * smartRank(['checkout', 'commit', 'co'].map(sub), 'co');
 * // texts: ['co', 'commit', 'checkout']
 */
export function smartRank(candidates: readonly CompletionCandidate[], query: string): CompletionCandidate[] {
  if (query.length === 0) {
    return [...candidates];
  }
  const exact: CompletionCandidate[] = [];
  const prefix: CompletionCandidate[] = [];
  const fuzzy: Array<{ candidate: CompletionCandidate; score: number }> = [];

  for (const candidate of candidates) {
    if (candidate.text === query) {
      exact.push(candidate);
    } else if (candidate.text.startsWith(query)) {
      prefix.push(candidate);
    } else {
      const score = fuzzyScore(candidate.text, query);
      if (score !== null) {
        fuzzy.push({ candidate, score });
      }
    }
  }

  fuzzy.sort((a, b) => b.score - a.score);
  return [...exact, ...prefix, ...fuzzy.map(entry => entry.candidate)];
}
