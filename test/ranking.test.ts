import { describe, it, expect } from 'vitest';
import { createCandidate, fileCandidate, subcommandCandidate } from '../src/completion/candidate';
import {
  baseName,
  dedupeCandidates,
  fuzzyMatcher,
  fuzzyScore,
  prefixMatcher,
  smartRank,
  sortByPriority,
} from '../src/completion/ranking';
import { texts } from './helpers';

describe('dedupeCandidates', () => {
  it('should let an executable replace a file of the same name', () => {
    const executable = createCandidate('deploy', 'executable', 55, '~/bin');
    expect(dedupeCandidates([fileCandidate('deploy'), executable])).toEqual([executable]);
  });

  it('should keep the first candidate in other collisions', () => {
    const subcommand = subcommandCandidate('git');
    const history = createCandidate('git', 'history', 30, 'used once');
    expect(dedupeCandidates([subcommand, history])).toEqual([subcommand]);
  });

  it('should keep candidates that only share a base name', () => {
    const result = dedupeCandidates([
      fileCandidate('src/main.ts'),
      fileCandidate('lib/main.ts'),
      createCandidate('origin/main', 'argument', 100),
      createCandidate('main', 'argument', 100),
    ]);
    expect(texts(result)).toEqual(['src/main.ts', 'lib/main.ts', 'origin/main', 'main']);
  });

  it('should let an executable shadow files in other directories with its base name', () => {
    const executable = createCandidate('deploy', 'executable', 55, '~/bin');
    const result = dedupeCandidates([fileCandidate('./deploy'), fileCandidate('a.ts'), fileCandidate('bin/deploy'), executable]);
    expect(result).toEqual([executable, fileCandidate('a.ts')]);
  });

  it('should not let an executable shadow a directory', () => {
    const directory = createCandidate('deploy/', 'directory', 50);
    const executable = createCandidate('deploy', 'executable', 55);
    expect(dedupeCandidates([directory, executable])).toEqual([directory, executable]);
  });

  it('should strip a trailing slash for the base name', () => {
    expect(baseName('src/completion/')).toBe('completion');
    expect(baseName('plain')).toBe('plain');
  });
});

describe('sortByPriority', () => {
  it('should sort by descending priority and keep ties in order', () => {
    const sorted = sortByPriority([
      fileCandidate('b'),
      subcommandCandidate('x'),
      fileCandidate('a'),
      createCandidate('y', 'command', 60),
    ]);
    expect(texts(sorted)).toEqual(['x', 'y', 'b', 'a']);
  });
});

describe('fuzzyScore', () => {
  it('should score subsequence matches', () => {
    expect(fuzzyScore('commit', 'cmt')).toBe(3);
    expect(fuzzyScore('commit', 'co')).toBe(7);
    expect(fuzzyScore('checkout', 'co')).toBe(1);
  });

  it('should return null when the query is not a subsequence', () => {
    expect(fuzzyScore('commit', 'xyz')).toBeNull();
  });

  it('should ignore case unless the query has uppercase letters', () => {
    expect(fuzzyScore('Makefile', 'mf')).toBe(2);
    expect(fuzzyScore('Makefile', 'MF')).toBeNull();
  });

  it('should score an empty query as zero', () => {
    expect(fuzzyScore('anything', '')).toBe(0);
  });
});

describe('matchers', () => {
  it('should match by prefix or by subsequence', () => {
    expect(prefixMatcher('commit', 'com')).toBe(true);
    expect(prefixMatcher('commit', 'cmt')).toBe(false);
    expect(fuzzyMatcher('commit', 'cmt')).toBe(true);
  });
});

describe('smartRank', () => {
  it('should put exact matches first, then prefixes, then fuzzy matches by score', () => {
    const ranked = smartRank(['checkout', 'commit', 'co', 'cargo', 'xyz'].map(t => subcommandCandidate(t)), 'co');
    expect(texts(ranked)).toEqual(['co', 'commit', 'cargo', 'checkout']);
  });

  it('should return everything for an empty query', () => {
    expect(texts(smartRank([subcommandCandidate('a'), subcommandCandidate('b')], ''))).toEqual(['a', 'b']);
  });
});
