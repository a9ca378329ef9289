import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import { parseArgs } from '../src/cli/args';

describe('parseArgs', () => {
  it('should take the line after a double dash', () => {
    const args = parseArgs(['--cursor', '3', '--', 'git', 'ch']);
    expect(args.line).toBe('git ch');
    expect(args.cursor).toBe(3);
    expect(args.errors).toEqual([]);
  });

  it('should read flags and short aliases', () => {
    const args = parseArgs(['--fuzzy', '--json', '-n', '5', 'git', 'st']);
    expect(args).toMatchObject({ fuzzy: true, json: true, maxResults: 5, line: 'git st' });
  });

  it('should keep dashes after the double dash literal', () => {
    const args = parseArgs(['--', 'ls', '-la']);
    expect(args.line).toBe('ls -la');
    expect(args.errors).toEqual([]);
  });

  it('should resolve directories and files', () => {
    const args = parseArgs(['--cwd', '/tmp/project', '--history', '/tmp/hist']);
    expect(args.cwd).toBe(path.resolve('/tmp/project'));
    expect(args.historyFile).toBe(path.resolve('/tmp/hist'));
  });

  it('should report bad numbers and unknown options', () => {
    expect(parseArgs(['--max', '0']).errors).toEqual(["--max expects a positive integer, got '0'"]);
    expect(parseArgs(['--cursor', 'x']).errors).toEqual(["--cursor expects a non-negative integer, got 'x'"]);
    expect(parseArgs(['--bogus']).errors).toEqual(['Unknown option: --bogus']);
    expect(parseArgs(['--cwd']).errors).toEqual(['--cwd expects a directory']);
  });

  it('should recognize the informational flags', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['-v']).version).toBe(true);
    expect(parseArgs(['--list-commands']).listCommands).toBe(true);
    expect(parseArgs(['--apply', '--prefix'])).toMatchObject({ apply: true, prefix: true });
  });
});
