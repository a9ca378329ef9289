/**
 * @fileoverview Environment lookup utilities.
 *
 * This module resolves the values completion depends on from a process
 * environment: the home directory, the executable search path and the
 * platform configuration directory.
 *
 * @module utils/environment
 */

import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Resolve the home directory, preferring `HOME` from the given environment.
 *
 * @param env - Environment to read (defaults to process.env)
 * @returns Absolute home directory path
 */
export const homeDir = (env: NodeJS.ProcessEnv = process.env): string => {
  return env.HOME || env.USERPROFILE || os.homedir();
};

/**
 * Expand a leading `~` or `~/` to the home directory.
 *
 * @example
 * expandHome('~/src', { HOME: '/home/ada' }); // '/home/ada/src'
 */
export const expandHome = (value: string, env: NodeJS.ProcessEnv = process.env): string => {
  if (value === '~') {
    return homeDir(env);
  }
  if (value.startsWith('~/')) {
    return path.join(homeDir(env), value.slice(2));
  }
  return value;
};

/**
 * Split `PATH` into its directories, dropping empty entries.
 *
 * @returns Directories in lookup order
 */
export const searchPath = (env: NodeJS.ProcessEnv = process.env): string[] => {
  const value = env.PATH ?? env.Path ?? '';
  return value.split(path.delimiter).filter(dir => dir.length > 0);
};

/**
 * Platform configuration root (without the application directory).
 *
 * - macOS: `~/Library/Application Support`
 * - Windows: `%APPDATA%`
 * - elsewhere: `$XDG_CONFIG_HOME` or `~/.config`
 */
export const platformConfigRoot = (env: NodeJS.ProcessEnv = process.env): string => {
  if (process.platform === 'darwin') {
    return path.join(homeDir(env), 'Library', 'Application Support');
  }
  if (process.platform === 'win32' && env.APPDATA) {
    return env.APPDATA;
  }
  return env.XDG_CONFIG_HOME || path.join(homeDir(env), '.config');
};

/**
 * Replace a leading home directory with `~` for display.
 *
 * @example
 * contractHome('/home/ada/bin', { HOME: '/home/ada' }); // '~/bin'
 */
export const contractHome = (value: string, env: NodeJS.ProcessEnv = process.env): string => {
  const home = homeDir(env);
  if (value === home) {
    return '~';
  }
  if (home && value.startsWith(home + path.sep)) {
    return '~' + value.slice(home.length);
  }
  return value;
};
