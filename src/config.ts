/**
 * @fileoverview Completion engine configuration.
 *
 * Settings are resolved in three layers, later layers winning:
 * 1. Built-in defaults
 * 2. `config.json` (or `config.yaml`) in the shellcomp config directory
 * 3. Environment variables
 *
 * Directory layout:
 * <config dir>/
 *   config.json        # Settings (optional)
 *   completions/       # User completion definitions (*.json, *.yaml)
 *
 * The config directory is `$SHELLCOMP_CONFIG_DIR` when set, otherwise
 * `shellcomp` under the platform configuration root.
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { homeDir, platformConfigRoot } from './utils/environment';
import { warn } from './utils/log';

/** Time-to-live, in milliseconds, of each completion cache */
export interface CacheTtlConfig {
  paths: number;
  scripts: number;
  users: number;
  groups: number;
  interfaces: number;
}

export interface ShellcompConfig {
  /** Maximum number of candidates returned per request */
  maxResults: number;
  /** Fuzzy subsequence matching with smart ranking */
  fuzzy: boolean;
  /** Hard timeout for every subprocess a completion spawns */
  subprocessTimeoutMs: number;
  /** Offer accounts with UID below 1000 (root is always offered) */
  includeSystemUsers: boolean;
  cacheTtl: CacheTtlConfig;
}

export const DEFAULT_CONFIG: Readonly<ShellcompConfig> = Object.freeze({
  maxResults: 30,
  fuzzy: false,
  subprocessTimeoutMs: 1500,
  includeSystemUsers: false,
  cacheTtl: Object.freeze({
    paths: 2000,
    scripts: 3000,
    users: 5000,
    groups: 5000,
    interfaces: 2000,
  }),
});

const ttlSchema = z.number().int().nonnegative();

const fileConfigSchema = z
  .object({
    maxResults: z.number().int().positive(),
    fuzzy: z.boolean(),
    subprocessTimeoutMs: z.number().int().positive(),
    includeSystemUsers: z.boolean(),
    cacheTtl: z
      .object({
        paths: ttlSchema,
        scripts: ttlSchema,
        users: ttlSchema,
        groups: ttlSchema,
        interfaces: ttlSchema,
      })
      .partial(),
  })
  .partial();

type FileConfig = z.infer<typeof fileConfigSchema>;

const APP_NAME = 'shellcomp';

/**
 * Get the shellcomp config directory.
 * Uses SHELLCOMP_CONFIG_DIR if set, otherwise `<platform config root>/shellcomp`.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const envDir = env.SHELLCOMP_CONFIG_DIR;
  if (envDir) {
    return envDir;
  }
  return path.join(platformConfigRoot(env), APP_NAME);
}

/**
 * Directories searched for user completion definitions, in lookup order:
 * the config directory, `~/.config/shellcomp`, then `./completions` under
 * the working directory. Duplicates are removed.
 */
export function completionSearchDirs(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string[] {
  const dirs = [
    path.join(getConfigDir(env), 'completions'),
    path.join(homeDir(env), '.config', APP_NAME, 'completions'),
    path.resolve(cwd, 'completions'),
  ];
  return [...new Set(dirs)];
}

function readConfigFile(configDir: string): FileConfig {
  for (const name of ['config.json', 'config.yaml', 'config.yml']) {
    const file = path.join(configDir, name);
    let content: string;
    try {
      content = fs.readFileSync(file, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        continue;
      }
      warn(`Failed to read ${file}`, error);
      return {};
    }

    let raw: unknown;
    try {
      raw = name.endsWith('.json') ? JSON.parse(content) : yaml.load(content);
    } catch (error) {
      warn(`Invalid config file ${file}`, error);
      return {};
    }

    const result = fileConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
      warn(`Invalid config file ${file}`, result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
      return {};
    }
    return result.data;
  }
  return {};
}

function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    warn(`Ignoring ${name}=${value}: expected a positive integer`);
    return undefined;
  }
  return parsed;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return !['0', 'false', 'no', 'off'].includes(value.toLowerCase());
}

/**
 * Resolve the effective configuration.
 *
 * @param env - Environment to read (defaults to process.env)
 * @returns Defaults overlaid with the config file and environment variables
 *
 * @example
 * // SHELLCOMP_MAX_RESULTS=10 SHELLCOMP_FUZZY=1
 * loadConfig().maxResults; // 10
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ShellcompConfig {
  const file = readConfigFile(getConfigDir(env));

  return {
    maxResults: parsePositiveInt('SHELLCOMP_MAX_RESULTS', env.SHELLCOMP_MAX_RESULTS)
      ?? file.maxResults
      ?? DEFAULT_CONFIG.maxResults,
    fuzzy: parseFlag(env.SHELLCOMP_FUZZY) ?? file.fuzzy ?? DEFAULT_CONFIG.fuzzy,
    subprocessTimeoutMs: parsePositiveInt('SHELLCOMP_TIMEOUT_MS', env.SHELLCOMP_TIMEOUT_MS)
      ?? file.subprocessTimeoutMs
      ?? DEFAULT_CONFIG.subprocessTimeoutMs,
    includeSystemUsers: file.includeSystemUsers ?? DEFAULT_CONFIG.includeSystemUsers,
    cacheTtl: { ...DEFAULT_CONFIG.cacheTtl, ...file.cacheTtl },
  };
}
