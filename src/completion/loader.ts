/**
 * @fileoverview Completion definition loading.
 *
 * Builds a `CompletionDatabase` from the bundled definitions followed by
 * every `*.json`, `*.yaml` and `*.yml` file in the user definition
 * directories (see `completionSearchDirs()`). The first definition for a
 * command name wins. A file that cannot be read, decoded or validated is
 * logged and skipped; it never aborts the load.
 *
 * @module completion/loader
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import type { CommandCompletion } from './types';
import { CompletionDatabase } from './database';
import { parseCommandDefinition, SchemaError } from './schema';
import { BUNDLED_DEFINITIONS, type DefinitionSource } from './bundled';
import { completionSearchDirs } from '../config';
import { debugLog, describeError, warn } from '../utils/log';

const DEFINITION_EXTENSIONS = ['.json', '.yaml', '.yml'];

export interface LoadOptions {
  /** Environment used to locate the config directory */
  env?: NodeJS.ProcessEnv;
  /** Working directory for the `./completions` lookup */
  cwd?: string;
  /** Replace the default user definition directories */
  searchDirs?: readonly string[];
  /** Register the bundled definitions first (default true) */
  includeBundled?: boolean;
  /** Extra definitions registered after the bundled ones */
  definitions?: readonly DefinitionSource[];
}

export interface LoadReport {
  database: CompletionDatabase;
  /** Sources whose definition was registered */
  loaded: string[];
  /** Sources that were valid but named an already registered command */
  shadowed: string[];
  /** Sources that failed, with the reason */
  skipped: Array<{ source: string; error: string }>;
}

/**
 * Decode a definition file's text as JSON or YAML, by extension.
 */
export function decodeDefinition(content: string, file: string): unknown {
  const ext = path.extname(file).toLowerCase();
  try {
    return ext === '.json' ? JSON.parse(content) : yaml.load(content, { filename: file });
  } catch (error) {
    throw new SchemaError(file, [`${ext === '.json' ? 'invalid JSON' : 'invalid YAML'}: ${describeError(error)}`]);
  }
}

/**
 * Read and validate one definition file.
 *
 * @throws SchemaError if the file cannot be decoded or is not a valid definition
 */
export function readDefinitionFile(file: string): CommandCompletion {
  const content = fs.readFileSync(file, 'utf-8');
  return parseCommandDefinition(decodeDefinition(content, file), file);
}

/**
 * List definition files in a directory, sorted by name. A missing directory
 * has no files.
 */
export function listDefinitionFiles(dir: string): string[] {
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return [];
    }
    warn(`Failed to read completion directory ${dir}`, error);
    return [];
  }
  return names
    .filter(name => DEFINITION_EXTENSIONS.includes(path.extname(name).toLowerCase()))
    .sort()
    .map(name => path.join(dir, name));
}

/**
 * Build and freeze a completion database.
 *
 * @example
 * const { database, skipped } = loadCompletionDatabase({ searchDirs: ['/etc/shellcomp/completions'] });
 */
export function loadCompletionDatabase(options: LoadOptions = {}): LoadReport {
  const report: LoadReport = {
    database: new CompletionDatabase(),
    loaded: [],
    shadowed: [],
    skipped: [],
  };

  const register = (source: string, load: () => CommandCompletion) => {
    let schema: CommandCompletion;
    try {
      schema = load();
    } catch (error) {
      const message = describeError(error);
      warn(`Skipping completion definition ${source}`, message);
      report.skipped.push({ source, error: message });
      return;
    }
    if (report.database.register(schema)) {
      report.loaded.push(source);
    } else {
      debugLog(`${source}: '${schema.command}' is already defined, ignoring`);
      report.shadowed.push(source);
    }
  };

  const sources = [
    ...(options.includeBundled === false ? [] : BUNDLED_DEFINITIONS),
    ...(options.definitions ?? []),
  ];
  for (const { source, document } of sources) {
    register(source, () => parseCommandDefinition(document, source));
  }

  const dirs = options.searchDirs ?? completionSearchDirs(options.env, options.cwd);
  for (const dir of dirs) {
    for (const file of listDefinitionFiles(dir)) {
      register(file, () => readDefinitionFile(file));
    }
  }

  report.database.freeze();
  debugLog(`Loaded ${report.loaded.length} completion definitions, skipped ${report.skipped.length}`);
  return report;
}

let sharedDatabase: CompletionDatabase | null = null;

/**
 * The process-wide database, loaded with default options on first use.
 */
export function getSharedDatabase(): CompletionDatabase {
  if (!sharedDatabase) {
    sharedDatabase = loadCompletionDatabase().database;
  }
  return sharedDatabase;
}

/** Drop the process-wide database so the next use reloads it */
export function resetSharedDatabase(): void {
  sharedDatabase = null;
}
