/**
 * @fileoverview Public API of the shellcomp completion engine.
 *
 * @module shellcomp
 */

export { default as CompletionEngine, spliceCandidate } from './completion/engine';
export type { CompletionEngineOptions } from './completion/engine';
export type * from './completion/types';

export { parseCommandLine, tokenizeLine } from './completion/parser';
export { CompletionDatabase, type SchemaLookup } from './completion/database';
export { parseCommandDefinition, SchemaError } from './completion/schema';
export {
  loadCompletionDatabase,
  getSharedDatabase,
  resetSharedDatabase,
  type LoadOptions,
  type LoadReport,
} from './completion/loader';
export { BUNDLED_DEFINITIONS, type DefinitionSource } from './completion/bundled';
export { completePathPrefix } from './completion/filesystem';
export { CompletionCaches, TtlCache } from './completion/cache';
export { ExecFileRunner, CommandRunnerError, type CommandRunner, type RunOptions } from './completion/dynamic/runner';
export { BUILTIN_HANDLERS, type DynamicHandler } from './completion/dynamic';
export { InMemoryHistory, loadHistoryFile, type HistoryStore } from './completion/history';
export { DEFAULT_METADATA_ROOTS, type MetadataRoots } from './completion/context';
export { DEFAULT_CONFIG, getConfigDir, loadConfig, type ShellcompConfig } from './config';
export { VERSION, VERSION_STRING } from './version';
