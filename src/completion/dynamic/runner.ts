/**
 * @fileoverview Subprocess execution for dynamic completions.
 *
 * Every external program a completion consults (`ps`, `git`, `getent`,
 * package managers, `sh -c` scripts) goes through a `CommandRunner`, which
 * enforces a hard timeout and honours an abort signal. Tests substitute a
 * fake runner.
 *
 * @module completion/dynamic/runner
 */

import { execFile } from 'node:child_process';

export interface RunOptions {
  /** Abort the subprocess when this signal fires */
  signal?: AbortSignal;
  /** Kill the subprocess after this many milliseconds */
  timeoutMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs a program and resolves with its standard output.
 */
export interface CommandRunner {
  run(program: string, args: readonly string[], options?: RunOptions): Promise<string>;
}

/**
 * A subprocess that could not be started, exited non-zero or timed out.
 */
export class CommandRunnerError extends Error {
  readonly program: string;
  readonly exitCode: number | null;
  readonly timedOut: boolean;

  constructor(program: string, message: string, exitCode: number | null = null, timedOut = false) {
    super(`${program}: ${message}`);
    this.name = 'CommandRunnerError';
    this.program = program;
    this.exitCode = exitCode;
    this.timedOut = timedOut;
  }
}

/**
 * Check whether a thrown value is the result of an aborted operation.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

const DEFAULT_TIMEOUT_MS = 1500;
const MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

/**
 * `CommandRunner` backed by `child_process.execFile`.
 *
 * @example
 * const runner = new ExecFileRunner(1000);
 * const out = await runner.run('git', ['branch', '--list']);
 */
export class ExecFileRunner implements CommandRunner {
  constructor(private readonly defaultTimeoutMs: number = DEFAULT_TIMEOUT_MS) {}

  run(program: string, args: readonly string[], options: RunOptions = {}): Promise<string> {
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;

    return new Promise((resolve, reject) => {
      execFile(
        program,
        args,
        {
          encoding: 'utf8',
          timeout,
          maxBuffer: MAX_OUTPUT_BYTES,
          signal: options.signal,
          cwd: options.cwd,
          env: options.env,
          windowsHide: true,
        },
        (error, stdout) => {
          if (!error) {
            resolve(stdout);
            return;
          }
          if (isAbortError(error)) {
            reject(error);
            return;
          }
          if (error.killed && error.signal === 'SIGTERM') {
            reject(new CommandRunnerError(program, `timed out after ${timeout}ms`, null, true));
            return;
          }
          const exitCode = typeof error.code === 'number' ? error.code : null;
          reject(new CommandRunnerError(program, error.message, exitCode));
        }
      );
    });
  }
}
