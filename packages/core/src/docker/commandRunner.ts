/**
 * Command Runner
 *
 * Every external command the harness executes (docker, docker compose, chown)
 * goes through a CommandRunner. Production uses child_process; tests script
 * the results with FakeCommandRunner from @clawharbor/test-utils.
 */

import { spawnSync } from 'child_process';

export interface RunOptions {
  /** Working directory, defaults to the current one */
  cwd?: string;
  /**
   * Stream output to the terminal instead of capturing it. stdout/stderr in
   * the result are empty when set.
   */
  inheritOutput?: boolean;
  timeoutMs?: number;
  /** Largest captured stdout or stderr in bytes, 1 MiB unless set */
  maxBuffer?: number;
}

export interface CommandResult {
  /** Process exit status; 127 when the executable could not be started */
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Spawn failure (ENOENT, EACCES, timeout) */
  error?: Error;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): CommandResult;
}

/** Exit status shells use for "command not found" */
export const COMMAND_NOT_FOUND = 127;

const DEFAULT_MAX_BUFFER = 1024 * 1024;

export class ProcessCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions = {}): CommandResult {
    const result = spawnSync(command, args, {
      cwd: options.cwd,
      encoding: 'utf8',
      stdio: options.inheritOutput ? 'inherit' : 'pipe',
      timeout: options.timeoutMs,
      maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
    });

    if (result.error) {
      const code = 'code' in result.error ? result.error.code : undefined;
      return {
        exitCode: code === 'ENOENT' ? COMMAND_NOT_FOUND : (result.status ?? 1),
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        error: result.error,
      };
    }

    return {
      exitCode: result.status ?? 1,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
    };
  }
}

export function isCommandNotFound(result: CommandResult): boolean {
  return result.exitCode === COMMAND_NOT_FOUND;
}

/**
 * Combined output, stdout first (like `2>&1` for line-oriented tools)
 */
export function combinedOutput(result: CommandResult): string {
  if (!result.stderr) return result.stdout;
  if (!result.stdout) return result.stderr;
  return result.stdout.endsWith('\n')
    ? `${result.stdout}${result.stderr}`
    : `${result.stdout}\n${result.stderr}`;
}
