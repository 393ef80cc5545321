/**
 * Compose Client
 *
 * Thin wrapper over the docker CLI for the handful of commands the harness
 * issues. Compose commands always name the project's compose file and run in
 * the project directory.
 */

import type { CommandResult, CommandRunner } from './commandRunner.js';

export interface ComposeClientOptions {
  projectDir: string;
  composeFile: string;
  /** Executable name, `docker` unless a test says otherwise */
  dockerBinary?: string;
}

export class ComposeClient {
  private readonly docker: string;

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: ComposeClientOptions
  ) {
    this.docker = options.dockerBinary ?? 'docker';
  }

  /** `docker --version` */
  dockerVersion(): CommandResult {
    return this.runner.run(this.docker, ['--version'], { cwd: this.options.projectDir });
  }

  /** `docker compose version` */
  composeVersion(): CommandResult {
    return this.runner.run(this.docker, ['compose', 'version'], { cwd: this.options.projectDir });
  }

  pull(service: string): CommandResult {
    return this.compose(['pull', service], true);
  }

  up(service: string): CommandResult {
    return this.compose(['up', '-d', service], true);
  }

  restart(service: string): CommandResult {
    return this.compose(['restart', service], true);
  }

  down(): CommandResult {
    return this.compose(['down'], false);
  }

  /**
   * One-off container: `docker compose run --rm <service> <args...>`.
   * Output is captured so the caller can trim it.
   */
  run(service: string, args: readonly string[]): CommandResult {
    return this.compose(['run', '--rm', service, ...args], false);
  }

  /**
   * `docker logs <container>`, stdout and stderr captured separately. A
   * long-lived container's log can be any size, so capture is unbounded.
   */
  logs(container: string, options: { timeoutMs?: number } = {}): CommandResult {
    return this.runner.run(this.docker, ['logs', container], {
      cwd: this.options.projectDir,
      maxBuffer: Infinity,
      timeoutMs: options.timeoutMs,
    });
  }

  private compose(args: readonly string[], inheritOutput: boolean): CommandResult {
    return this.runner.run(this.docker, ['compose', '-f', this.options.composeFile, ...args], {
      cwd: this.options.projectDir,
      inheritOutput,
    });
  }
}

/**
 * Short description of a failed command for error messages
 */
export function describeFailure(result: CommandResult): string {
  if (result.error) {
    return result.error.message;
  }
  const detail = result.stderr.trim().split(/\r?\n/).pop();
  return detail ? `exit code ${result.exitCode}: ${detail}` : `exit code ${result.exitCode}`;
}
