/**
 * Scripted CommandRunner
 *
 * Responses are keyed by a command pattern: words that must appear, in order,
 * in the invoked command line. `on('docker compose pull', ...)` therefore
 * matches `docker compose -f /tmp/x/docker-compose.yml pull openclaw-gateway`.
 * Unmatched commands succeed with empty output.
 */

import type { CommandResult, CommandRunner, RunOptions } from '@clawharbor/core';

export interface RecordedCommand {
  command: string;
  args: string[];
  options: RunOptions;
}

export type ScriptedResponse = CommandResult | ((call: RecordedCommand) => CommandResult);

interface Rule {
  words: string[];
  responses: ScriptedResponse[];
}

export function succeed(stdout = ''): CommandResult {
  return { exitCode: 0, stdout, stderr: '' };
}

export function failWith(exitCode: number, stderr = ''): CommandResult {
  return { exitCode, stdout: '', stderr };
}

/**
 * What ProcessCommandRunner reports when the executable does not exist
 */
export function commandNotFound(command = 'docker'): CommandResult {
  const error = Object.assign(new Error(`spawnSync ${command} ENOENT`), { code: 'ENOENT' });
  return { exitCode: 127, stdout: '', stderr: '', error };
}

function isSubsequence(words: string[], tokens: string[]): boolean {
  let index = 0;
  for (const token of tokens) {
    if (index < words.length && token === words[index]) {
      index++;
    }
  }
  return index === words.length;
}

export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  private readonly rules: Rule[] = [];

  /**
   * Script responses for a pattern. They are used in order; the last one
   * repeats. Later rules win over earlier ones.
   */
  on(pattern: string, ...responses: ScriptedResponse[]): this {
    this.rules.unshift({ words: pattern.split(/\s+/).filter(Boolean), responses });
    return this;
  }

  run(command: string, args: readonly string[], options: RunOptions = {}): CommandResult {
    const call: RecordedCommand = { command, args: [...args], options };
    this.calls.push(call);

    const rule = this.rules.find((candidate) =>
      isSubsequence(candidate.words, [command, ...args])
    );
    if (!rule || rule.responses.length === 0) {
      return succeed();
    }
    const response = rule.responses.length > 1 ? rule.responses.shift() : rule.responses[0];
    if (response === undefined) {
      return succeed();
    }
    return typeof response === 'function' ? response(call) : response;
  }

  /**
   * Invoked command lines with any `-f <file>` pair removed
   */
  commandLines(): string[] {
    return this.calls.map((call) => {
      const args: string[] = [];
      for (let i = 0; i < call.args.length; i++) {
        if (call.args[i] === '-f') {
          i++;
          continue;
        }
        args.push(call.args[i]);
      }
      return [call.command, ...args].join(' ');
    });
  }

  /** Number of calls matching a pattern */
  count(pattern: string): number {
    const words = pattern.split(/\s+/).filter(Boolean);
    return this.calls.filter((call) => isSubsequence(words, [call.command, ...call.args])).length;
  }
}
