/**
 * Everything the commands touch outside the process, gathered in one place
 * so tests can swap in fakes.
 */

import {
  ProcessCommandRunner,
  chownRecursive,
  createServiceLogger,
  sleep,
  type ChownFn,
  type Clock,
  type CommandRunner,
  type FetchLike,
  type ServiceLogger,
  type Sleep,
} from '@clawharbor/core';
import { askQuestion } from './prompt.js';

export interface CliDependencies {
  /** Directory holding the compose file and secrets */
  projectDir: string;
  runner: CommandRunner;
  sleep: Sleep;
  now?: Clock;
  prompt: (question: string) => Promise<string>;
  logger: ServiceLogger;
  /** Raw output (banner, summary, doctor lines) */
  print: (line: string) => void;
  platform: NodeJS.Platform;
  currentUid: number | undefined;
  chown: ChownFn;
  fetch?: FetchLike;
}

export function createDefaultDependencies(projectDir: string = process.cwd()): CliDependencies {
  return {
    projectDir,
    runner: new ProcessCommandRunner(),
    sleep,
    prompt: (question) => askQuestion(question),
    logger: createServiceLogger('clawharbor'),
    print: (line) => console.log(line),
    platform: process.platform,
    currentUid: process.getuid?.(),
    chown: chownRecursive,
  };
}
