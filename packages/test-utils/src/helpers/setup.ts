/**
 * Setup step fixtures
 *
 * Wires a temp project to a FakeCommandRunner that answers like a healthy
 * Docker host: version checks pass and the gateway log already shows the
 * listening line.
 */

import { vi, type Mock } from 'vitest';
import { ComposeClient, type ChownFn, type SetupDependencies } from '@clawharbor/core';
import { FakeCommandRunner, succeed } from '../mocks/commandRunner.js';
import { createMockServiceLogger, type MockServiceLogger } from '../mocks/logger.js';
import { createRecordingSleep } from './sleep.js';
import type { TempProject } from './project.js';

export const TEST_GATEWAY_TOKEN = 'a'.repeat(64);

export const HEALTHY_GATEWAY_LOG =
  '[gateway] loading config\n[gateway] listening on ws://0.0.0.0:18789\n';

export interface SetupFixture {
  deps: SetupDependencies;
  runner: FakeCommandRunner;
  compose: ComposeClient;
  logger: MockServiceLogger;
  chown: Mock<ChownFn>;
  /** Delays passed to sleep, in call order */
  delays: number[];
  /** Lines passed to print */
  printed: string[];
}

export function createHealthyRunner(): FakeCommandRunner {
  return new FakeCommandRunner()
    .on('docker --version', succeed('Docker version 27.1.1, build test\n'))
    .on('docker compose version', succeed('Docker Compose version v2.29.1\n'))
    .on('docker logs', succeed(HEALTHY_GATEWAY_LOG));
}

export function createSetupFixture(
  project: TempProject,
  overrides: Partial<SetupDependencies> & { runner?: FakeCommandRunner } = {}
): SetupFixture {
  const { runner = createHealthyRunner(), ...depOverrides } = overrides;
  const compose = new ComposeClient(runner, {
    projectDir: project.dir,
    composeFile: project.path('docker-compose.yml'),
  });
  const logger = createMockServiceLogger();
  const { sleep, delays, now } = createRecordingSleep();
  const chown = vi.fn<ChownFn>();
  const printed: string[] = [];

  const deps: SetupDependencies = {
    compose,
    logger,
    sleep,
    now,
    print: (line) => {
      printed.push(line);
    },
    platform: 'linux',
    currentUid: 501,
    chown,
    generateToken: () => TEST_GATEWAY_TOKEN,
    ...depOverrides,
  };

  return { deps, runner, compose, logger, chown, delays, printed };
}
