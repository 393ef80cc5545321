/**
 * Container Lifecycle Driver
 *
 * Step 4 of setup: pull the gateway image, start the service detached and
 * wait for it to accept connections.
 */

import type { HarnessConfig } from '../config/index.js';
import {
  createReadinessProbe,
  describeFailure,
  waitForReady,
  type ComposeClient,
  type FetchLike,
  type ReadinessProbe,
} from '../docker/index.js';
import { HarnessError, fail, ok, type StepResult } from '../errors.js';
import type { ServiceLogger } from '../logger/index.js';
import { formatDuration, type Clock, type Sleep } from '../utils/index.js';

export interface GatewayStartResult {
  /** 1-based attempt on which the probe reported ready */
  readyAfterAttempts: number;
}

export interface ContainerLifecycleDependencies {
  compose: ComposeClient;
  logger: ServiceLogger;
  sleep: Sleep;
  now?: Clock;
  fetch?: FetchLike;
  /** Overrides the probe selected by config.readiness.probe */
  probe?: ReadinessProbe;
}

export async function startGateway(
  config: HarnessConfig,
  deps: ContainerLifecycleDependencies
): Promise<StepResult<GatewayStartResult>> {
  const { compose, logger } = deps;
  const { gateway, readiness } = config;

  logger.info('Pulling OpenClaw Docker image...');
  const pull = compose.pull(gateway.service);
  if (pull.exitCode !== 0) {
    return fail(
      new HarnessError('operation', `Failed to pull ${gateway.image}: ${describeFailure(pull)}`, {
        hint: 'Check the image reference in OPENCLAW_IMAGE and your registry access.',
        cause: pull.error,
      })
    );
  }
  logger.ok('Image pulled.');

  logger.info('Starting OpenClaw gateway...');
  const up = compose.up(gateway.service);
  if (up.exitCode !== 0) {
    return fail(
      new HarnessError('operation', `Failed to start ${gateway.service}: ${describeFailure(up)}`, {
        hint: `Check: docker compose logs ${gateway.service}`,
        cause: up.error,
      })
    );
  }

  const probe =
    deps.probe ?? createReadinessProbe(readiness, gateway, { compose, fetch: deps.fetch });

  logger.info('Waiting for gateway to start...');
  const readyAfterAttempts = await waitForReady(probe, {
    attempts: readiness.attempts,
    intervalMs: readiness.intervalMs,
    sleep: deps.sleep,
    now: deps.now,
    onAttempt: (attempt) =>
      logger.debug(`Readiness attempt ${attempt}/${readiness.attempts}`, { probe: probe.name }),
  });

  if (readyAfterAttempts === null) {
    logger.debug(
      `No readiness after ${readiness.attempts} attempts (~${formatDuration(readiness.attempts * readiness.intervalMs)})`,
      { probe: probe.name }
    );
    return fail(
      new HarnessError('startup-timeout', 'Gateway did not start in time.', {
        hint: `Check: docker logs ${gateway.containerName}`,
      })
    );
  }

  logger.ok('Gateway is running.');
  return ok({ readyAfterAttempts });
}
