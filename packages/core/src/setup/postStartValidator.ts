/**
 * Post-Start Validator
 *
 * Step 5 of setup, first run only: let the gateway's doctor repair the fresh
 * config, then restart the gateway so it picks up the changes.
 */

import type { HarnessConfig } from '../config/index.js';
import { combinedOutput, describeFailure, type ComposeClient } from '../docker/index.js';
import { HarnessError, fail, ok, type StepResult } from '../errors.js';
import { MESSAGE_INDENT, type ServiceLogger } from '../logger/index.js';
import { tailLines, type Sleep } from '../utils/index.js';

export const DOCTOR_ARGS = ['doctor', '--fix', '--yes'] as const;

export interface PostStartResult {
  doctorRan: boolean;
  /** false when doctor exited non-zero; undefined when it did not run */
  doctorClean?: boolean;
}

export interface PostStartDependencies {
  compose: ComposeClient;
  logger: ServiceLogger;
  sleep: Sleep;
  print: (line: string) => void;
}

export async function runPostStartChecks(
  config: HarnessConfig,
  firstRun: boolean,
  deps: PostStartDependencies
): Promise<StepResult<PostStartResult>> {
  const { compose, logger } = deps;
  const { gateway, readiness } = config;

  if (!firstRun) {
    logger.debug('Existing runtime directory, skipping doctor');
    return ok({ doctorRan: false });
  }

  logger.info('Running doctor to validate and finalize config...');
  const doctor = compose.run(gateway.cliService, DOCTOR_ARGS);
  for (const line of tailLines(combinedOutput(doctor), readiness.doctorOutputLines)) {
    deps.print(`${MESSAGE_INDENT}${line}`);
  }

  const doctorClean = doctor.exitCode === 0;
  if (doctorClean) {
    logger.ok('Config validated by doctor.');
  } else {
    logger.warn('Doctor had warnings (non-fatal).', { exitCode: doctor.exitCode });
  }

  logger.info('Restarting gateway to apply doctor changes...');
  const restart = compose.restart(gateway.service);
  if (restart.exitCode !== 0) {
    return fail(
      new HarnessError(
        'operation',
        `Failed to restart ${gateway.service}: ${describeFailure(restart)}`,
        { hint: `Check: docker logs ${gateway.containerName}`, cause: restart.error }
      )
    );
  }
  await deps.sleep(readiness.settleMs);
  logger.ok('Gateway restarted.');

  return ok({ doctorRan: true, doctorClean });
}
