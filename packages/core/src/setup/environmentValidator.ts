/**
 * Environment Validator
 *
 * Step 1 of setup: the docker CLI and its compose plugin must be usable, and
 * the secrets file must hold a real AI-provider key. Nothing else touches
 * Docker before this step succeeds.
 */

import { existsSync } from 'fs';
import { DOCKER_INSTALL_URL, ENV_KEYS, getHarnessPaths, isPlaceholder } from '../config/index.js';
import type { HarnessConfig } from '../config/index.js';
import type { ComposeClient } from '../docker/index.js';
import { HarnessError, fail, ok, type StepResult } from '../errors.js';
import type { ServiceLogger } from '../logger/index.js';

export interface EnvironmentReport {
  dockerVersion: string;
  composeVersion: string;
}

export function validateEnvironment(
  config: HarnessConfig,
  deps: { compose: ComposeClient; logger: ServiceLogger }
): StepResult<EnvironmentReport> {
  const { compose, logger } = deps;

  logger.info('Checking prerequisites...');

  const docker = compose.dockerVersion();
  if (docker.exitCode !== 0) {
    return fail(
      new HarnessError('precondition', 'Docker is not installed.', {
        hint: `Install: ${DOCKER_INSTALL_URL}`,
        cause: docker.error,
      })
    );
  }

  const composeVersion = compose.composeVersion();
  if (composeVersion.exitCode !== 0) {
    return fail(
      new HarnessError('precondition', 'Docker Compose v2 not found.', {
        hint: 'Update Docker or install the Compose plugin.',
      })
    );
  }

  logger.ok('Docker and Docker Compose v2 available.', {
    docker: docker.stdout.trim(),
    compose: composeVersion.stdout.trim(),
  });

  const secrets = checkSecretsFile(config, logger);
  if (!secrets.ok) {
    return secrets;
  }

  return ok({
    dockerVersion: docker.stdout.trim(),
    composeVersion: composeVersion.stdout.trim(),
  });
}

function checkSecretsFile(config: HarnessConfig, logger: ServiceLogger): StepResult<void> {
  const paths = getHarnessPaths(config);
  const { envFile, envExampleFile } = config.project;

  logger.info(`Checking ${envFile} file...`);

  if (!existsSync(paths.envFile)) {
    const hint = existsSync(paths.envExampleFile)
      ? `Create it from the template:\n  cp ${envExampleFile} ${envFile}\n` +
        `Then fill in ${ENV_KEYS.apiKey} and re-run setup.`
      : `Create it with at minimum:\n  ${ENV_KEYS.apiKey}=sk-proj-your-key-here`;
    return fail(new HarnessError('precondition', `${envFile} not found.`, { hint }));
  }

  if (isPlaceholder(config.credentials.apiKey)) {
    return fail(
      new HarnessError(
        'precondition',
        `${ENV_KEYS.apiKey} is missing or still a placeholder in ${envFile}`
      )
    );
  }

  logger.ok(`${ENV_KEYS.apiKey} is set.`);
  return ok(undefined);
}
