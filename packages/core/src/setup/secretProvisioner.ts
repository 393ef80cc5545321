/**
 * Secret Provisioner
 *
 * Step 2 of setup: make sure the secrets file carries a gateway token.
 * An existing non-empty token is never replaced.
 */

import {
  ENV_KEYS,
  getEnvValue,
  getHarnessPaths,
  readEnvFile,
  withGatewayToken,
  writeEnvValue,
} from '../config/index.js';
import type { HarnessConfig } from '../config/index.js';
import { generateGatewayToken } from '../crypto.js';
import { HarnessError, fail, ok, type StepResult } from '../errors.js';
import type { ServiceLogger } from '../logger/index.js';

export interface SecretProvisionResult {
  /** Config carrying the token that is now in the secrets file */
  config: HarnessConfig;
  generated: boolean;
}

export function provisionGatewayToken(
  config: HarnessConfig,
  deps: { logger: ServiceLogger; generateToken?: () => string }
): StepResult<SecretProvisionResult> {
  const { logger } = deps;
  const { envFile } = getHarnessPaths(config);
  const key = ENV_KEYS.gatewayToken;

  const current = readEnvFile(envFile);
  if (!current) {
    return fail(new HarnessError('precondition', `${config.project.envFile} not found.`));
  }

  const existing = getEnvValue(current.values, key);
  if (existing) {
    logger.ok('Gateway token exists.');
    return ok({ config: withGatewayToken(config, existing), generated: false });
  }

  const token = (deps.generateToken ?? generateGatewayToken)();
  try {
    writeEnvValue(envFile, key, token);
  } catch (error) {
    return fail(
      new HarnessError('operation', `Could not write ${key} to ${config.project.envFile}`, {
        cause: error,
      })
    );
  }

  logger.ok('Generated gateway token.');
  return ok({ config: withGatewayToken(config, token), generated: true });
}
