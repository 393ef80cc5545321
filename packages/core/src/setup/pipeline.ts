/**
 * Setup Pipeline
 *
 * Runs the setup steps in order and stops at the first failure. The config
 * returned by the secret provisioner (now carrying the token) is what the
 * later steps and the summary see.
 */

import type { HarnessConfig } from '../config/index.js';
import { ok, type StepResult } from '../errors.js';
import { validateEnvironment, type EnvironmentReport } from './environmentValidator.js';
import { provisionGatewayToken } from './secretProvisioner.js';
import { initializeRuntimeDirectory } from './runtimeDirectory.js';
import { startGateway } from './containerLifecycle.js';
import { runPostStartChecks, type PostStartResult } from './postStartValidator.js';
import { buildSetupSummary, type SetupSummary } from './summary.js';
import type { SetupDependencies } from './types.js';

export interface SetupOutcome {
  config: HarnessConfig;
  environment: EnvironmentReport;
  tokenGenerated: boolean;
  firstRun: boolean;
  readyAfterAttempts: number;
  postStart: PostStartResult;
  summary: SetupSummary;
}

export async function runSetup(
  initialConfig: HarnessConfig,
  deps: SetupDependencies
): Promise<StepResult<SetupOutcome>> {
  const environment = validateEnvironment(initialConfig, deps);
  if (!environment.ok) return environment;

  const secrets = provisionGatewayToken(initialConfig, deps);
  if (!secrets.ok) return secrets;
  const { config } = secrets.value;

  const runtime = initializeRuntimeDirectory(config, deps);
  if (!runtime.ok) return runtime;

  const gateway = await startGateway(config, deps);
  if (!gateway.ok) return gateway;

  const postStart = await runPostStartChecks(config, runtime.value.firstRun, deps);
  if (!postStart.ok) return postStart;

  return ok({
    config,
    environment: environment.value,
    tokenGenerated: secrets.value.generated,
    firstRun: runtime.value.firstRun,
    readyAfterAttempts: gateway.value.readyAfterAttempts,
    postStart: postStart.value,
    summary: buildSetupSummary(config),
  });
}
