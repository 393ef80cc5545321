/**
 * Reset Command
 *
 * Stops the gateway and deletes its runtime data after confirmation.
 */

import { ComposeClient, getHarnessPaths, loadHarnessConfig, resetRuntime } from '@clawharbor/core';
import type { CliDependencies } from '../dependencies.js';
import { reportFailure } from './report.js';

export async function runResetCommand(deps: CliDependencies): Promise<number> {
  const { logger } = deps;

  try {
    // Reset only needs paths, so a broken secrets file must not block it
    const config = loadHarnessConfig({ projectDir: deps.projectDir, readSecretsFile: false });
    const compose = new ComposeClient(deps.runner, {
      projectDir: config.project.dir,
      composeFile: getHarnessPaths(config).composeFile,
    });

    const result = await resetRuntime(config, { compose, logger, prompt: deps.prompt });
    if (!result.ok) {
      reportFailure(logger, result.error);
      return 1;
    }
    // An aborted reset is a clean exit too
    return 0;
  } catch (error) {
    reportFailure(logger, error);
    return 1;
  }
}
