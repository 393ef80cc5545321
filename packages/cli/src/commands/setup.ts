/**
 * Setup Command
 *
 * Validates the host, provisions secrets and runtime state, starts the
 * gateway and prints how to connect to it.
 */

import {
  ComposeClient,
  getHarnessPaths,
  loadHarnessConfig,
  renderBanner,
  renderSetupSummary,
  runSetup,
} from '@clawharbor/core';
import type { CliDependencies } from '../dependencies.js';
import { reportFailure } from './report.js';

export async function runSetupCommand(deps: CliDependencies): Promise<number> {
  const { logger, print } = deps;

  for (const line of renderBanner('OpenClaw Backend Setup')) {
    print(line);
  }

  try {
    const config = loadHarnessConfig({ projectDir: deps.projectDir });
    const compose = new ComposeClient(deps.runner, {
      projectDir: config.project.dir,
      composeFile: getHarnessPaths(config).composeFile,
    });

    const result = await runSetup(config, {
      compose,
      logger,
      sleep: deps.sleep,
      now: deps.now,
      print,
      platform: deps.platform,
      currentUid: deps.currentUid,
      chown: deps.chown,
      fetch: deps.fetch,
    });

    if (!result.ok) {
      reportFailure(logger, result.error);
      return 1;
    }

    for (const line of renderSetupSummary(result.value.summary)) {
      print(line);
    }
    return 0;
  } catch (error) {
    reportFailure(logger, error);
    return 1;
  }
}
