/**
 * Reset Path
 *
 * Wipes the runtime directory after an explicit confirmation so the next
 * setup starts from the template again.
 */

import { rmSync } from 'fs';
import { relative } from 'path';
import { getHarnessPaths } from '../config/index.js';
import type { HarnessConfig } from '../config/index.js';
import { describeFailure, type ComposeClient } from '../docker/index.js';
import { HarnessError, fail, ok, type StepResult } from '../errors.js';
import type { ServiceLogger } from '../logger/index.js';

export const RESET_CONFIRM_PROMPT = "Type 'yes' to confirm: ";

export type ResetOutcome = { status: 'aborted' } | { status: 'wiped'; dataDir: string };

export interface ResetDependencies {
  compose: ComposeClient;
  logger: ServiceLogger;
  /** Resolves to the operator's answer; '' on EOF */
  prompt: (question: string) => Promise<string>;
}

/**
 * Only an exact, case-sensitive `yes` (surrounding whitespace ignored)
 */
export function isResetConfirmed(answer: string): boolean {
  return answer.trim() === 'yes';
}

export async function resetRuntime(
  config: HarnessConfig,
  deps: ResetDependencies
): Promise<StepResult<ResetOutcome>> {
  const { compose, logger } = deps;
  const paths = getHarnessPaths(config);
  const displayDir = relative(paths.projectDir, paths.dataDir) || paths.dataDir;

  logger.warn('This will delete ALL runtime data (WhatsApp link, sessions, devices).');
  const answer = await deps.prompt(RESET_CONFIRM_PROMPT);
  if (!isResetConfirmed(answer)) {
    logger.info('Aborted.');
    return ok({ status: 'aborted' });
  }

  const down = compose.down();
  if (down.exitCode !== 0) {
    logger.debug(`docker compose down failed, continuing: ${describeFailure(down)}`);
  }

  try {
    rmSync(paths.dataDir, { recursive: true, force: true });
  } catch (error) {
    return fail(
      new HarnessError('operation', `Could not delete ${displayDir}`, {
        hint: `Run: sudo rm -rf ${displayDir}`,
        cause: error,
      })
    );
  }

  logger.ok('Runtime data wiped. Run clawharbor again to start fresh.');
  return ok({ status: 'wiped', dataDir: paths.dataDir });
}
