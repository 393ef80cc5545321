import { MESSAGE_INDENT, toHarnessError, type ServiceLogger } from '@clawharbor/core';

/**
 * Print a failure as one [ERROR] entry with the hint indented under it.
 * Errors that are not HarnessErrors also get their stack at debug level.
 */
export function reportFailure(logger: ServiceLogger, error: unknown): void {
  const harnessError = toHarnessError(error);
  const lines = [harnessError.message];
  if (harnessError.hint) {
    lines.push(...harnessError.hint.split('\n').map((line) => `${MESSAGE_INDENT}${line}`));
  }
  logger.error(lines.join('\n'), { kind: harnessError.kind });

  if (harnessError !== error && error instanceof Error) {
    logger.debug('Unexpected error', { stack: error.stack });
  }
}
