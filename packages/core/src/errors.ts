/**
 * Harness errors and step results
 */

/**
 * - precondition: something the operator must fix locally (runtime, secrets, template)
 * - startup-timeout: the gateway never reported readiness
 * - operation: an external command the run depends on failed
 */
export type HarnessErrorKind = 'precondition' | 'startup-timeout' | 'operation';

export class HarnessError extends Error {
  public readonly kind: HarnessErrorKind;
  /** Remediation shown to the operator under the message */
  public readonly hint?: string;

  constructor(
    kind: HarnessErrorKind,
    message: string,
    options: { hint?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'HarnessError';
    this.kind = kind;
    this.hint = options.hint;
  }
}

export type StepResult<T> = { ok: true; value: T } | { ok: false; error: HarnessError };

export function ok<T>(value: T): StepResult<T> {
  return { ok: true, value };
}

export function fail(error: HarnessError): { ok: false; error: HarnessError } {
  return { ok: false, error };
}

/**
 * Wrap anything thrown by a step into an operation error
 */
export function toHarnessError(error: unknown): HarnessError {
  if (error instanceof HarnessError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new HarnessError('operation', message, { cause: error });
}
