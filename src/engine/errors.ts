export type CoreErrorCode =
  | 'NotFound'
  | 'ValidationFailed'
  | 'InvalidDateRange'
  | 'InvalidCapacityReduction'
  | 'InvalidAmount'
  | 'NotOwner'
  | 'InvalidStateTransition'
  | 'AlreadyCancelled'
  | 'NotPending'
  | 'AlreadyApplied'
  | 'OpportunityNotOpen'
  | 'NoSpotsAvailable'
  | 'RewardUnavailable'
  | 'InsufficientPoints'
  | 'AlreadyCredited'
  | 'CodeGenerationFailed';

export interface CoreError {
  code: CoreErrorCode;
  op: string;
  reason: string;
  details?: Record<string, unknown>;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: CoreError };

export function makeCoreError(
  code: CoreErrorCode,
  op: string,
  reason: string,
  details?: Record<string, unknown>,
): CoreError {
  const error: CoreError = { code, op, reason };
  if (details && typeof details === 'object' && !Array.isArray(details)) {
    error.details = details;
  }
  return error;
}

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: CoreError): Outcome<T> {
  return { ok: false, error };
}

// Thrown inside a unit of work so the surrounding transaction rolls back;
// attempt() turns it back into a failed Outcome.
export class CoreAbort extends Error {
  readonly error: CoreError;

  constructor(error: CoreError) {
    super(`${error.op}: ${error.code} (${error.reason})`);
    this.name = 'CoreAbort';
    this.error = error;
  }
}

export function abort(
  code: CoreErrorCode,
  op: string,
  reason: string,
  details?: Record<string, unknown>,
): CoreAbort {
  return new CoreAbort(makeCoreError(code, op, reason, details));
}

export async function attempt<T>(fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return ok(await fn());
  } catch (e) {
    if (e instanceof CoreAbort) return fail(e.error);
    throw e;
  }
}

export function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) throw new CoreAbort(outcome.error);
  return outcome.value;
}
