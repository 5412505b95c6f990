export type PsychroErrorKind = "InvalidInput" | "ConvergenceFailure";

export type ErrorDetails = Record<string, number | string | boolean | null>;

export class PsychroError extends Error {
  readonly kind: PsychroErrorKind;
  readonly details: ErrorDetails;

  constructor(kind: PsychroErrorKind, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.details = details;
  }
}

export class InvalidInputError extends PsychroError {
  constructor(message: string, details: ErrorDetails = {}) {
    super("InvalidInput", message, details);
  }
}

export class ConvergenceError extends PsychroError {
  constructor(message: string, details: ErrorDetails = {}) {
    super("ConvergenceFailure", message, details);
  }
}

export interface FailureInfo {
  kind: PsychroErrorKind;
  message: string;
  details: ErrorDetails;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: FailureInfo };

export function isPsychroError(e: unknown): e is PsychroError {
  return e instanceof PsychroError;
}

/**
 * Runs an engine call and returns its failure as a value.
 * Only engine failures are captured; anything else is a bug and is rethrown.
 */
export function attempt<T>(fn: () => T): Outcome<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e: unknown) {
    if (isPsychroError(e)) {
      return { ok: false, error: { kind: e.kind, message: e.message, details: e.details } };
    }
    throw e;
  }
}

export function requireFinite(name: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${name} must be a finite number`, { [name]: String(value) });
  }
  return value;
}
