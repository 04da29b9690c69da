export type ErrorClass = "transient" | "fatal";

export class HarvestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Aborts the whole run. Nothing past the last committed unit is written. */
export class FatalError extends HarvestError {}

export class AuthenticationError extends FatalError {}

export class StoreUnavailableError extends FatalError {}

export class ConfigError extends FatalError {}

export class TransientError extends HarvestError {}

export class RetryExhaustedError extends HarvestError {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(label: string, attempts: number, lastError: unknown) {
    super(`${label} failed after ${attempts} attempt(s): ${describeError(lastError)}`, { cause: lastError });
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class CancelledError extends HarvestError {
  constructor(message = "Run cancelled") {
    super(message);
  }
}

export class InvalidTransitionError extends HarvestError {}

export function classifyError(err: unknown): ErrorClass {
  if (err instanceof FatalError || err instanceof CancelledError || err instanceof InvalidTransitionError) {
    return "fatal";
  }
  // timeouts, network errors and elements missing from a half-rendered page all get the bounded retries
  return "transient";
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
