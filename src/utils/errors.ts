export type RelayerErrorKind =
  | 'transient-fetch'
  | 'submission'
  | 'malformed-event'
  | 'storage'
  | 'startup'
  | 'config';

/**
 * Base class for every error the relayer raises on purpose.
 * The orchestrator picks its recovery policy from `kind`.
 */
export abstract class RelayerError extends Error {
  public abstract readonly kind: RelayerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or timeout failure while reading the tip or logs; retried next cycle */
export class TransientFetchError extends RelayerError {
  public readonly kind = 'transient-fetch';
}

/** A destination sign/submit call failed */
export class SubmissionError extends RelayerError {
  public readonly kind = 'submission';

  constructor(
    message: string,
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** An event failed validation; skipped permanently */
export class MalformedEventError extends RelayerError {
  public readonly kind = 'malformed-event';

  constructor(message: string, public readonly eventId: string) {
    super(message);
  }
}

export class StorageError extends RelayerError {
  public readonly kind = 'storage';
}

export class StartupError extends RelayerError {
  public readonly kind = 'startup';
}

export class ConfigError extends RelayerError {
  public readonly kind = 'config';
}

export function isRelayerError(error: unknown): error is RelayerError {
  return error instanceof RelayerError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  // errors raised in another realm (vm contexts, test sandboxes) fail instanceof
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
