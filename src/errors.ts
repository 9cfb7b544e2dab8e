/**
 * Error taxonomy
 *
 * Fetch errors drive the retry decision, storage errors drive item accounting,
 * configuration errors fail a source (or the whole pass) before any network call.
 */

export type SyncErrorCode =
  | 'TRANSIENT_FETCH'
  | 'PERMANENT_FETCH'
  | 'DUPLICATE_KEY'
  | 'STORAGE'
  | 'CONFIGURATION'
  | 'NOT_FOUND'
  | 'BUDGET_EXHAUSTED';

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Retryable: timeouts, 5xx, explicit rate-limit responses */
export class TransientFetchError extends SyncError {
  readonly code = 'TRANSIENT_FETCH';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Not retryable: 404, revoked auth, malformed or unsupported feed */
export class PermanentFetchError extends SyncError {
  readonly code = 'PERMANENT_FETCH';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class DuplicateKeyError extends SyncError {
  readonly code = 'DUPLICATE_KEY';
}

export class StorageError extends SyncError {
  readonly code = 'STORAGE';

  constructor(
    message: string,
    readonly recoverable = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigurationError extends SyncError {
  readonly code = 'CONFIGURATION';
}

export class NotFoundError extends SyncError {
  readonly code = 'NOT_FOUND';
}

export class BudgetExhaustedError extends SyncError {
  readonly code = 'BUDGET_EXHAUSTED';

  constructor(readonly budget: number) {
    super(`Call budget of ${budget} exhausted for this pass`);
  }
}

export function isTransientFetchError(error: unknown): error is TransientFetchError {
  return error instanceof TransientFetchError;
}

/**
 * Human-readable cause for summaries and run records
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
