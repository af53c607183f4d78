import type { WorkSession } from './ledger';

/**
 * Base error class for the time ledger
 */
export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when input is rejected before any state change
 */
export class ValidationError extends LedgerError {}

/**
 * Error thrown when a user already has a running session
 */
export class ConflictError extends LedgerError {
  constructor(
    message: string,
    public readonly activeSession?: WorkSession
  ) {
    super(message);
  }
}

/**
 * Error thrown when a user, or a running session to stop, does not exist
 */
export class NotFoundError extends LedgerError {}

/**
 * Error thrown when the underlying database fails.
 * The operation did not apply and may be retried.
 */
export class StorageError extends LedgerError {
  public readonly retryable = true;

  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
  }
}
