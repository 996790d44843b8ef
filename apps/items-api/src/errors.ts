import type { ErrorIssue } from "@items-service/types";

export abstract class AppError extends Error {
  abstract readonly status: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or missing input; raised before the store is touched. */
export class ValidationError extends AppError {
  readonly status = 422;

  constructor(message: string, readonly issues: ErrorIssue[] = []) {
    super(message);
  }
}

/** No row for the requested id. An expected outcome, not a failure. */
export class NotFoundError extends AppError {
  readonly status = 404;
}

/**
 * The store rejected or could not run an operation. `message` is the text
 * shown to the caller; the underlying error stays on `cause` for the logs.
 */
export class PersistenceError extends AppError {
  readonly status = 500;
}

/** No pooled connection became free within the pool wait timeout. */
export class PoolExhaustedError extends AppError {
  readonly status = 503;
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

// Validation, not-found and pool-exhaustion errors pass through untouched.
// Everything else, session-layer PersistenceErrors included, becomes a
// PersistenceError carrying the operation's public message.
export const asPersistenceError = (err: unknown, message: string): AppError =>
  err instanceof AppError && !(err instanceof PersistenceError)
    ? err
    : new PersistenceError(message, { cause: err });
