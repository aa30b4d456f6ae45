/**
 * Work session errors. Every rejected operation surfaces as one of these;
 * `kind` is what the tool surface reports back to the caller.
 */

export type ErrorKind = "not_found" | "unauthorized" | "invalid_input" | "conflict";

export class WorkSessionError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = "WorkSessionError";
    this.kind = kind;
  }
}

/** Session or pattern does not exist (or is not visible to the requester). */
export class NotFoundError extends WorkSessionError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

export class UnauthorizedError extends WorkSessionError {
  constructor(message: string) {
    super("unauthorized", message);
    this.name = "UnauthorizedError";
  }
}

/** Illegal transition, malformed arguments, or a pattern with nothing to track. */
export class InvalidInputError extends WorkSessionError {
  constructor(message: string) {
    super("invalid_input", message);
    this.name = "InvalidInputError";
  }
}

/** The stored session moved on since it was read (stale version token). */
export class ConflictError extends WorkSessionError {
  readonly expectedVersion: number;
  readonly actualVersion: number;

  constructor(message: string, expectedVersion: number, actualVersion: number) {
    super("conflict", message);
    this.name = "ConflictError";
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

export function isWorkSessionError(error: unknown): error is WorkSessionError {
  return error instanceof WorkSessionError;
}
