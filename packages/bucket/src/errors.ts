export type BucketErrorCode =
  | "UNAUTHORIZED"
  | "DUPLICATE_KEY"
  | "KEY_NOT_RESERVED"
  | "ALREADY_FILLED"
  | "KEY_NOT_FOUND"
  | "SLOT_EMPTY"
  | "INSUFFICIENT_BALANCE"
  | "OUTSIDE_UNLOCK_WINDOW"
  | "CONTENT_STORE_FAILURE"
  | "HANDOFF_RESOLUTION_FAILURE"
  | "TIME_SOURCE_FAILURE"
  | "COLLABORATOR_TIMEOUT"
  | "VALIDATION_FAILED"
  | "PERSISTENCE_ERROR";

export class BucketError extends Error {
  public readonly code: BucketErrorCode;
  public readonly cause?: unknown;
  public readonly metadata?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    options: {
      code: BucketErrorCode;
      cause?: unknown;
      metadata?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "BucketError";
    this.code = options.code;
    this.cause = options.cause;
    this.metadata = options.metadata;
    this.retryable = options.retryable ?? false;
  }
}

export class UnauthorizedError extends BucketError {
  constructor(message = "Capability does not authorize this bucket", metadata?: Record<string, unknown>) {
    super(message, { code: "UNAUTHORIZED", metadata });
    this.name = "UnauthorizedError";
  }
}

export class DuplicateKeyError extends BucketError {
  constructor(message = "Key already present in bucket", metadata?: Record<string, unknown>) {
    super(message, { code: "DUPLICATE_KEY", metadata });
    this.name = "DuplicateKeyError";
  }
}

export class KeyNotReservedError extends BucketError {
  constructor(message = "Key has not been reserved", metadata?: Record<string, unknown>) {
    super(message, { code: "KEY_NOT_RESERVED", metadata });
    this.name = "KeyNotReservedError";
  }
}

export class AlreadyFilledError extends BucketError {
  constructor(message = "Slot is already filled", metadata?: Record<string, unknown>) {
    super(message, { code: "ALREADY_FILLED", metadata });
    this.name = "AlreadyFilledError";
  }
}

export class KeyNotFoundError extends BucketError {
  constructor(message = "Key not found in bucket", metadata?: Record<string, unknown>) {
    super(message, { code: "KEY_NOT_FOUND", metadata });
    this.name = "KeyNotFoundError";
  }
}

export class SlotEmptyError extends BucketError {
  constructor(message = "Slot is reserved but empty", metadata?: Record<string, unknown>) {
    super(message, { code: "SLOT_EMPTY", metadata });
    this.name = "SlotEmptyError";
  }
}

export class InsufficientBalanceError extends BucketError {
  constructor(message = "Insufficient balance", metadata?: Record<string, unknown>) {
    super(message, { code: "INSUFFICIENT_BALANCE", metadata });
    this.name = "InsufficientBalanceError";
  }
}

export class OutsideUnlockWindowError extends BucketError {
  constructor(message = "Renewal window is not open yet", metadata?: Record<string, unknown>) {
    super(message, { code: "OUTSIDE_UNLOCK_WINDOW", metadata });
    this.name = "OutsideUnlockWindowError";
  }
}

export class ContentStoreFailureError extends BucketError {
  constructor(message = "Content store call failed", metadata?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: "CONTENT_STORE_FAILURE", metadata, cause });
    this.name = "ContentStoreFailureError";
  }
}

export class HandoffResolutionFailureError extends BucketError {
  constructor(message = "Handoff token could not be resolved", metadata?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: "HANDOFF_RESOLUTION_FAILURE", metadata, cause });
    this.name = "HandoffResolutionFailureError";
  }
}

export class TimeSourceFailureError extends BucketError {
  constructor(message = "Time source call failed", metadata?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: "TIME_SOURCE_FAILURE", metadata, cause });
    this.name = "TimeSourceFailureError";
  }
}

export class CollaboratorTimeoutError extends BucketError {
  constructor(message = "Collaborator call timed out", metadata?: Record<string, unknown>) {
    super(message, { code: "COLLABORATOR_TIMEOUT", metadata, retryable: true });
    this.name = "CollaboratorTimeoutError";
  }
}

export class ValidationFailedError extends BucketError {
  constructor(message = "Bucket validation failed", metadata?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: "VALIDATION_FAILED", metadata, cause });
    this.name = "ValidationFailedError";
  }
}

export class PersistenceError extends BucketError {
  constructor(message = "Bucket persistence failed", metadata?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: "PERSISTENCE_ERROR", metadata, cause });
    this.name = "PersistenceError";
  }
}

export function isBucketError(value: unknown, code?: BucketErrorCode): value is BucketError {
  if (!(value instanceof BucketError)) {
    return false;
  }
  return code === undefined || value.code === code;
}
