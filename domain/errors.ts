/**
 * Domain error model — base, generic and ledger error types.
 * Framework-independent. No business logic.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a value or input fails validation. */
export class ValidationError extends DomainError {}

/** Thrown when an invariant is violated. */
export class InvariantViolation extends DomainError {}

/** Thrown when an entity or resource is not found. */
export class NotFoundError extends DomainError {}

/** Thrown when a journal append races another writer. */
export class ConcurrencyError extends DomainError {}

// --- Ledger error kinds ---

export type LedgerErrorCode =
  | "ALREADY_REGISTERED"
  | "NOT_REGISTERED_CREATOR"
  | "WORK_NOT_FOUND"
  | "INSUFFICIENT_PAYMENT"
  | "NOT_OWNER"
  | "NOTHING_TO_WITHDRAW"
  | "TRANSFER_FAILED";

export class AlreadyRegisteredError extends DomainError {
  readonly code = "ALREADY_REGISTERED" as const;

  constructor(role: "creator" | "consumer", identity: string) {
    super(`${role} ${identity} is already registered`, { role, identity });
  }
}

export class NotRegisteredCreatorError extends DomainError {
  readonly code = "NOT_REGISTERED_CREATOR" as const;

  constructor(identity: string) {
    super(`${identity} is not a registered creator`, { identity });
  }
}

export class WorkNotFoundError extends NotFoundError {
  readonly code = "WORK_NOT_FOUND" as const;

  constructor(workId: number) {
    super(`Work ${workId} not found`, { workId });
  }
}

export class InsufficientPaymentError extends DomainError {
  readonly code = "INSUFFICIENT_PAYMENT" as const;

  constructor(workId: number, unitPrice: number, payment: number) {
    super(`Payment ${payment} is below unit price ${unitPrice} for work ${workId}`, {
      workId,
      unitPrice,
      payment,
    });
  }
}

export class NotOwnerError extends DomainError {
  readonly code = "NOT_OWNER" as const;

  constructor(workId: number, caller: string) {
    super(`${caller} does not own work ${workId}`, { workId, caller });
  }
}

export class NothingToWithdrawError extends DomainError {
  readonly code = "NOTHING_TO_WITHDRAW" as const;

  constructor(workId: number) {
    super(`Escrow for work ${workId} is empty`, { workId });
  }
}

export class TransferFailedError extends DomainError {
  readonly code = "TRANSFER_FAILED" as const;

  constructor(workId: number, to: string, amount: number, options?: { reason?: string; cause?: unknown }) {
    super(`Transfer of ${amount} to ${to} failed for work ${workId}`, {
      workId,
      to,
      amount,
      ...(options?.reason != null && { reason: options.reason }),
    });
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export type LedgerError =
  | AlreadyRegisteredError
  | NotRegisteredCreatorError
  | WorkNotFoundError
  | InsufficientPaymentError
  | NotOwnerError
  | NothingToWithdrawError
  | TransferFailedError;

export function isLedgerError(err: unknown): err is LedgerError {
  return (
    err instanceof AlreadyRegisteredError ||
    err instanceof NotRegisteredCreatorError ||
    err instanceof WorkNotFoundError ||
    err instanceof InsufficientPaymentError ||
    err instanceof NotOwnerError ||
    err instanceof NothingToWithdrawError ||
    err instanceof TransferFailedError
  );
}
