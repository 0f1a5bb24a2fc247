/**
 * Domain validation — assertions on inputs and invariants.
 * Framework-independent. No business logic.
 */

import {
  asAmount,
  asBasisPoints,
  asIdentity,
  BASIS_POINTS_SCALE,
  type Amount,
  type BasisPoints,
  type Identity,
} from "./core.js";
import { InvariantViolation, ValidationError } from "./errors.js";

/** Same as assert; use for invariants that must always hold. */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new InvariantViolation(message, { value });
}

/** Non-negative safe integer in the smallest currency unit. */
export function toAmount(value: number, field: string): Amount {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`, { field, value });
  }
  return asAmount(value);
}

/** Integer in [0, 10000]. */
export function toBasisPoints(value: number, field = "royaltyBasisPoints"): BasisPoints {
  if (!Number.isInteger(value) || value < 0 || value > BASIS_POINTS_SCALE) {
    throw new ValidationError(`${field} must be an integer between 0 and ${BASIS_POINTS_SCALE}`, {
      field,
      value,
    });
  }
  return asBasisPoints(value);
}

/** Non-empty, with no leading or trailing whitespace. Identities are compared verbatim. */
export function isIdentity(value: string): boolean {
  return value.length > 0 && value.trim() === value;
}

export function toIdentity(value: string, field = "identity"): Identity {
  if (value.trim().length === 0) {
    throw new ValidationError(`${field} must not be empty`, { field });
  }
  if (!isIdentity(value)) {
    throw new ValidationError(`${field} must not have surrounding whitespace`, { field, value });
  }
  return asIdentity(value);
}
