/**
 * API error model — standard payload shape.
 * Maps domain errors to HTTP status codes.
 */

import { ZodError } from "zod";
import { ConcurrencyError, isLedgerError, ValidationError, type LedgerErrorCode } from "../domain/errors.js";

export type ErrorCode = LedgerErrorCode | "INVALID_INPUT" | "NOT_FOUND" | "CONFLICT" | "INTERNAL_ERROR";

export interface ApiErrorPayload {
  readonly error: {
    readonly code: ErrorCode;
    readonly message: string;
    readonly details?: Record<string, unknown>;
  };
}

export interface ApiErrorResponse {
  readonly status: number;
  readonly payload: ApiErrorPayload;
}

export function apiError(code: ErrorCode, message: string, details?: Record<string, unknown>): ApiErrorPayload {
  return { error: { code, message, ...(details != null && { details }) } };
}

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  ALREADY_REGISTERED: 409,
  NOT_REGISTERED_CREATOR: 403,
  WORK_NOT_FOUND: 404,
  INSUFFICIENT_PAYMENT: 402,
  NOT_OWNER: 403,
  NOTHING_TO_WITHDRAW: 409,
  TRANSFER_FAILED: 502,
};

/** Known errors only; returns null for anything that should surface as a 500. */
export function toApiError(err: unknown): ApiErrorResponse | null {
  if (isLedgerError(err)) {
    return { status: STATUS_BY_CODE[err.code], payload: apiError(err.code, err.message, err.metadata) };
  }
  if (err instanceof ValidationError) {
    return { status: 400, payload: apiError("INVALID_INPUT", err.message, err.metadata) };
  }
  if (err instanceof ZodError) {
    const issues = err.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
    return { status: 400, payload: apiError("INVALID_INPUT", "Invalid request body", { issues }) };
  }
  if (err instanceof ConcurrencyError) {
    return { status: 409, payload: apiError("CONFLICT", err.message, err.metadata) };
  }
  return null;
}
