/**
 * Domain core — structural primitives only.
 * Framework-independent. No business assumptions.
 */

// --- Branded scalars (safer than plain strings/numbers) ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Stable external identity (account handle) of a creator or consumer. */
export type Identity = Brand<string, "Identity">;

/** Sequential creator number, starting at 1. */
export type CreatorId = Brand<number, "CreatorId">;

/** Sequential work number, starting at 1. 0 means "does not exist". */
export type WorkId = Brand<number, "WorkId">;

/** Amount in the smallest currency unit. */
export type Amount = Brand<number, "Amount">;

/** Rate in hundredths of a percent (10000 = 100%). */
export type BasisPoints = Brand<number, "BasisPoints">;

/** Point in time (UTC epoch milliseconds). */
export type Timestamp = Brand<number, "TimestampMs">;

// --- Constructors (no validation; see validation.ts) ---

export const asIdentity = (s: string) => s as Identity;
export const asCreatorId = (n: number) => n as CreatorId;
export const asWorkId = (n: number) => n as WorkId;
export const asAmount = (n: number) => n as Amount;
export const asBasisPoints = (n: number) => n as BasisPoints;
export const asTimestamp = (ms: number) => ms as Timestamp;

/** Reserved sentinel; never issued as a work id. */
export const NO_WORK = asWorkId(0);

export const BASIS_POINTS_SCALE = 10_000;
export const DEFAULT_ROYALTY_BPS = asBasisPoints(3_000);
