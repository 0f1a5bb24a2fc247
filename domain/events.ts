/**
 * Ledger events — immutable, append-only. No side effects.
 */

import type { Amount, BasisPoints, CreatorId, Identity, Timestamp, WorkId } from "./core.js";

/** Base ledger event. All events immutable. */
export interface LedgerEventBase {
  readonly type: string;
  readonly timestamp: Timestamp;
  /**
   * Monotonic journal version.
   * Assigned by the EventStore on append; 0 until then.
   */
  readonly version: number;
}

export interface CreatorRegistered extends LedgerEventBase {
  readonly type: "CreatorRegistered";
  readonly creatorId: CreatorId;
  readonly identity: Identity;
  readonly name: string;
  readonly profileRef: string;
}

export interface ConsumerRegistered extends LedgerEventBase {
  readonly type: "ConsumerRegistered";
  readonly identity: Identity;
  readonly name: string;
  readonly profileRef: string;
}

export interface WorkPublished extends LedgerEventBase {
  readonly type: "WorkPublished";
  readonly workId: WorkId;
  readonly creatorId: CreatorId;
  readonly creator: Identity;
  readonly title: string;
  readonly audioRef: string;
  readonly coverRef: string;
  readonly unitPrice: Amount;
  readonly royaltyBasisPoints: BasisPoints;
}

export interface RoyaltyAccrued extends LedgerEventBase {
  readonly type: "RoyaltyAccrued";
  readonly workId: WorkId;
  readonly consumer: Identity;
  readonly payment: Amount;
  readonly amount: Amount;
}

export interface GrantIssued extends LedgerEventBase {
  readonly type: "GrantIssued";
  readonly workId: WorkId;
  readonly consumer: Identity;
  /** 1-based position among this work's grants. */
  readonly grantNumber: number;
}

export interface WorkPlayed extends LedgerEventBase {
  readonly type: "WorkPlayed";
  readonly workId: WorkId;
  readonly consumer: Identity;
}

/** Escrow zeroed ahead of a payout transfer. */
export interface EscrowDebited extends LedgerEventBase {
  readonly type: "EscrowDebited";
  readonly workId: WorkId;
  readonly to: Identity;
  readonly amount: Amount;
}

export interface RoyaltyPaid extends LedgerEventBase {
  readonly type: "RoyaltyPaid";
  readonly workId: WorkId;
  readonly to: Identity;
  readonly amount: Amount;
}

/** Rollback of an EscrowDebited whose transfer failed. */
export interface EscrowRestored extends LedgerEventBase {
  readonly type: "EscrowRestored";
  readonly workId: WorkId;
  readonly to: Identity;
  readonly amount: Amount;
  readonly reason: string;
}

export type RegistryEvent = CreatorRegistered | ConsumerRegistered;

export type GateEvent = RoyaltyAccrued | GrantIssued | EscrowDebited | RoyaltyPaid | EscrowRestored;

export type CatalogEvent = WorkPublished | WorkPlayed;

export type LedgerEvent = RegistryEvent | CatalogEvent | GateEvent;

export type LedgerEventType = LedgerEvent["type"];

export const GATE_EVENT_TYPES: ReadonlySet<LedgerEventType> = new Set([
  "RoyaltyAccrued",
  "GrantIssued",
  "EscrowDebited",
  "RoyaltyPaid",
  "EscrowRestored",
]);

export function isRegistryEvent(e: LedgerEvent): e is RegistryEvent {
  return e.type === "CreatorRegistered" || e.type === "ConsumerRegistered";
}

export function isGateEvent(e: LedgerEvent): e is GateEvent {
  return GATE_EVENT_TYPES.has(e.type);
}
