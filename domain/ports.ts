/**
 * Collaborator boundaries — interfaces only.
 * Domain stays pure; implementations are injected.
 */

import type { Amount, Identity } from "./core.js";
import type { LedgerEvent } from "./events.js";

export type TransferOutcome = { readonly ok: true } | { readonly ok: false; readonly reason: string };

/** Moves funds to a creator. Fallible and non-idempotent; never retried by the ledger. */
export interface PaymentTransfer {
  transfer(to: Identity, amount: Amount): Promise<TransferOutcome>;
}

export interface Clock {
  now(): number;
}

/** Receives each batch of events after it is committed and applied. */
export type LedgerObserver = (events: readonly LedgerEvent[]) => void;

export const systemClock: Clock = { now: () => Date.now() };
