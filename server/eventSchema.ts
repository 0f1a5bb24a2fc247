/**
 * Journal line schema — validates persisted ledger events on load.
 */

import { z } from "zod";
import {
  asAmount,
  asBasisPoints,
  asCreatorId,
  asIdentity,
  asTimestamp,
  asWorkId,
} from "../domain/core.js";
import type { LedgerEvent } from "../domain/events.js";

const identity = z.string().min(1).transform(asIdentity);
const amount = z.number().int().nonnegative().transform(asAmount);
const workId = z.number().int().positive().transform(asWorkId);
const creatorId = z.number().int().positive().transform(asCreatorId);

const base = {
  timestamp: z.number().transform(asTimestamp),
  version: z.number().int().positive(),
};

export const ledgerEventSchema = z.discriminatedUnion("type", [
  z.object({
    ...base,
    type: z.literal("CreatorRegistered"),
    creatorId,
    identity,
    name: z.string(),
    profileRef: z.string(),
  }),
  z.object({
    ...base,
    type: z.literal("ConsumerRegistered"),
    identity,
    name: z.string(),
    profileRef: z.string(),
  }),
  z.object({
    ...base,
    type: z.literal("WorkPublished"),
    workId,
    creatorId,
    creator: identity,
    title: z.string(),
    audioRef: z.string(),
    coverRef: z.string(),
    unitPrice: amount,
    royaltyBasisPoints: z.number().int().min(0).max(10_000).transform(asBasisPoints),
  }),
  z.object({ ...base, type: z.literal("RoyaltyAccrued"), workId, consumer: identity, payment: amount, amount }),
  z.object({ ...base, type: z.literal("GrantIssued"), workId, consumer: identity, grantNumber: z.number().int().positive() }),
  z.object({ ...base, type: z.literal("WorkPlayed"), workId, consumer: identity }),
  z.object({ ...base, type: z.literal("EscrowDebited"), workId, to: identity, amount }),
  z.object({ ...base, type: z.literal("RoyaltyPaid"), workId, to: identity, amount }),
  z.object({ ...base, type: z.literal("EscrowRestored"), workId, to: identity, amount, reason: z.string() }),
]);

export function parseLedgerEvent(value: unknown): LedgerEvent {
  return ledgerEventSchema.parse(value);
}
