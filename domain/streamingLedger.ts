/**
 * Streaming ledger — composes IdentityRegistry + Catalog and is the only
 * write surface. Every mutation runs through one SerialQueue:
 * decide (all checks, no mutation) -> append to journal -> apply.
 * Failure before the append leaves state untouched.
 */

import type { AccessGate, GateInfo } from "./accessGate.js";
import { Catalog, type Work } from "./catalog.js";
import {
  asIdentity,
  asTimestamp,
  asWorkId,
  DEFAULT_ROYALTY_BPS,
  type Amount,
  type BasisPoints,
  type CreatorId,
  type Identity,
  type Timestamp,
  type WorkId,
} from "./core.js";
import { TransferFailedError } from "./errors.js";
import { isGateEvent, isRegistryEvent, type EscrowDebited, type LedgerEvent, type WorkPlayed } from "./events.js";
import type { EventStore } from "./eventStore.js";
import { IdentityRegistry, type Consumer, type Creator } from "./identityRegistry.js";
import { systemClock, type Clock, type LedgerObserver, type PaymentTransfer, type TransferOutcome } from "./ports.js";
import { SerialQueue } from "./serialQueue.js";
import { invariant, isIdentity, toAmount, toBasisPoints, toIdentity } from "./validation.js";

export interface StreamingLedgerDeps {
  readonly store: EventStore;
  readonly transfer: PaymentTransfer;
  readonly clock?: Clock;
  /** Applied to works published without an explicit rate. Defaults to 3000 (30%). */
  readonly defaultRoyaltyBasisPoints?: number;
  readonly observer?: LedgerObserver;
}

export interface PublishRequest {
  readonly title: string;
  readonly audioRef: string;
  readonly coverRef: string;
  readonly unitPrice: number;
  readonly royaltyBasisPoints?: number;
}

export interface PlayRecord {
  readonly workId: WorkId;
  readonly consumer: Identity;
  /** Journal version of the WorkPlayed event; increases across the ledger. */
  readonly sequence: number;
  readonly at: Timestamp;
}

export interface LedgerStats {
  readonly creators: number;
  readonly consumers: number;
  readonly works: number;
  readonly plays: number;
  readonly version: number;
}

/** Lookup key for queries: malformed identities match nothing. */
function lookupKey(value: string): Identity | undefined {
  return isIdentity(value) ? asIdentity(value) : undefined;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class StreamingLedger {
  private readonly registry = new IdentityRegistry();
  private readonly catalog = new Catalog(this.registry);
  private readonly histories = new Map<Identity, PlayRecord[]>();
  private readonly queue = new SerialQueue();
  private readonly store: EventStore;
  private readonly transfer: PaymentTransfer;
  private readonly clock: Clock;
  private readonly defaultRoyalty: BasisPoints;
  private readonly observer: LedgerObserver | undefined;
  private version = 0;
  private plays = 0;

  private constructor(deps: StreamingLedgerDeps) {
    this.store = deps.store;
    this.transfer = deps.transfer;
    this.clock = deps.clock ?? systemClock;
    this.defaultRoyalty = toBasisPoints(deps.defaultRoyaltyBasisPoints ?? DEFAULT_ROYALTY_BPS, "defaultRoyaltyBasisPoints");
    this.observer = deps.observer;
  }

  /** Replays the store's journal, then serves. */
  static async open(deps: StreamingLedgerDeps): Promise<StreamingLedger> {
    const ledger = new StreamingLedger(deps);
    for (const event of await deps.store.loadAll()) {
      ledger.applyEvent(event);
    }
    return ledger;
  }

  // --- Commands ---

  registerCreator(identity: string, name: string, profileRef: string): Promise<CreatorId> {
    return this.queue.run(async () => {
      const event = this.registry.registerCreator(toIdentity(identity), name, profileRef, this.now());
      await this.commit([event]);
      return event.creatorId;
    });
  }

  registerConsumer(identity: string, name: string, profileRef: string): Promise<void> {
    return this.queue.run(async () => {
      const event = this.registry.registerConsumer(toIdentity(identity), name, profileRef, this.now());
      await this.commit([event]);
    });
  }

  publish(creator: string, request: PublishRequest): Promise<WorkId> {
    return this.queue.run(async () => {
      const event = this.catalog.publish(
        toIdentity(creator, "creator"),
        {
          title: request.title,
          audioRef: request.audioRef,
          coverRef: request.coverRef,
          unitPrice: toAmount(request.unitPrice, "unitPrice"),
          royaltyBasisPoints:
            request.royaltyBasisPoints === undefined ? this.defaultRoyalty : toBasisPoints(request.royaltyBasisPoints),
        },
        this.now()
      );
      await this.commit([event]);
      return event.workId;
    });
  }

  /**
   * Grants or confirms access and records the play in one append.
   * Returns the work's audio reference.
   */
  stream(consumer: string, workId: number, payment: number): Promise<string> {
    return this.queue.run(async () => {
      const who = toIdentity(consumer, "consumer");
      const id = asWorkId(workId);
      const work = this.catalog.getWork(id);
      const timestamp = this.now();
      const decision = this.catalog.gate(id).requestAccess(who, toAmount(payment, "payment"), timestamp);
      const played: WorkPlayed = { type: "WorkPlayed", workId: id, consumer: who, timestamp, version: 0 };
      await this.commit([...decision.events, played]);
      return work.audioRef;
    });
  }

  /**
   * Pays out a work's whole escrow to its creator. The debit is journaled
   * before the transfer; a failed transfer journals a restore and throws
   * TransferFailedError.
   */
  withdrawEscrow(caller: string, workId: number): Promise<Amount> {
    return this.queue.run(async () => {
      const gate = this.catalog.gate(asWorkId(workId));
      const debit = gate.withdrawEscrow(toIdentity(caller, "caller"), this.now());
      await this.commit([debit]);

      let outcome: TransferOutcome;
      try {
        outcome = await this.transfer.transfer(debit.to, debit.amount);
      } catch (err) {
        const reason = describeError(err);
        await this.restore(gate, debit, reason);
        throw new TransferFailedError(debit.workId, debit.to, debit.amount, { reason, cause: err });
      }
      if (!outcome.ok) {
        await this.restore(gate, debit, outcome.reason);
        throw new TransferFailedError(debit.workId, debit.to, debit.amount, { reason: outcome.reason });
      }

      await this.commit([gate.confirmPayout(debit, this.now())]);
      return debit.amount;
    });
  }

  // --- Queries ---

  isRegisteredCreator(identity: string): boolean {
    const key = lookupKey(identity);
    return key !== undefined && this.registry.isRegisteredCreator(key);
  }

  isRegisteredConsumer(identity: string): boolean {
    const key = lookupKey(identity);
    return key !== undefined && this.registry.isRegisteredConsumer(key);
  }

  getCreator(identity: string): Creator | undefined {
    const key = lookupKey(identity);
    return key === undefined ? undefined : this.registry.getCreator(key);
  }

  getConsumer(identity: string): Consumer | undefined {
    const key = lookupKey(identity);
    return key === undefined ? undefined : this.registry.getConsumer(key);
  }

  getWork(workId: number): Work {
    return this.catalog.getWork(asWorkId(workId));
  }

  gateInfo(workId: number): GateInfo {
    return this.catalog.gate(asWorkId(workId)).info();
  }

  allWorks(): Work[] {
    return this.catalog.listAll();
  }

  worksByCreator(identity: string): Work[] {
    const key = lookupKey(identity);
    return key === undefined ? [] : this.catalog.listByCreator(key);
  }

  playHistory(consumer: string): PlayRecord[] {
    const key = lookupKey(consumer);
    return (key === undefined ? undefined : this.histories.get(key))?.slice() ?? [];
  }

  stats(): LedgerStats {
    return {
      creators: this.registry.creatorCount,
      consumers: this.registry.consumerCount,
      works: this.catalog.workCount,
      plays: this.plays,
      version: this.version,
    };
  }

  /** Committed journal, oldest first. */
  events(): Promise<LedgerEvent[]> {
    return this.store.loadAll();
  }

  // --- Internals ---

  private now(): Timestamp {
    return asTimestamp(this.clock.now());
  }

  private async commit(events: readonly LedgerEvent[]): Promise<void> {
    const stored = await this.store.append(this.version, events);
    for (const event of stored) {
      this.applyEvent(event);
    }
    this.observer?.(stored);
  }

  /**
   * Journals the rollback of a debit. If the journal itself fails, its error
   * propagates and the debit stays open (pendingPayout) for reconciliation.
   */
  private async restore(gate: AccessGate, debit: EscrowDebited, reason: string): Promise<void> {
    await this.commit([gate.restoreEscrow(debit, reason, this.now())]);
  }

  private applyEvent(event: LedgerEvent): void {
    invariant(event.version === this.version + 1, `event version ${event.version} follows ${this.version}`);
    if (isRegistryEvent(event)) {
      this.registry.apply(event);
    } else if (isGateEvent(event)) {
      this.catalog.gate(event.workId).apply(event);
    } else {
      this.catalog.apply(event);
      if (event.type === "WorkPlayed") this.recordPlay(event);
    }
    this.version = event.version;
  }

  private recordPlay(event: WorkPlayed): void {
    const record: PlayRecord = {
      workId: event.workId,
      consumer: event.consumer,
      sequence: event.version,
      at: event.timestamp,
    };
    const history = this.histories.get(event.consumer);
    if (history) history.push(record);
    else this.histories.set(event.consumer, [record]);
    this.plays += 1;
  }
}
