/**
 * Access gate — one per work. Converts a one-time payment into a permanent
 * grant for a (work, consumer) pair and keeps the creator's royalty in escrow.
 *
 * Per consumer: NoGrant -> Granted, terminal.
 * Escrow: credited by RoyaltyAccrued, zeroed by EscrowDebited, credited back
 * by EscrowRestored; RoyaltyPaid closes the debit.
 */

import {
  asAmount,
  BASIS_POINTS_SCALE,
  type Amount,
  type BasisPoints,
  type CreatorId,
  type Identity,
  type Timestamp,
  type WorkId,
} from "./core.js";
import { InsufficientPaymentError, NothingToWithdrawError, NotOwnerError, ValidationError } from "./errors.js";
import type { EscrowDebited, EscrowRestored, GateEvent, GrantIssued, RoyaltyAccrued, RoyaltyPaid } from "./events.js";
import { invariant, neverReached } from "./validation.js";

export interface AccessGateConfig {
  readonly workId: WorkId;
  readonly unitPrice: Amount;
  readonly royaltyBasisPoints: BasisPoints;
  readonly ownerCreatorId: CreatorId;
  readonly owner: Identity;
}

export interface AccessResult {
  readonly granted: true;
  /** True when this request paid for the grant; false on re-access. */
  readonly settled: boolean;
  readonly royaltyShare: Amount;
}

export interface AccessDecision {
  readonly result: AccessResult;
  /** Empty on re-access; RoyaltyAccrued + GrantIssued on settlement. */
  readonly events: readonly (RoyaltyAccrued | GrantIssued)[];
}

/** Read-only snapshot of a gate. */
export interface GateInfo extends AccessGateConfig {
  readonly escrowBalance: Amount;
  readonly grantedTo: readonly Identity[];
  readonly issuedCount: number;
  /** Debited escrow whose transfer has not been confirmed or restored. */
  readonly pendingPayout: Amount;
}

/** floor(payment * bps / 10000), exact for any safe-integer payment. */
export function royaltyShare(payment: Amount, bps: BasisPoints): Amount {
  return asAmount(Number((BigInt(payment) * BigInt(bps)) / BigInt(BASIS_POINTS_SCALE)));
}

export class AccessGate {
  readonly config: AccessGateConfig;
  private escrowBalance = 0;
  private pendingPayout = 0;
  private readonly grantedTo = new Set<Identity>();

  constructor(config: AccessGateConfig) {
    this.config = config;
  }

  get balance(): Amount {
    return asAmount(this.escrowBalance);
  }

  requestAccess(consumer: Identity, payment: Amount, timestamp: Timestamp): AccessDecision {
    if (this.grantedTo.has(consumer)) {
      return { result: { granted: true, settled: false, royaltyShare: asAmount(0) }, events: [] };
    }
    const { workId, unitPrice, royaltyBasisPoints } = this.config;
    if (payment < unitPrice) {
      throw new InsufficientPaymentError(workId, unitPrice, payment);
    }
    const amount = royaltyShare(payment, royaltyBasisPoints);
    // Escrow plus any in-flight payout must stay an exact integer.
    const held = this.escrowBalance + this.pendingPayout;
    if (amount > Number.MAX_SAFE_INTEGER - held) {
      throw new ValidationError(`royalty ${amount} would overflow escrow of work ${workId}`, {
        workId,
        escrowBalance: this.escrowBalance,
        pendingPayout: this.pendingPayout,
        royaltyShare: amount,
      });
    }
    return {
      result: { granted: true, settled: true, royaltyShare: amount },
      events: [
        { type: "RoyaltyAccrued", workId, consumer, payment, amount, timestamp, version: 0 },
        { type: "GrantIssued", workId, consumer, grantNumber: this.grantedTo.size + 1, timestamp, version: 0 },
      ],
    };
  }

  /** Plans a full withdrawal. The caller performs the transfer. */
  withdrawEscrow(caller: Identity, timestamp: Timestamp): EscrowDebited {
    const { workId, owner } = this.config;
    if (caller !== owner) throw new NotOwnerError(workId, caller);
    if (this.escrowBalance === 0) throw new NothingToWithdrawError(workId);
    return { type: "EscrowDebited", workId, to: owner, amount: asAmount(this.escrowBalance), timestamp, version: 0 };
  }

  confirmPayout(debit: EscrowDebited, timestamp: Timestamp): RoyaltyPaid {
    return { type: "RoyaltyPaid", workId: debit.workId, to: debit.to, amount: debit.amount, timestamp, version: 0 };
  }

  restoreEscrow(debit: EscrowDebited, reason: string, timestamp: Timestamp): EscrowRestored {
    return {
      type: "EscrowRestored",
      workId: debit.workId,
      to: debit.to,
      amount: debit.amount,
      reason,
      timestamp,
      version: 0,
    };
  }

  apply(event: GateEvent): void {
    invariant(event.workId === this.config.workId, `event for work ${event.workId} applied to gate ${this.config.workId}`);
    switch (event.type) {
      case "RoyaltyAccrued":
        invariant(!this.grantedTo.has(event.consumer), `royalty accrued twice for ${event.consumer}`);
        this.escrowBalance += event.amount;
        invariant(
          Number.isSafeInteger(this.escrowBalance + this.pendingPayout),
          `escrow of work ${event.workId} overflowed`
        );
        break;
      case "GrantIssued":
        invariant(!this.grantedTo.has(event.consumer), `grant issued twice for ${event.consumer}`);
        invariant(event.grantNumber === this.grantedTo.size + 1, `grant ${event.grantNumber} out of sequence`);
        this.grantedTo.add(event.consumer);
        break;
      case "EscrowDebited":
        invariant(event.amount === this.escrowBalance, `debit ${event.amount} does not match escrow ${this.escrowBalance}`);
        this.escrowBalance = 0;
        this.pendingPayout += event.amount;
        break;
      case "RoyaltyPaid":
        invariant(this.pendingPayout >= event.amount, `payout ${event.amount} exceeds pending ${this.pendingPayout}`);
        this.pendingPayout -= event.amount;
        break;
      case "EscrowRestored":
        invariant(this.pendingPayout >= event.amount, `restore ${event.amount} exceeds pending ${this.pendingPayout}`);
        this.pendingPayout -= event.amount;
        this.escrowBalance += event.amount;
        break;
      default:
        neverReached(event);
    }
  }

  info(): GateInfo {
    return {
      ...this.config,
      escrowBalance: asAmount(this.escrowBalance),
      grantedTo: [...this.grantedTo],
      issuedCount: this.grantedTo.size,
      pendingPayout: asAmount(this.pendingPayout),
    };
  }
}
