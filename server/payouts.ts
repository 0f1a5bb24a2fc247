/**
 * In-process payout adapter. Logs every transfer it accepts with the
 * running total for the recipient.
 * Stand-in for a real payment rail; swap without touching domain/handler.
 */

import type { Amount, Identity } from "../domain/core.js";
import type { PaymentTransfer, TransferOutcome } from "../domain/ports.js";
import type { Logger } from "./logger.js";

export class InMemoryPayoutTransfer implements PaymentTransfer {
  private readonly totals = new Map<Identity, number>();
  private readonly logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  async transfer(to: Identity, amount: Amount): Promise<TransferOutcome> {
    if (amount <= 0) return { ok: false, reason: "amount must be positive" };
    const totalPaid = (this.totals.get(to) ?? 0) + amount;
    this.totals.set(to, totalPaid);
    this.logger?.info({ to, amount, totalPaid }, "payout transferred");
    return { ok: true };
  }
}
