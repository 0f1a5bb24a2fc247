/**
 * Server dependencies — selected from config.
 * Swap journal or payout rail without touching domain/handler.
 */

import path from "node:path";
import { InMemoryEventStore, type EventStore } from "../domain/eventStore.js";
import type { AppDeps } from "./app.js";
import type { AppConfig } from "./config.js";
import { FileEventStore } from "./fileEventStore.js";
import type { Logger } from "./logger.js";
import { InMemoryPayoutTransfer } from "./payouts.js";

export function createEventStore(config: AppConfig): EventStore {
  if (config.EVENT_STORE === "file") {
    return new FileEventStore(path.resolve(config.EVENT_STORE_DIR));
  }
  return new InMemoryEventStore();
}

export function createDeps(config: AppConfig, logger: Logger): AppDeps {
  return {
    store: createEventStore(config),
    transfer: new InMemoryPayoutTransfer(logger.child({ component: "payouts" })),
    defaultRoyaltyBasisPoints: config.DEFAULT_ROYALTY_BPS,
    logger,
  };
}
