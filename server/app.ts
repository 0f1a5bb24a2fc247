/**
 * App assembly — ledger + handler + node:http server.
 * Unknown errors become a logged 500; the handler never sees sockets.
 */

import { createServer, type Server } from "node:http";
import type { LedgerEvent } from "../domain/events.js";
import { InMemoryEventStore, type EventStore } from "../domain/eventStore.js";
import type { Clock, PaymentTransfer } from "../domain/ports.js";
import { StreamingLedger } from "../domain/streamingLedger.js";
import { apiError } from "./apiErrors.js";
import { createHandler, type RequestHandler } from "./handler.js";
import { makeNoopLogger, type Logger } from "./logger.js";
import { InMemoryPayoutTransfer } from "./payouts.js";

export interface AppDeps {
  store: EventStore;
  transfer: PaymentTransfer;
  clock?: Clock;
  defaultRoyaltyBasisPoints?: number;
  logger: Logger;
}

export interface App {
  readonly ledger: StreamingLedger;
  readonly handle: RequestHandler;
  readonly server: Server;
}

/** Logs each committed ledger event at info. */
export function logLedgerEvents(logger: Logger): (events: readonly LedgerEvent[]) => void {
  return (events) => {
    for (const event of events) {
      logger.info({ event }, event.type);
    }
  };
}

export async function createApp(overrides: Partial<AppDeps> = {}): Promise<App> {
  const logger = overrides.logger ?? makeNoopLogger();
  const ledger = await StreamingLedger.open({
    store: overrides.store ?? new InMemoryEventStore(),
    transfer: overrides.transfer ?? new InMemoryPayoutTransfer(logger),
    clock: overrides.clock,
    defaultRoyaltyBasisPoints: overrides.defaultRoyaltyBasisPoints,
    observer: logLedgerEvents(logger),
  });
  const handle = createHandler({ ledger });

  const server = createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      logger.error({ err, method: req.method, url: req.url }, "request failed");
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "application/json" });
      }
      res.end(JSON.stringify(apiError("INTERNAL_ERROR", "Internal Server Error")));
    });
  });

  return { ledger, handle, server };
}
