/**
 * Event store abstraction — append-only ledger journal.
 * No business logic. Ordering preserved.
 */

import type { LedgerEvent } from "./events.js";
import { ConcurrencyError } from "./errors.js";

/** Ledger journal. Append-only. Events immutable. */
export interface EventStore {
  /**
   * Appends all events or none. Fails with ConcurrencyError unless the journal
   * currently holds exactly `expectedVersion` events. Returns the stored events.
   */
  append(expectedVersion: number, events: readonly LedgerEvent[]): Promise<LedgerEvent[]>;
  loadAll(): Promise<LedgerEvent[]>;
}

/** Stamps journal versions base+1, base+2, ... */
export function withVersions(base: number, events: readonly LedgerEvent[]): LedgerEvent[] {
  return events.map((e, index) => ({ ...e, version: base + index + 1 }));
}

/** In-memory adapter. For tests and deterministic replay. */
export class InMemoryEventStore implements EventStore {
  private events: LedgerEvent[] = [];

  async append(expectedVersion: number, events: readonly LedgerEvent[]): Promise<LedgerEvent[]> {
    const currentVersion = this.events.length;
    if (currentVersion !== expectedVersion) {
      throw new ConcurrencyError("Concurrent modification detected", {
        expectedVersion,
        currentVersion,
      });
    }
    if (events.length === 0) return [];
    const stored = withVersions(currentVersion, events);
    this.events = this.events.concat(stored);
    return stored.slice();
  }

  async loadAll(): Promise<LedgerEvent[]> {
    return this.events.slice();
  }

  /** Reset for tests. Not on EventStore interface. */
  clear(): void {
    this.events = [];
  }
}
