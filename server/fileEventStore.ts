/**
 * File-backed ledger journal. Append-only NDJSON, one file per journal.
 * Adapter only — domain/EventStore interface unchanged.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { ZodError } from "zod";
import { ConcurrencyError } from "../domain/errors.js";
import { withVersions, type EventStore } from "../domain/eventStore.js";
import type { LedgerEvent } from "../domain/events.js";
import { parseLedgerEvent } from "./eventSchema.js";

export class FileEventStore implements EventStore {
  private readonly rootDir: string;
  private readonly journal: string;

  constructor(rootDir: string, journal = "ledger") {
    this.rootDir = rootDir;
    this.journal = journal;
  }

  get filePath(): string {
    return path.join(this.rootDir, journalFileName(this.journal));
  }

  async append(expectedVersion: number, events: readonly LedgerEvent[]): Promise<LedgerEvent[]> {
    const currentVersion = (await this.loadAll()).length;
    if (currentVersion !== expectedVersion) {
      throw new ConcurrencyError("Concurrent modification detected", {
        journal: this.journal,
        expectedVersion,
        currentVersion,
      });
    }
    if (events.length === 0) return [];
    await fs.mkdir(this.rootDir, { recursive: true });
    const stored = withVersions(currentVersion, events);
    const lines = stored.map((e) => JSON.stringify(e) + "\n").join("");
    const fh = await fs.open(this.filePath, "a");
    try {
      await fh.write(lines);
      await fh.sync();
    } finally {
      await fh.close();
    }
    return stored;
  }

  async loadAll(): Promise<LedgerEvent[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") return [];
      throw err;
    }

    const events: LedgerEvent[] = [];
    const lines = text.split(/\r?\n/);
    for (const [index, raw] of lines.entries()) {
      const line = raw.trim();
      if (!line) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        throw new Error(`Invalid JSON in event log at line ${index + 1}`);
      }
      try {
        events.push(parseLedgerEvent(parsed));
      } catch (err) {
        if (err instanceof ZodError) throw new Error(`Invalid event shape in event log at line ${index + 1}`);
        throw err;
      }
    }
    return events;
  }
}

/** Journal names map to file names; anything outside [a-zA-Z0-9._-] becomes '_'. */
function journalFileName(journal: string): string {
  return `${journal.replace(/[^a-zA-Z0-9._-]/g, "_")}.events.ndjson`;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
