/**
 * Pino logger factory — JSON to stdout.
 * Silenced under Vitest or NODE_ENV=test; use makeNoopLogger in tests that need a Logger.
 */

import { destination as stdoutDestination, pino, stdTimeFunctions, type DestinationStream, type Logger } from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  readonly level?: string;
  readonly serviceName?: string;
  readonly nodeEnv?: string;
  /** Overrides the test-tooling default. */
  readonly enabled?: boolean;
  /** Defaults to stdout. */
  readonly destination?: DestinationStream;
}

export function makeLogger(bindings?: Record<string, unknown>, options: LoggerOptions = {}): Logger {
  const nodeEnv = options.nodeEnv ?? process.env.NODE_ENV ?? "development";
  const isTestTooling = process.env.VITEST === "true" || nodeEnv === "test";

  return pino(
    {
      level: options.level ?? "info",
      enabled: options.enabled ?? !isTestTooling,
      // Reserved keys last so bindings cannot overwrite them.
      base: { ...bindings, service: options.serviceName ?? "stream-ledger" },
      messageKey: "msg",
      timestamp: stdTimeFunctions.isoTime,
    },
    options.destination ?? stdoutDestination({ dest: 1, sync: nodeEnv !== "production" })
  );
}

/** Same type, no output. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
