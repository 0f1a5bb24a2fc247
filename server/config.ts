/**
 * Server configuration — process.env validated with zod.
 * Fails fast on invalid env; defaults cover local development.
 */

import { ZodError, z } from "zod";

export interface ConfigValidationMeta {
  readonly code: "INVALID_ENV";
  readonly missing: string[];
  readonly invalid: string[];
}

export class ConfigValidationError extends Error {
  readonly meta: ConfigValidationMeta;

  constructor(meta: ConfigValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "ConfigValidationError";
    this.meta = meta;
  }
}

const configSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3_000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  SERVICE_NAME: z.string().min(1).default("stream-ledger"),

  // Journal: "memory" loses state on restart; "file" appends NDJSON under EVENT_STORE_DIR.
  EVENT_STORE: z.enum(["memory", "file"]).default("memory"),
  EVENT_STORE_DIR: z.string().min(1).default("./data"),

  DEFAULT_ROYALTY_BPS: z.coerce.number().int().min(0).max(10_000).default(3_000),
});

export type AppConfig = z.infer<typeof configSchema>;

export type EnvSource = Record<string, string | undefined>;

export function loadConfig(env: EnvSource = process.env): AppConfig {
  try {
    return configSchema.parse(env);
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();
      for (const issue of error.issues) {
        const key = issue.path[0]?.toString();
        if (!key) continue;
        if (issue.code === "invalid_type") missing.add(key);
        else invalid.add(key);
      }
      throw new ConfigValidationError({ code: "INVALID_ENV", missing: [...missing], invalid: [...invalid] });
    }
    throw error;
  }
}
