/**
 * Server configuration read from environment variables.
 *
 * PORT                              HTTP port (default: 5000)
 * HOST                              Bind address (default: 0.0.0.0)
 * INSPECTION_DB_PATH                SQLite file, ":memory:" allowed (default: ~/.inspection/inspection.db)
 * INSPECTION_STATIONS_PATH          Station registry YAML (default: none)
 * INSPECTION_LOCK_DEBOUNCE_MS       Lock requeue delay (default: 500)
 * INSPECTION_SUBSCRIBER_BUFFER      Broadcast buffer per subscriber (default: 256)
 * INSPECTION_WS_MAX_BUFFERED_BYTES  WebSocket slow-consumer limit (default: 1 MiB)
 * INSPECTION_TEMP_WARNING           Temperature warning threshold in °C (default: 60)
 * INSPECTION_TEMP_DANGER            Temperature danger threshold in °C (default: 80)
 * INSPECTION_LOGGER                 Fastify request logging (default: true)
 */

import { z } from "zod";
import { getDefaultDbPath } from "./db/connection";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(5000),
    HOST: z.string().min(1).default("0.0.0.0"),
    INSPECTION_DB_PATH: z.string().min(1).optional(),
    INSPECTION_STATIONS_PATH: z.string().min(1).optional(),
    INSPECTION_LOCK_DEBOUNCE_MS: z.coerce.number().int().min(0).default(500),
    INSPECTION_SUBSCRIBER_BUFFER: z.coerce.number().int().min(1).default(256),
    INSPECTION_WS_MAX_BUFFERED_BYTES: z.coerce.number().int().min(1).default(1024 * 1024),
    INSPECTION_TEMP_WARNING: z.coerce.number().default(60),
    INSPECTION_TEMP_DANGER: z.coerce.number().default(80),
    INSPECTION_LOGGER: booleanFlag,
  })
  .refine((env) => env.INSPECTION_TEMP_WARNING <= env.INSPECTION_TEMP_DANGER, {
    message: "must not exceed INSPECTION_TEMP_DANGER",
    path: ["INSPECTION_TEMP_WARNING"],
  });

export interface ServerConfig {
  port: number;
  host: string;
  dbPath: string;
  stationsPath?: string;
  lockDebounceMs: number;
  subscriberBuffer: number;
  wsMaxBufferedBytes: number;
  temperatureThresholds: { warning: number; danger: number };
  logger: boolean;
}

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    const issueList = issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n");
    super(`Invalid environment configuration:\n${issueList}`);
    this.name = "ConfigError";
  }
}

/**
 * Parse and validate configuration.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Treat empty strings as unset
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  const values = parsed.data;

  return {
    port: values.PORT,
    host: values.HOST,
    dbPath: values.INSPECTION_DB_PATH ?? getDefaultDbPath(),
    stationsPath: values.INSPECTION_STATIONS_PATH,
    lockDebounceMs: values.INSPECTION_LOCK_DEBOUNCE_MS,
    subscriberBuffer: values.INSPECTION_SUBSCRIBER_BUFFER,
    wsMaxBufferedBytes: values.INSPECTION_WS_MAX_BUFFERED_BYTES,
    temperatureThresholds: {
      warning: values.INSPECTION_TEMP_WARNING,
      danger: values.INSPECTION_TEMP_DANGER,
    },
    logger: values.INSPECTION_LOGGER,
  };
}
