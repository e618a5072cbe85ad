import { z } from "zod";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

// z.coerce.boolean() treats any non-empty string as true, including "false"
const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Server
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  PUBLIC_BASE_URL: z.string().url().optional(),
  // Take the client address from X-Forwarded-For (only behind a proxy you control)
  TRUST_PROXY: stringBoolean.default(false),

  // Storage (unset = in memory)
  STORE_FILE: z.string().min(1).optional(),

  // Endpoint policy
  DEFAULT_ENDPOINT_TTL_MS: positiveInt.default(7 * DAY_MS),
  MAX_ENDPOINT_TTL_MS: positiveInt.default(30 * DAY_MS),
  MAX_REQUESTS_LIMIT: positiveInt.default(10_000),
  DELETE_CASCADE_LIMIT: z.coerce.number().int().min(0).default(500),
  QUOTA_RETRY_AFTER_SECONDS: positiveInt.default(3600),

  // Capture
  MAX_BODY_BYTES: positiveInt.default(512 * 1024),
  BODY_HARD_LIMIT_BYTES: positiveInt.default(10 * 1024 * 1024),
  RECORD_TTL_MS: positiveInt.optional(),

  // Reaper
  REAPER_INTERVAL_MS: positiveInt.default(60_000),
  RETENTION_GRACE_MS: z.coerce.number().int().min(0).default(DAY_MS),

  // Rate limiting (0 disables a limiter)
  RATE_LIMIT_WINDOW_MS: positiveInt.default(60_000),
  RATE_LIMIT_PER_ENDPOINT: z.coerce.number().int().min(0).default(120),
  RATE_LIMIT_PER_IP: z.coerce.number().int().min(0).default(0),
  RATE_LIMIT_FAIL_MODE: z.enum(["open", "closed"]).default("open"),
  REDIS_URL: z.string().url().optional(),

  // Live fan-out
  SUBSCRIBER_BUFFER_SIZE: positiveInt.default(100),
  SUBSCRIBER_OVERFLOW: z.enum(["drop-oldest", "disconnect"]).default("drop-oldest"),
  SSE_HEARTBEAT_MS: positiveInt.default(15_000),
  STREAM_RECENT_LIMIT: z.coerce.number().int().min(0).max(500).default(20),
});

export type Config = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Missing or invalid environment variables: ${issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "ConfigError";
  }
}

export const parseConfig = (env: Record<string, string | undefined> = process.env): Config => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  if (result.data.MAX_BODY_BYTES > result.data.BODY_HARD_LIMIT_BYTES) {
    throw new ConfigError([
      {
        code: z.ZodIssueCode.custom,
        path: ["MAX_BODY_BYTES"],
        message: "must not exceed BODY_HARD_LIMIT_BYTES",
      },
    ]);
  }
  return result.data;
};

export const loadConfig = (): Config => {
  try {
    return parseConfig(process.env);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
};
