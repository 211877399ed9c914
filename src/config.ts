import { z } from "zod";

const RATE_LIMIT_UNITS: Record<string, number> = {
  second: 1_000,
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
};

export interface RateLimitRule {
  limit: number;
  windowMs: number;
}

/**
 * Parses a rate limit expression such as `10/minute`, `100/hour` or `5/30 seconds`.
 */
export function parseRateLimit(expression: string): RateLimitRule | null {
  const match = expression
    .trim()
    .toLowerCase()
    .match(/^(\d+)\s*(?:\/|per)\s*(\d+)?\s*(second|minute|hour|day)s?$/);
  if (!match) {
    return null;
  }

  const limit = Number(match[1]);
  const multiplier = match[2] ? Number(match[2]) : 1;
  const unit = RATE_LIMIT_UNITS[match[3]];
  if (limit < 1 || multiplier < 1 || unit === undefined) {
    return null;
  }

  return { limit, windowMs: multiplier * unit };
}

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const EnvSchema = z
  .object({
    PLANTNET_API_KEY: z.string().min(1).optional(),
    PLANTNET_API_ENDPOINT: z.string().url().default("https://my-api.plantnet.org/v2/identify/all"),
    PLANTNET_LANG: z.string().min(2).default("en"),
    JWT_SECRET_KEY: z.string().min(1, "JWT_SECRET_KEY is required"),
    IDENTIFIER: z.enum(["plantnet", "mock"]).default("plantnet"),
    CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
    CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),
    CACHE_SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
    RATE_LIMIT: z
      .string()
      .default("10/minute")
      .transform((value, ctx) => {
        const rule = parseRateLimit(value);
        if (!rule) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Invalid rate limit expression "${value}"`,
          });
          return z.NEVER;
        }
        return rule;
      }),
    RATE_LIMIT_KEY: z.enum(["address", "identity"]).default("address"),
    TRUST_PROXY: booleanFlag.default("false"),
    MAX_IMAGES: z.coerce.number().int().min(1).max(5).default(5),
    MAX_BODY_BYTES: z.coerce.number().int().positive().default(25 * 1024 * 1024),
    UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    UPSTREAM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
    UPSTREAM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(250),
    SINGLE_FLIGHT: booleanFlag.default("true"),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  })
  .superRefine((env, ctx) => {
    if (env.IDENTIFIER === "plantnet" && !env.PLANTNET_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PLANTNET_API_KEY"],
        message: "PLANTNET_API_KEY is required when IDENTIFIER is plantnet",
      });
    }
  });

export interface AppConfig {
  plantnet: {
    apiKey: string;
    endpoint: string;
    language: string;
  };
  identifier: "plantnet" | "mock";
  jwtSecret: string;
  cache: {
    ttlMs: number;
    maxEntries: number;
    sweepIntervalMs: number;
  };
  rateLimit: RateLimitRule & {
    keyBy: "address" | "identity";
  };
  trustProxy: boolean;
  maxImages: number;
  maxBodyBytes: number;
  upstream: {
    timeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
  };
  singleFlight: boolean;
  logLevel: LogLevel;
  port: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return {
    plantnet: {
      apiKey: values.PLANTNET_API_KEY ?? "",
      endpoint: values.PLANTNET_API_ENDPOINT,
      language: values.PLANTNET_LANG,
    },
    identifier: values.IDENTIFIER,
    jwtSecret: values.JWT_SECRET_KEY,
    cache: {
      ttlMs: values.CACHE_TTL_SECONDS * 1000,
      maxEntries: values.CACHE_MAX_ENTRIES,
      sweepIntervalMs: values.CACHE_SWEEP_INTERVAL_SECONDS * 1000,
    },
    rateLimit: {
      ...values.RATE_LIMIT,
      keyBy: values.RATE_LIMIT_KEY,
    },
    trustProxy: values.TRUST_PROXY,
    maxImages: values.MAX_IMAGES,
    maxBodyBytes: values.MAX_BODY_BYTES,
    upstream: {
      timeoutMs: values.UPSTREAM_TIMEOUT_MS,
      maxRetries: values.UPSTREAM_MAX_RETRIES,
      retryBaseDelayMs: values.UPSTREAM_RETRY_BASE_DELAY_MS,
    },
    singleFlight: values.SINGLE_FLIGHT,
    logLevel: values.LOG_LEVEL,
    port: values.PORT,
  };
}
