import pino from "pino";
import type { Logger } from "pino";
import type { LogLevel } from "./config";

export type { Logger };

export function createLogger(options: { level: LogLevel; name?: string }): Logger {
  return pino({
    name: options.name ?? "plant-id-gateway",
    level: options.level,
    redact: {
      paths: [
        "authorization",
        "headers.authorization",
        "req.headers.authorization",
        "*.apiKey",
        "*.secret",
        "*.token",
      ],
      censor: "[REDACTED]",
    },
  });
}
