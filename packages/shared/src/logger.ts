import pino from "pino";

/**
 * Minimal structured logger for the whole system.
 * Every call site passes a `service` field; do not put domain-specific
 * logging helpers here.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: undefined,
  redact: {
    paths: [
      "headers.authorization",
      "headers.Authorization",
      "*.hmacSecret",
      "*.password",
    ],
    censor: "[redacted]",
  },
});

export type Logger = typeof logger;
