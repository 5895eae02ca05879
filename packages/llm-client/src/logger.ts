/**
 * Pino logger factory.
 *
 * Emits JSON to stderr so hosts that own stdout (editor RPC channels) are
 * not disturbed. Silenced under Vitest and NODE_ENV=test.
 */

import type { Logger } from "pino";
import pino from "pino";

export type { Logger } from "pino";

/** Credential-bearing paths that must never reach a log line. */
const REDACT_PATHS = [
  "apiKey",
  "*.apiKey",
  "headers.Authorization",
  'headers["x-api-key"]',
];

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = process.env.LOG_LEVEL ?? "info";

  return pino(
    {
      level,
      enabled: !(isVitest || nodeEnv === "test"),
      base: { ...bindings, app: "switchboard" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
