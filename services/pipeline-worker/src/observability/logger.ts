// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker-service/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Root logger creation, child bindings and flush on exit. Does not validate env.
 * Invariants: Always emits JSON to stdout; silenced under test tooling; safe to call at module scope.
 * Side-effects: IO (stdout)
 * Notes: Reads LOG_LEVEL, SERVICE_NAME and NODE_ENV directly so boot errors can be logged before env() validates.
 * Links: observability/redact.ts, main.ts
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

let root: Logger | null = null;

function rootLogger(): Logger {
  if (root) return root;

  const isTestTooling =
    process.env.VITEST === "true" || process.env.NODE_ENV === "test";
  const nodeEnv = process.env.NODE_ENV ?? "development";

  root = pino(
    {
      level: process.env.LOG_LEVEL ?? "info",
      enabled: !isTestTooling,
      base: { service: process.env.SERVICE_NAME ?? "pipeline-worker" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    // Sync outside production for crash visibility
    pino.destination({ dest: 1, sync: nodeEnv !== "production" })
  );
  return root;
}

export function makeLogger(bindings: Record<string, unknown> = {}): Logger {
  return rootLogger().child(bindings);
}

/** Flushes buffered output before process exit. */
export function flushLogger(): void {
  root?.flush();
}
