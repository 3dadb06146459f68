// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker-service/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No client construction, no side-effects beyond process.env read.
 * Invariants:
 * - DATABASE_URL required for stores and the graphile queue
 * - JUDGE_API_KEY is a secret (never log)
 * - Fails fast with one line per invalid variable
 * - WEBHOOK_TIMEOUT_MS stays below the notification:send job timeout
 * Side-effects: Reads process.env
 * Links: src/bootstrap/container.ts
 * @internal
 */

import { JOB_DEFAULTS } from "@tally/pipeline-worker";
import { z } from "zod";

const optionalString = z
  .string()
  .min(1)
  .optional()
  .or(z.literal("").transform(() => undefined));

const EnvSchema = z.object({
  /** PostgreSQL connection string (stores and graphile-worker) */
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),

  /** Queue backend: graphile (durable) or memory (single process) */
  QUEUE_BACKEND: z.enum(["graphile", "memory"]).default("graphile"),

  /** Worker pool size, split 6:3:1 across lanes */
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(10),

  /** graphile-worker poll interval */
  QUEUE_POLL_INTERVAL_MS: z.coerce.number().int().min(10).default(1000),

  /** Register the daily cron schedules in this process; disable on all but one replica */
  CRON_ENABLED: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),

  /** LLM judge bearer token (treat as secret). LLM evaluators fail with a config error without it. */
  JUDGE_API_KEY: optionalString,

  JUDGE_BASE_URL: z
    .string()
    .url("JUDGE_BASE_URL must be a valid URL")
    .default("https://api.openai.com"),

  /** Judge model when the evaluator has no override */
  JUDGE_DEFAULT_MODEL: z.string().min(1).default("gpt-4o-mini"),

  JUDGE_BREAKER_MAX_FAILURES: z.coerce.number().int().min(1).default(5),
  JUDGE_BREAKER_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),

  /** Per-request webhook deadline; must be shorter than the notification:send job timeout */
  WEBHOOK_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1)
    .max(
      JOB_DEFAULTS["notification:send"].timeoutMs - 1,
      "WEBHOOK_TIMEOUT_MS must be below the notification:send job timeout"
    )
    .default(30_000),

  /** Link target in Slack payloads */
  DASHBOARD_URL: z
    .string()
    .url("DASHBOARD_URL must be a valid URL")
    .optional()
    .or(z.literal("").transform(() => undefined)),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: pipeline-worker) */
  SERVICE_NAME: z.string().default("pipeline-worker"),

  /** Health endpoint port (default: 9000) */
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validates an environment record.
 * Throws with one line per invalid variable.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
